/**
 * @fileoverview Unified document extraction entry point
 *
 * Single function for extracting text from an uploaded contract with the
 * empty-document gate and structured output.
 *
 * @module lib/document-extraction/extract-document
 */

import { EmptyDocumentError, ValidationError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { extractPdf } from './pdf-extractor'
import { validateExtractionQuality } from './validators'
import type { ExtractionResult } from './types'

// ============================================================================
// Types
// ============================================================================

export const SUPPORTED_MIME_TYPES = ['application/pdf', 'text/plain'] as const

export type SupportedMimeType = (typeof SUPPORTED_MIME_TYPES)[number]

export interface ExtractDocumentOptions {
  /** File size in bytes for quality metrics */
  fileSize?: number
}

export function isSupportedMimeType(mimeType: string): mimeType is SupportedMimeType {
  return SUPPORTED_MIME_TYPES.some((t) => t === mimeType)
}

// ============================================================================
// Main Extraction Function
// ============================================================================

/**
 * Extracts text from document buffer with validation.
 *
 * Validation flow:
 * 1. Format detection and raw extraction
 * 2. Empty-text gate (scanned PDFs, blank files)
 * 3. Return structured result with metrics
 *
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Invalid or corrupt file
 * @throws EmptyDocumentError - No text could be extracted
 * @throws ValidationError - Unsupported MIME type
 */
export async function extractDocument(
  buffer: Buffer,
  mimeType: string,
  options: ExtractDocumentOptions = {}
): Promise<ExtractionResult> {
  const { fileSize = buffer.length } = options

  if (!isSupportedMimeType(mimeType)) {
    throw new ValidationError(`Unsupported file type: ${mimeType || 'unknown'}. Please upload a PDF.`)
  }

  const result =
    mimeType === 'application/pdf'
      ? await extractPdf(buffer, fileSize)
      : extractPlainText(buffer, fileSize)

  if (result.text.trim().length === 0) {
    logExtractionMetrics(mimeType, result, 'empty')
    throw new EmptyDocumentError()
  }

  logExtractionMetrics(mimeType, result, 'success')

  return result
}

// ============================================================================
// Plain Text Extraction
// ============================================================================

function extractPlainText(buffer: Buffer, fileSize: number): ExtractionResult {
  const text = buffer.toString('utf-8').normalize('NFC')
  const quality = validateExtractionQuality(text, fileSize)

  return {
    text,
    quality,
    pageCount: 1,
    metadata: {},
  }
}

// ============================================================================
// Logging
// ============================================================================

function logExtractionMetrics(
  mimeType: string,
  result: ExtractionResult,
  outcome: 'success' | 'empty'
): void {
  logger.info('[extraction]', {
    mimeType,
    outcome,
    charCount: result.quality.charCount,
    wordCount: result.quality.wordCount,
    pageCount: result.pageCount,
    confidence: result.quality.confidence,
    warnings: result.quality.warnings.map((w) => w.type).join(','),
    hasTitle: !!result.metadata.title,
    hasAuthor: !!result.metadata.author,
  })
}
