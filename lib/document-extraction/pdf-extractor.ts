/**
 * @fileoverview PDF text extraction with error handling
 *
 * Uses unpdf (serverless-optimized PDF.js build) so the Next.js server bundle
 * needs no pdfjs-dist worker or DOMMatrix polyfill.
 *
 * @module lib/document-extraction/pdf-extractor
 */

import { EncryptedDocumentError, CorruptDocumentError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import type { DocumentMetadata, ExtractionResult } from './types'
import { validateExtractionQuality } from './validators'

/**
 * Extracts text from PDF buffer with proper error handling.
 *
 * PDF.js outputs text in content-stream order, which linearizes multi-column
 * layouts into a single column.
 *
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Invalid or corrupt PDF
 */
export async function extractPdf(
  buffer: Buffer,
  fileSize?: number
): Promise<ExtractionResult> {
  const { extractText, getMeta, getDocumentProxy } = await import('unpdf')

  try {
    const pdf = await getDocumentProxy(new Uint8Array(buffer))

    try {
      const { totalPages, text: rawText } = await extractText(pdf, { mergePages: true })

      const text = rawText.normalize('NFC')

      const quality = validateExtractionQuality(text, fileSize ?? buffer.length)
      quality.pageCount = totalPages

      let metadata: DocumentMetadata = {}
      try {
        const { info } = await getMeta(pdf)
        metadata = {
          title: readInfoString(info, 'Title'),
          author: readInfoString(info, 'Author'),
          creationDate: readInfoString(info, 'CreationDate'),
          modificationDate: readInfoString(info, 'ModDate'),
        }
      } catch (error: unknown) {
        // Metadata is optional; keep the text
        logger.warn('[extractPdf] Metadata unavailable', {
          message: error instanceof Error ? error.message : String(error),
        })
      }

      return {
        text,
        quality,
        pageCount: totalPages,
        metadata,
      }
    } finally {
      await pdf.destroy()
    }
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error)
    const errorName = error instanceof Error ? error.name : ''

    if (
      errorName === 'PasswordException' ||
      /password|encrypted/i.test(errorMessage)
    ) {
      throw new EncryptedDocumentError()
    }
    if (
      errorName === 'InvalidPDFException' ||
      /invalid pdf|not a pdf|no pdf header/i.test(errorMessage)
    ) {
      throw new CorruptDocumentError()
    }
    // Re-throw unknown errors
    throw error
  }
}

/** PDF info dictionaries are untyped; only keep string entries */
function readInfoString(info: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = info?.[key]
  return typeof value === 'string' && value.trim() !== '' ? value : undefined
}
