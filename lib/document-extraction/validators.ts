/**
 * @fileoverview Extraction quality validation utilities
 * @module lib/document-extraction/validators
 */

import type { QualityMetrics, ExtractionWarning } from './types'

/** Below this a contract is almost certainly scanned or image-only */
export const MIN_TEXT_LENGTH = 100
const MIN_TEXT_TO_SIZE_RATIO = 0.001 // Very low = likely scanned

/**
 * Computes extraction quality metrics and warnings.
 *
 * Never rejects: an empty document is handled by the caller, and thin text
 * still goes to analysis with a warning attached.
 */
export function validateExtractionQuality(
  text: string,
  fileSize: number
): QualityMetrics {
  const charCount = text.length
  const wordCount = text.split(/\s+/).filter(Boolean).length
  const ratio = fileSize > 0 ? charCount / fileSize : 0
  const warnings: ExtractionWarning[] = []

  const isLowText = charCount < MIN_TEXT_LENGTH

  if (isLowText) {
    warnings.push({
      type: 'low_text',
      message: 'Very little text was extracted; the PDF may be scanned or image-based',
    })
  } else if (ratio < MIN_TEXT_TO_SIZE_RATIO && fileSize > 100_000) {
    // Large file with very little text - suspicious
    warnings.push({
      type: 'low_confidence',
      message: 'Document has unusually low text density',
    })
  }

  // Higher ratio = more confident it's actual text
  const confidence = isLowText ? 0 : Math.min(1, ratio * 100)

  return {
    charCount,
    wordCount,
    pageCount: 1, // Caller should override for PDFs
    confidence,
    warnings,
  }
}
