/**
 * @fileoverview Upload validation utilities for budget enforcement.
 *
 * These validations run before text extraction to reject files
 * that would exceed resource limits.
 *
 * @module lib/budget/validation
 */

import { BUDGET_LIMITS } from './limits'

/**
 * Error codes for validation failures.
 */
export type UploadLimitCode = 'FILE_TOO_LARGE' | 'TOO_MANY_PAGES'

/**
 * Detailed validation error information.
 */
export interface UploadLimitErrorInfo {
  code: UploadLimitCode
  message: string
  limit: number
  actual: number
}

/**
 * Result of upload validation check.
 */
export interface UploadValidationResult {
  valid: boolean
  error?: UploadLimitErrorInfo
}

/**
 * Validates that file size is within acceptable limits.
 */
export function validateFileSize(sizeBytes: number): UploadValidationResult {
  if (sizeBytes > BUDGET_LIMITS.MAX_FILE_SIZE) {
    const limitMB = BUDGET_LIMITS.MAX_FILE_SIZE / (1024 * 1024)
    return {
      valid: false,
      error: {
        code: 'FILE_TOO_LARGE',
        message: `File exceeds ${limitMB}MB limit. Please upload a smaller contract.`,
        limit: BUDGET_LIMITS.MAX_FILE_SIZE,
        actual: sizeBytes,
      },
    }
  }
  return { valid: true }
}

/**
 * Lightweight PDF page count by scanning the buffer for /Count in the Pages tree.
 * Avoids loading the PDF parser just to reject an oversized upload. If the
 * count cannot be determined, returns null and the upload is allowed; the
 * token budget truncation after extraction bounds the prompt anyway.
 */
function getPdfPageCountFromBuffer(buffer: Buffer): number | null {
  const str = buffer.toString('latin1')
  // Match /Count N where N is a positive integer (PDF Pages dictionary)
  const countMatches = str.matchAll(/\/Count\s+(\d+)/g)
  let maxCount = 0
  for (const m of countMatches) {
    const n = parseInt(m[1], 10)
    if (n > maxCount) maxCount = n
  }
  return maxCount > 0 ? maxCount : null
}

/**
 * Validates that PDF page count is within acceptable limits.
 * Other MIME types always pass.
 */
export async function validatePageCount(
  buffer: Buffer,
  mimeType: string
): Promise<UploadValidationResult> {
  if (mimeType === 'application/pdf') {
    const pageCount = getPdfPageCountFromBuffer(buffer)
    if (pageCount !== null && pageCount > BUDGET_LIMITS.MAX_PAGES) {
      return {
        valid: false,
        error: {
          code: 'TOO_MANY_PAGES',
          message: `Contract exceeds ${BUDGET_LIMITS.MAX_PAGES} page limit. Please upload a shorter document.`,
          limit: BUDGET_LIMITS.MAX_PAGES,
          actual: pageCount,
        },
      }
    }
  }

  return { valid: true }
}
