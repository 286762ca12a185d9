/**
 * @fileoverview Validation messages for the contract analysis pipeline
 *
 * User-facing wording for gate outcomes that are not errors but still need
 * explaining in the dashboard.
 *
 * @module agents/validation/messages
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Result of a validation gate check.
 */
export interface ValidationResult {
  /** Whether the validation passed */
  valid: boolean
  /** Details if validation failed */
  error?: {
    /** Code for logging (e.g., ZERO_CLAUSES) */
    code: string
    /** Plain language message for UI display */
    userMessage: string
    /** Which pipeline stage failed (e.g., clause extraction) */
    stage: string
    /** Actionable guidance for the user */
    suggestion?: string
  }
}

// ============================================================================
// Message Templates
// ============================================================================

export const VALIDATION_MESSAGES = {
  ZERO_CLAUSES: {
    userMessage: "No risk-bearing clauses were found in this document.",
    suggestion:
      "Check that the file contains actual contract text, not just headers, a cover page or scanned images.",
  },
  LOW_TEXT: {
    userMessage: "Very little text could be read from this document.",
    suggestion:
      "Scanned PDFs have no text layer. Export the contract from its source application and upload that PDF instead.",
  },
} as const

export type ValidationMessageCode = keyof typeof VALIDATION_MESSAGES

// ============================================================================
// Error Formatting
// ============================================================================

/**
 * Formats a validation error with the matching message template.
 */
export function formatValidationError(
  code: ValidationMessageCode,
  stage: string
): NonNullable<ValidationResult["error"]> {
  const message = VALIDATION_MESSAGES[code]
  return {
    code,
    stage,
    userMessage: message.userMessage,
    suggestion: message.suggestion,
  }
}
