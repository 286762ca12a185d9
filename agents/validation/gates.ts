/**
 * @fileoverview Validation Gates for the contract analysis pipeline
 *
 * Checks that run between pipeline steps. None of them throw: hard failures
 * (encrypted, corrupt, empty files) are raised by extraction itself, and
 * these gates only decide how the next step proceeds.
 *
 * @module agents/validation/gates
 */

import { formatValidationError, type ValidationResult } from "./messages"
import {
  checkTokenBudget,
  truncateToTokenBudget,
  BUDGET_LIMITS,
  type TokenEstimate,
  type TruncationResult,
} from "@/lib/budget"
import type { ExtractionResult } from "@/lib/document-extraction"

// ============================================================================
// Extraction Validation
// ============================================================================

/**
 * Result of extraction validation.
 */
export interface ExtractionValidation {
  /** Whether the text is substantial enough to expect clauses */
  valid: boolean
  error?: ValidationResult["error"]
  /** Warnings shown with the analysis */
  warnings: string[]
}

/**
 * Turns extraction quality metrics into display warnings.
 *
 * Thin text is flagged but still analyzed.
 */
export function validateExtractionResult(
  result: ExtractionResult
): ExtractionValidation {
  const warnings: string[] = result.quality.warnings.map((w) => w.message)

  if (result.quality.warnings.some((w) => w.type === "low_text")) {
    return {
      valid: false,
      error: formatValidationError("LOW_TEXT", "extraction"),
      warnings,
    }
  }

  if (result.quality.confidence < 0.3) {
    warnings.push(
      `Low extraction confidence: ${(result.quality.confidence * 100).toFixed(0)}%`
    )
  }

  return { valid: true, warnings }
}

// ============================================================================
// Token Budget Validation
// ============================================================================

/**
 * Result of token budget validation.
 */
export interface TokenBudgetValidation {
  /** Always true: excess text is truncated, not rejected */
  passed: boolean
  estimate: TokenEstimate
  /** Text to send to the model */
  text: string
  truncation?: TruncationResult
  warning?: {
    code: "DOCUMENT_TRUNCATED"
    message: string
  }
}

/**
 * Checks contract text against the token budget and truncates at paragraph
 * boundaries when it does not fit.
 */
export function validateTokenBudget(
  rawText: string,
  budget: number = BUDGET_LIMITS.TOKEN_BUDGET
): TokenBudgetValidation {
  const estimate = checkTokenBudget(rawText, budget)

  if (estimate.withinBudget) {
    return { passed: true, estimate, text: rawText }
  }

  const truncation = truncateToTokenBudget(rawText, budget)

  return {
    passed: true,
    estimate,
    text: truncation.text,
    truncation,
    warning: {
      code: "DOCUMENT_TRUNCATED",
      message: `Contract exceeded ${budget.toLocaleString("en-US")} tokens (${estimate.tokenCount.toLocaleString("en-US")} found). Analysis covers the first ${truncation.truncatedTokens.toLocaleString("en-US")} tokens.`,
    },
  }
}

// ============================================================================
// Clause Extraction Validation
// ============================================================================

/**
 * Flags an extraction that found no clauses.
 *
 * The pipeline still completes with an empty result; the message explains
 * the empty dashboard.
 */
export function validateClauseExtraction(clauses: string[]): ValidationResult {
  if (clauses.length === 0) {
    return {
      valid: false,
      error: formatValidationError("ZERO_CLAUSES", "clause extraction"),
    }
  }

  return { valid: true }
}
