/**
 * @fileoverview Validation Gates for the contract analysis pipeline
 *
 * This barrel only re-exports lightweight validation code (no unpdf).
 *
 * @module agents/validation
 */

export {
  validateExtractionResult,
  validateTokenBudget,
  validateClauseExtraction,
  type ExtractionValidation,
  type TokenBudgetValidation,
} from "./gates"
export {
  VALIDATION_MESSAGES,
  formatValidationError,
  type ValidationResult,
  type ValidationMessageCode,
} from "./messages"
