/**
 * Custom error classes for structured error handling.
 *
 * Every failure the analysis pipeline can produce has a class here, so the
 * server actions and the route handler can turn any of them into the same
 * serialized envelope and the UI can pick a message by `code`.
 *
 * Usage:
 *   throw new ValidationError("Only PDF files are supported")
 *   throw new CorruptDocumentError()
 *   throw new MalformedModelOutputError("Risk scoring returned an unexpected shape", details)
 *
 * In route handlers and actions:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     return NextResponse.json(appError.toJSON(), { status: appError.statusCode })
 *   }
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "RATE_LIMITED"
  | "INTERNAL_ERROR"
  // Document loading
  | "ENCRYPTED_DOCUMENT"
  | "CORRUPT_DOCUMENT"
  | "EMPTY_DOCUMENT"
  // Model access
  | "CONFIGURATION_ERROR"
  | "INVALID_API_KEY"
  | "LLM_FAILED"
  | "MALFORMED_MODEL_OUTPUT"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  public readonly isOperational = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[]
  ) {
    super(message)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * 400 Validation Error - Upload or input validation failed
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details)
  }

  static fromZodError(error: { issues: Array<{ path: PropertyKey[]; message: string }> }): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ValidationError("Validation failed", details)
  }
}

/**
 * 422 Encrypted Document - PDF is password protected
 */
export class EncryptedDocumentError extends AppError {
  constructor(message = "This PDF is password protected. Remove the password and upload it again.") {
    super("ENCRYPTED_DOCUMENT", message, 422)
  }
}

/**
 * 422 Corrupt Document - File is not a readable PDF
 */
export class CorruptDocumentError extends AppError {
  constructor(message = "This file could not be read as a PDF. It may be damaged or not a PDF at all.") {
    super("CORRUPT_DOCUMENT", message, 422)
  }
}

/**
 * 422 Empty Document - Extraction produced no text (scanned or image-only PDF)
 */
export class EmptyDocumentError extends AppError {
  constructor(message = "No text could be extracted from this document.") {
    super("EMPTY_DOCUMENT", message, 422)
  }
}

/**
 * 429 Rate Limited - The model provider rejected the request for volume
 */
export class RateLimitError extends AppError {
  constructor(
    message = "Too many requests",
    public readonly retryAfter?: number
  ) {
    super("RATE_LIMITED", message, 429)
  }
}

/**
 * 500 Configuration Error - Server is missing a required setting
 */
export class ConfigurationError extends AppError {
  constructor(message = "Server configuration is incomplete") {
    super("CONFIGURATION_ERROR", message, 500)
  }
}

/**
 * 401 Invalid API Key - The model provider rejected the credential
 */
export class InvalidApiKeyError extends AppError {
  constructor(message = "The AI Gateway API key was rejected") {
    super("INVALID_API_KEY", message, 401)
  }
}

/**
 * 502 LLM Failed - Language model API error
 */
export class LlmFailedError extends AppError {
  constructor(message = "Language model request failed") {
    super("LLM_FAILED", message, 502)
  }
}

/**
 * 502 Malformed Model Output - Response did not match the expected structure
 */
export class MalformedModelOutputError extends AppError {
  constructor(message = "The model returned an unexpected response format", details?: ErrorDetail[]) {
    super("MALFORMED_MODEL_OUTPUT", message, 502, details)
  }
}

/**
 * 500 Internal Error - Unexpected server error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message, 500)
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    // Don't expose internal error messages in production
    const message =
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message

    return new InternalError(message)
  }

  return new InternalError("An unexpected error occurred")
}
