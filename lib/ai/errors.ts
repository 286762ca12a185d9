import { APICallError, RetryError } from 'ai'
import {
  AppError,
  InvalidApiKeyError,
  LlmFailedError,
  RateLimitError,
  isAppError,
} from '@/lib/errors'
import { logger } from '@/lib/logger'

/**
 * HTTP status of a provider failure. Gateway errors are not APICallErrors but
 * carry the same `statusCode` field.
 */
function readStatusCode(error: unknown): number | undefined {
  if (APICallError.isInstance(error)) return error.statusCode
  if (
    error instanceof Error &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode
  }
  return undefined
}

/**
 * Maps a failed model call onto the application error taxonomy.
 *
 * - 401/403 → InvalidApiKeyError
 * - 429 → RateLimitError
 * - anything else → LlmFailedError
 *
 * AppErrors (e.g. a missing key raised before the call) pass through.
 */
export function toModelError(error: unknown, agent: string): AppError {
  if (isAppError(error)) return error

  // Retries exhausted: the last attempt holds the real cause
  const cause = RetryError.isInstance(error) ? error.lastError : error
  const statusCode = readStatusCode(cause)
  const message = cause instanceof Error ? cause.message : String(cause)

  logger.error(`[${agent}] Model call failed`, { statusCode, message })

  if (statusCode === 401 || statusCode === 403) {
    return new InvalidApiKeyError()
  }
  if (statusCode === 429) {
    return new RateLimitError('The model provider is rate limiting requests. Try again shortly.')
  }
  return new LlmFailedError(`Model call failed: ${message}`)
}
