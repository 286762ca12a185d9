import * as Sentry from "@sentry/nextjs";

/**
 * Structured logger using Sentry.logger
 *
 * Without a DSN Sentry is never initialised and these calls are no-ops;
 * console output is captured separately by consoleLoggingIntegration.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Contract analysis started", { fileName, sizeBytes });
 * logger.warn("Unrecognized risk type", { label });
 * logger.error("Risk scoring failed", { code: err.code, message: err.message });
 *
 * // Template literal formatting (creates searchable attributes)
 * logger.info(fmt`Scored ${clauseCount} clauses for ${fileName}`);
 * ```
 */
export const logger = Sentry.logger;

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt;
