/**
 * @fileoverview Budget protection utilities for contract analysis.
 *
 * This module provides centralized budget enforcement including:
 * - Token limits and file size constraints
 * - Token estimation for pre-flight budget checks
 * - Upload validation (file size, page count)
 * - Paragraph-boundary truncation for oversized contracts
 *
 * Usage:
 * ```typescript
 * import {
 *   BUDGET_LIMITS,
 *   checkTokenBudget,
 *   validateFileSize,
 *   validatePageCount,
 *   truncateToTokenBudget,
 * } from '@/lib/budget'
 * ```
 *
 * @module lib/budget
 */

export * from './limits'
export * from './estimation'
export * from './validation'
export * from './truncation'
