/**
 * @fileoverview Contract analysis pipeline
 *
 * Straight-line flow for one upload:
 *   upload gates → extraction → token budget → clause extraction →
 *   risk scoring → aggregation
 *
 * Every failure surfaces as an AppError subclass; callers (server action,
 * route handler) turn it into an error envelope.
 *
 * @module lib/analysis/analyze-contract
 */

import { runClauseExtractor } from '@/agents/clause-extractor'
import { runRiskScorer } from '@/agents/risk-scorer'
import type { AnalysisResult, ClauseRecord, DocumentSummary } from '@/agents/types'
import {
  validateClauseExtraction,
  validateExtractionResult,
  validateTokenBudget,
} from '@/agents/validation'
import { BudgetTracker } from '@/lib/ai/budget'
import { validateFileSize, validatePageCount, type UploadValidationResult } from '@/lib/budget'
import { extractDocument } from '@/lib/document-extraction'
import { ValidationError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import {
  computeOverallRisk,
  computeRiskLevelDistribution,
  computeRiskTypeDistribution,
  findHighestRiskClause,
  generateExecutiveSummary,
  getRiskLevel,
} from './scoring'

export interface AnalyzeContractInput {
  buffer: Buffer
  fileName: string
  mimeType: string
  /** Overrides AI_GATEWAY_API_KEY for this request */
  apiKey?: string | null
}

function assertUploadValid(check: UploadValidationResult): void {
  if (check.valid || !check.error) return
  throw new ValidationError(check.error.message, [
    { field: 'file', message: check.error.message, code: check.error.code },
  ])
}

/**
 * Analyzes one contract end to end.
 *
 * @throws ValidationError - file too large, too many pages, unsupported type
 * @throws EncryptedDocumentError | CorruptDocumentError | EmptyDocumentError
 * @throws ConfigurationError - no gateway key available
 * @throws InvalidApiKeyError | RateLimitError | LlmFailedError | MalformedModelOutputError
 */
export async function analyzeContract(
  input: AnalyzeContractInput
): Promise<AnalysisResult> {
  const { buffer, fileName, mimeType, apiKey } = input
  const startedAt = Date.now()

  logger.info('[analyzeContract] Started', {
    fileName,
    mimeType,
    sizeBytes: buffer.length,
  })

  // Upload gates
  assertUploadValid(validateFileSize(buffer.length))
  assertUploadValid(await validatePageCount(buffer, mimeType))

  // Extraction
  const extraction = await extractDocument(buffer, mimeType, { fileSize: buffer.length })
  const extractionCheck = validateExtractionResult(extraction)
  const warnings = [...extractionCheck.warnings]

  if (!extractionCheck.valid) {
    logger.warn('[analyzeContract] Thin extraction', {
      fileName,
      charCount: extraction.quality.charCount,
      code: extractionCheck.error?.code,
    })
  }

  // Token budget
  const budget = validateTokenBudget(extraction.text)
  if (budget.warning) {
    warnings.push(budget.warning.message)
    logger.warn('[analyzeContract] Contract truncated', {
      fileName,
      originalTokens: budget.estimate.tokenCount,
      truncatedTokens: budget.truncation?.truncatedTokens,
      removedParagraphs: budget.truncation?.removedParagraphs,
    })
  }

  const budgetTracker = new BudgetTracker()

  // Clause extraction
  const extractor = await runClauseExtractor({
    text: budget.text,
    budgetTracker,
    apiKey,
    truncated: budget.truncation?.truncated ?? false,
  })

  const clauseCheck = validateClauseExtraction(extractor.clauses)
  if (!clauseCheck.valid && clauseCheck.error) {
    warnings.push(`${clauseCheck.error.userMessage} ${clauseCheck.error.suggestion ?? ''}`.trim())
    logger.warn('[analyzeContract] No clauses extracted', { fileName })
  }

  // Risk scoring
  const scorer = await runRiskScorer({
    clauses: extractor.clauses,
    budgetTracker,
    apiKey,
  })

  const document: DocumentSummary = {
    fileName,
    pageCount: extraction.pageCount,
    charCount: extraction.quality.charCount,
    wordCount: extraction.quality.wordCount,
    truncated: budget.truncation?.truncated ?? false,
    warnings,
  }

  const result = buildAnalysisResult(
    scorer.assessments,
    document,
    budgetTracker,
    Date.now() - startedAt
  )

  logger.info('[analyzeContract] Complete', {
    fileName,
    clauseCount: result.clauses.length,
    overallRiskScore: result.overallRiskScore,
    overallRiskLevel: result.overallRiskLevel,
    totalTokens: result.tokenUsage.total.total,
    estimatedCost: result.tokenUsage.total.estimatedCost,
    processingTimeMs: result.processingTimeMs,
  })

  return result
}

/** Aggregates scored clauses into the dashboard result */
export function buildAnalysisResult(
  clauses: ClauseRecord[],
  document: DocumentSummary,
  budgetTracker: BudgetTracker,
  processingTimeMs: number
): AnalysisResult {
  const overallRiskScore = computeOverallRisk(clauses)

  return {
    clauses,
    overallRiskScore,
    overallRiskLevel: getRiskLevel(overallRiskScore),
    highestRiskClause: findHighestRiskClause(clauses),
    riskTypeDistribution: computeRiskTypeDistribution(clauses),
    riskLevelDistribution: computeRiskLevelDistribution(clauses),
    executiveSummary: generateExecutiveSummary(clauses, overallRiskScore),
    document,
    tokenUsage: budgetTracker.getUsage(),
    processingTimeMs,
  }
}
