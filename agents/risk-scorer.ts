/**
 * @fileoverview Risk Scorer Agent
 *
 * Second stage of the contract analysis pipeline. Scores every extracted
 * clause in one batched model call: risk type, 1-10 score, reasoning, a safer
 * rewrite and a confidence.
 *
 * The schema checks structure only. Scores, confidences and risk-type labels
 * are normalized afterwards (see ./normalize).
 *
 * @module agents/risk-scorer
 */

import { generateText, Output, NoObjectGeneratedError } from 'ai'
import { getAgentModel, GENERATION_CONFIG } from '@/lib/ai/config'
import { toModelError } from '@/lib/ai/errors'
import type { BudgetTracker } from '@/lib/ai/budget'
import { MalformedModelOutputError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { batchedRiskAssessmentOutputSchema, type ClauseRecord } from './types'
import { normalizeAssessment } from './normalize'
import { RISK_SCORER_SYSTEM_PROMPT, createRiskScorerPrompt } from './prompts'

// ============================================================================
// Types
// ============================================================================

export interface RiskScorerInput {
  clauses: string[]
  budgetTracker: BudgetTracker
  apiKey?: string | null
}

export interface RiskScorerOutput {
  /** Model order */
  assessments: ClauseRecord[]
  tokenUsage: { inputTokens: number; outputTokens: number }
}

// ============================================================================
// Risk Scorer Agent
// ============================================================================

/**
 * Runs the risk scorer agent over all clauses in a single call.
 *
 * No clauses means no model call.
 *
 * @throws MalformedModelOutputError - response did not match the schema
 * @throws InvalidApiKeyError | RateLimitError | LlmFailedError - provider failure
 */
export async function runRiskScorer(
  input: RiskScorerInput
): Promise<RiskScorerOutput> {
  const { clauses, budgetTracker, apiKey } = input

  if (clauses.length === 0) {
    budgetTracker.record('riskScorer', 0, 0)
    return { assessments: [], tokenUsage: { inputTokens: 0, outputTokens: 0 } }
  }

  let result
  try {
    result = await generateText({
      model: getAgentModel('riskScorer', apiKey),
      system: RISK_SCORER_SYSTEM_PROMPT,
      prompt: createRiskScorerPrompt(clauses),
      output: Output.object({ schema: batchedRiskAssessmentOutputSchema }),
      ...GENERATION_CONFIG,
    })
  } catch (error) {
    if (NoObjectGeneratedError.isInstance(error)) {
      budgetTracker.record(
        'riskScorer',
        error.usage?.inputTokens ?? 0,
        error.usage?.outputTokens ?? 0
      )
      logger.error('[RiskScorer] Batched assessment did not match schema', {
        clauseCount: clauses.length,
        cause: String(error.cause),
        text: error.text?.slice(0, 500),
      })
      throw new MalformedModelOutputError(
        `Risk scoring returned an unexpected format for ${clauses.length} clauses`,
        [{ field: 'assessments', message: error.text?.slice(0, 200) ?? 'empty output' }]
      )
    }
    throw toModelError(error, 'RiskScorer')
  }

  const { output, usage } = result
  const inputTokens = usage?.inputTokens ?? 0
  const outputTokens = usage?.outputTokens ?? 0
  budgetTracker.record('riskScorer', inputTokens, outputTokens)

  if (output.assessments.length !== clauses.length) {
    logger.warn('[RiskScorer] Assessment count differs from clause count', {
      expected: clauses.length,
      got: output.assessments.length,
    })
  }

  const assessments = output.assessments.map((raw, i) => normalizeAssessment(raw, i))

  return {
    assessments,
    tokenUsage: { inputTokens, outputTokens },
  }
}
