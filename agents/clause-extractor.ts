/**
 * @fileoverview Clause Extractor Agent
 *
 * First stage of the contract analysis pipeline. Asks the model to list the
 * risk-bearing clauses of the contract verbatim, without scoring them.
 *
 * @module agents/clause-extractor
 */

import { generateText, Output, NoObjectGeneratedError } from 'ai'
import { getAgentModel, GENERATION_CONFIG } from '@/lib/ai/config'
import { toModelError } from '@/lib/ai/errors'
import type { BudgetTracker } from '@/lib/ai/budget'
import { MalformedModelOutputError } from '@/lib/errors'
import { logger } from '@/lib/logger'
import { extractedClausesSchema } from './types'
import { dedupeClauses } from './normalize'
import {
  CLAUSE_EXTRACTOR_SYSTEM_PROMPT,
  createClauseExtractorPrompt,
} from './prompts'

// ============================================================================
// Types
// ============================================================================

export interface ClauseExtractorInput {
  text: string
  budgetTracker: BudgetTracker
  /** Per-request gateway key; falls back to AI_GATEWAY_API_KEY */
  apiKey?: string | null
  /** Contract text was cut to the token budget */
  truncated?: boolean
}

export interface ClauseExtractorOutput {
  clauses: string[]
  tokenUsage: { inputTokens: number; outputTokens: number }
}

// ============================================================================
// Clause Extractor Agent
// ============================================================================

/**
 * Runs the clause extractor agent.
 *
 * @throws MalformedModelOutputError - response did not match the schema
 * @throws InvalidApiKeyError | RateLimitError | LlmFailedError - provider failure
 */
export async function runClauseExtractor(
  input: ClauseExtractorInput
): Promise<ClauseExtractorOutput> {
  const { text, budgetTracker, apiKey, truncated = false } = input

  let result
  try {
    result = await generateText({
      model: getAgentModel('clauseExtractor', apiKey),
      system: CLAUSE_EXTRACTOR_SYSTEM_PROMPT,
      prompt: createClauseExtractorPrompt(text, { truncated }),
      output: Output.object({ schema: extractedClausesSchema }),
      ...GENERATION_CONFIG,
    })
  } catch (error) {
    if (NoObjectGeneratedError.isInstance(error)) {
      budgetTracker.record(
        'clauseExtractor',
        error.usage?.inputTokens ?? 0,
        error.usage?.outputTokens ?? 0
      )
      logger.error('[ClauseExtractor] Output did not match schema', {
        cause: String(error.cause),
        text: error.text?.slice(0, 500),
      })
      throw new MalformedModelOutputError(
        'Clause extraction returned an unexpected format',
        [{ field: 'clauses', message: error.text?.slice(0, 200) ?? 'empty output' }]
      )
    }
    throw toModelError(error, 'ClauseExtractor')
  }

  const { output, usage } = result
  const inputTokens = usage?.inputTokens ?? 0
  const outputTokens = usage?.outputTokens ?? 0
  budgetTracker.record('clauseExtractor', inputTokens, outputTokens)

  const clauses = dedupeClauses(output.clauses)

  if (clauses.length < output.clauses.length) {
    logger.info('[ClauseExtractor] Dropped blank or duplicate clauses', {
      returned: output.clauses.length,
      kept: clauses.length,
    })
  }

  return {
    clauses,
    tokenUsage: { inputTokens, outputTokens },
  }
}
