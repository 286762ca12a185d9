import { generateText } from 'ai'
import type { ConnectionCheck } from '@/agents/types'
import { getAgentModel, resolveAgentModelId } from '@/lib/ai/config'
import { toModelError } from '@/lib/ai/errors'
import { logger } from '@/lib/logger'

const PING_PROMPT = 'Reply with the single word OK.'

/**
 * Sends a one-line prompt to the extractor model to confirm the key and the
 * gateway work before a full analysis is attempted.
 *
 * @throws ConfigurationError | InvalidApiKeyError | RateLimitError | LlmFailedError
 */
export async function testModelConnection(
  apiKey?: string | null
): Promise<ConnectionCheck> {
  const modelId = resolveAgentModelId('clauseExtractor')
  const startedAt = Date.now()

  let text: string
  try {
    const result = await generateText({
      model: getAgentModel('clauseExtractor', apiKey),
      prompt: PING_PROMPT,
      temperature: 0,
      maxOutputTokens: 16,
    })
    text = result.text
  } catch (error) {
    throw toModelError(error, 'ConnectionTest')
  }

  const latencyMs = Date.now() - startedAt
  logger.info('[testModelConnection] OK', { modelId, latencyMs })

  return { modelId, reply: text.trim(), latencyMs }
}
