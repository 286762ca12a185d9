import { createGateway } from 'ai'
import { serverEnv, requireGatewayApiKey } from '@/lib/env'

/** Available models via Vercel AI Gateway */
export const MODELS = {
  fast: 'anthropic/claude-haiku-4.5',
  balanced: 'anthropic/claude-sonnet-4',
  best: 'anthropic/claude-sonnet-4.5',
} as const

export type ModelTier = keyof typeof MODELS

/** Per-agent model configuration */
export const AGENT_MODELS = {
  clauseExtractor: MODELS.fast,
  riskScorer: MODELS.best,
} as const

export type AgentType = keyof typeof AGENT_MODELS

/** Model id for an agent, honouring RISKLENS_*_MODEL overrides */
export function resolveAgentModelId(agent: AgentType): string {
  const env = serverEnv()
  const override =
    agent === 'clauseExtractor'
      ? env.RISKLENS_EXTRACTOR_MODEL
      : env.RISKLENS_SCORER_MODEL
  return override ?? AGENT_MODELS[agent]
}

/**
 * Get model instance for an agent.
 *
 * A gateway provider is created per call so a key typed into the UI never
 * leaks into another request.
 *
 * @throws ConfigurationError - no key in the request or the environment
 */
export function getAgentModel(agent: AgentType, apiKey?: string | null) {
  const gateway = createGateway({ apiKey: requireGatewayApiKey(apiKey) })
  return gateway(resolveAgentModelId(agent))
}

/** Default generation config */
export const GENERATION_CONFIG = {
  temperature: 0,
  maxOutputTokens: 8192,
} as const
