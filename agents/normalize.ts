/**
 * @fileoverview Model output normalization
 *
 * The scorer schema only checks shape. Values the model gets slightly wrong
 * (a score of 11, a confidence of 85, "Indemnity" as a risk type) are mapped
 * onto the fixed ranges here instead of failing the whole analysis.
 *
 * @module agents/normalize
 */

import { logger } from '@/lib/logger'
import {
  RISK_TYPES,
  MIN_RISK_SCORE,
  MAX_RISK_SCORE,
  type ClauseRecord,
  type RawRiskAssessment,
  type RiskType,
} from './types'

const RISK_TYPE_ALIASES: Record<string, RiskType> = {
  'intellectual property': 'IP',
  'intellectual-property': 'IP',
  payment: 'Financial',
  payments: 'Financial',
  fees: 'Financial',
  financial: 'Financial',
  indemnity: 'Liability',
  indemnification: 'Liability',
  liability: 'Liability',
  termination: 'Termination',
  renewal: 'Termination',
  vague: 'Ambiguity',
  unclear: 'Ambiguity',
  ambiguity: 'Ambiguity',
  ambiguous: 'Ambiguity',
}

/** Maps a model label onto the risk taxonomy; unknown labels become Ambiguity */
export function normalizeRiskType(label: string): RiskType {
  const key = label.trim().toLowerCase()

  const exact = RISK_TYPES.find((t) => t.toLowerCase() === key)
  if (exact) return exact

  const alias = RISK_TYPE_ALIASES[key]
  if (alias) return alias

  logger.warn('[normalize] Unknown risk type, using Ambiguity', { label })
  return 'Ambiguity'
}

/** Rounds and clamps into 1-10 */
export function normalizeRiskScore(score: number): number {
  if (!Number.isFinite(score)) return MIN_RISK_SCORE
  return Math.min(MAX_RISK_SCORE, Math.max(MIN_RISK_SCORE, Math.round(score)))
}

/** Reads 1 < value <= 100 as a percentage, then clamps into 0-1 */
export function normalizeConfidence(value: number): number {
  if (!Number.isFinite(value)) return 0
  const ratio = value > 1 && value <= 100 ? value / 100 : value
  return Math.min(1, Math.max(0, ratio))
}

export function normalizeAssessment(
  raw: RawRiskAssessment,
  index: number
): ClauseRecord {
  return {
    id: `clause-${index + 1}`,
    clauseText: raw.clause.trim(),
    riskType: normalizeRiskType(raw.riskType),
    riskScore: normalizeRiskScore(raw.riskScore),
    reasoning: raw.reasoning.trim(),
    suggestedRevision: raw.suggestedRevision.trim(),
    confidence: normalizeConfidence(raw.confidence),
  }
}

/**
 * Cleans the extractor's clause list: trims entries, drops blanks and
 * removes duplicates that differ only in whitespace. First occurrence wins.
 */
export function dedupeClauses(clauses: string[]): string[] {
  const seen = new Set<string>()
  const result: string[] = []

  for (const clause of clauses) {
    const trimmed = clause.trim()
    if (!trimmed) continue

    const key = trimmed.replace(/\s+/g, ' ')
    if (seen.has(key)) continue

    seen.add(key)
    result.push(trimmed)
  }

  return result
}
