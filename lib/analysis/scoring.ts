/**
 * @fileoverview Aggregate risk metrics
 *
 * Pure functions over normalized clause records. Everything the dashboard
 * shows beyond the per-clause cards is computed here.
 *
 * @module lib/analysis/scoring
 */

import {
  RISK_LEVELS,
  RISK_TYPES,
  type ClauseRecord,
  type RiskLevel,
  type RiskType,
} from '@/agents/types'

/** Lower bounds of the medium and high bands */
export const RISK_LEVEL_THRESHOLDS = {
  medium: 4,
  high: 7,
} as const

const LEVEL_LABELS: Record<RiskLevel, string> = {
  low: 'Low',
  medium: 'Medium',
  high: 'High',
}

/** Band for a clause score or the aggregate */
export function getRiskLevel(score: number): RiskLevel {
  if (score >= RISK_LEVEL_THRESHOLDS.high) return 'high'
  if (score >= RISK_LEVEL_THRESHOLDS.medium) return 'medium'
  return 'low'
}

/** Mean clause score rounded to 2 decimals; 0 when there are no clauses */
export function computeOverallRisk(clauses: ClauseRecord[]): number {
  if (clauses.length === 0) return 0

  const total = clauses.reduce((sum, c) => sum + c.riskScore, 0)
  return Math.round((total / clauses.length) * 100) / 100
}

/** First clause with the maximum score, or null */
export function findHighestRiskClause(
  clauses: ClauseRecord[]
): ClauseRecord | null {
  let highest: ClauseRecord | null = null
  for (const clause of clauses) {
    if (highest === null || clause.riskScore > highest.riskScore) {
      highest = clause
    }
  }
  return highest
}

export function computeRiskTypeDistribution(
  clauses: ClauseRecord[]
): Record<RiskType, number> {
  const distribution: Record<RiskType, number> = {
    Financial: 0,
    Liability: 0,
    Termination: 0,
    IP: 0,
    Ambiguity: 0,
  }
  for (const clause of clauses) {
    distribution[clause.riskType]++
  }
  return distribution
}

export function computeRiskLevelDistribution(
  clauses: ClauseRecord[]
): Record<RiskLevel, number> {
  const distribution: Record<RiskLevel, number> = { low: 0, medium: 0, high: 0 }
  for (const clause of clauses) {
    distribution[getRiskLevel(clause.riskScore)]++
  }
  return distribution
}

/** Highest score first; ties keep model order */
export function sortByRisk(clauses: ClauseRecord[]): ClauseRecord[] {
  return [...clauses].sort((a, b) => b.riskScore - a.riskScore)
}

/**
 * Plain-text summary for the dashboard header.
 *
 * Format: "Overall Risk: {Level} ({score}/10). {N} clauses analyzed: {counts}."
 * followed by up to five key findings from medium and high risk clauses.
 */
export function generateExecutiveSummary(
  clauses: ClauseRecord[],
  overallScore: number = computeOverallRisk(clauses)
): string {
  const level = LEVEL_LABELS[getRiskLevel(overallScore)]
  const header = `Overall Risk: ${level} (${overallScore.toFixed(2)}/10).`

  if (clauses.length === 0) {
    return `${header} No clauses analyzed.`
  }

  const levels = computeRiskLevelDistribution(clauses)
  const counts = [...RISK_LEVELS]
    .reverse()
    .filter((l) => levels[l] > 0)
    .map((l) => `${levels[l]} ${l}`)
    .join(', ')

  const noun = clauses.length === 1 ? 'clause' : 'clauses'
  let summary = `${header} ${clauses.length} ${noun} analyzed: ${counts}.`

  const keyFindings = sortByRisk(clauses)
    .filter((c) => getRiskLevel(c.riskScore) !== 'low')
    .slice(0, 5)

  if (keyFindings.length > 0) {
    summary += '\n\nKey Findings:\n'
    summary += keyFindings
      .map((c, i) => `${i + 1}. ${c.riskType} (${c.riskScore}/10): ${c.reasoning}`)
      .join('\n')
  }

  return summary
}

/** Risk types in display order with their counts, most frequent first */
export function rankRiskTypes(
  distribution: Record<RiskType, number>
): Array<{ riskType: RiskType; count: number }> {
  return RISK_TYPES.map((riskType) => ({ riskType, count: distribution[riskType] }))
    .sort((a, b) => b.count - a.count)
}
