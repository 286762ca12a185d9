import { z } from 'zod'

// ============================================================================
// Risk Types
// ============================================================================

/** Fixed clause risk taxonomy */
export const RISK_TYPES = [
  'Financial',
  'Liability',
  'Termination',
  'IP',
  'Ambiguity',
] as const

export type RiskType = (typeof RISK_TYPES)[number]

export const riskTypeSchema = z.enum(RISK_TYPES)

// ============================================================================
// Risk Levels
// ============================================================================

/** Score bands: low < 4 <= medium < 7 <= high */
export const RISK_LEVELS = ['low', 'medium', 'high'] as const

export type RiskLevel = (typeof RISK_LEVELS)[number]

export const MIN_RISK_SCORE = 1
export const MAX_RISK_SCORE = 10

// ============================================================================
// Model Output Schemas
// ============================================================================

/**
 * Clause extraction output. The model lists clauses verbatim; cleanup
 * (blank entries, duplicates) happens after parsing.
 */
export const extractedClausesSchema = z.object({
  clauses: z
    .array(z.string())
    .describe('Legally significant clauses quoted verbatim from the contract'),
})

export type ExtractedClausesOutput = z.infer<typeof extractedClausesSchema>

/**
 * One assessment as the model returns it.
 *
 * Only the shape is enforced here. Labels and ranges are loose on purpose
 * and get normalized by {@link normalizeAssessment}.
 */
export const rawRiskAssessmentSchema = z.object({
  clause: z.string().describe('The clause text exactly as given'),
  riskType: z
    .string()
    .describe('One of: Financial, Liability, Termination, IP, Ambiguity'),
  riskScore: z.number().describe('Integer 1-10, 10 being the most dangerous'),
  reasoning: z
    .string()
    .describe('Why this clause carries risk, in 1-3 plain sentences'),
  suggestedRevision: z
    .string()
    .describe('A safer rewrite of the clause the signer could propose'),
  confidence: z.number().describe('Float 0.0-1.0, how sure the assessment is'),
})

export type RawRiskAssessment = z.infer<typeof rawRiskAssessmentSchema>

/** Batched risk assessment output: one entry per input clause, same order */
export const batchedRiskAssessmentOutputSchema = z.object({
  assessments: z
    .array(rawRiskAssessmentSchema)
    .describe('One risk assessment per input clause, in the same order'),
})

export type BatchedRiskAssessmentOutput = z.infer<
  typeof batchedRiskAssessmentOutputSchema
>

// ============================================================================
// Analysis Records
// ============================================================================

/** A scored clause after normalization */
export interface ClauseRecord {
  /** `clause-<n>`, 1-based, in model order */
  id: string
  clauseText: string
  riskType: RiskType
  /** Integer 1-10 */
  riskScore: number
  reasoning: string
  suggestedRevision: string
  /** 0-1 */
  confidence: number
}

export interface DocumentSummary {
  fileName: string
  pageCount: number
  charCount: number
  wordCount: number
  /** Text was cut to the token budget before analysis */
  truncated: boolean
  warnings: string[]
}

export interface UsageSummary {
  input: number
  output: number
  total: number
  estimatedCost: number
}

export interface AnalysisTokenUsage {
  byAgent: Record<string, UsageSummary>
  total: UsageSummary
}

export interface AnalysisResult {
  /** Model order */
  clauses: ClauseRecord[]
  overallRiskScore: number
  overallRiskLevel: RiskLevel
  highestRiskClause: ClauseRecord | null
  riskTypeDistribution: Record<RiskType, number>
  riskLevelDistribution: Record<RiskLevel, number>
  executiveSummary: string
  document: DocumentSummary
  tokenUsage: AnalysisTokenUsage
  processingTimeMs: number
}

/** Result of the "Test connection" check */
export interface ConnectionCheck {
  modelId: string
  reply: string
  latencyMs: number
}
