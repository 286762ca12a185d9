import type { ClauseRecord, RawRiskAssessment } from '../types'

// ============================================================================
// Sample Clause Text
// ============================================================================

export const SAMPLE_LATE_FEE_CLAUSE =
  'Any amount not paid when due shall bear a late fee of five percent (5%) ' +
  'of the outstanding balance for each week the amount remains unpaid.'

export const SAMPLE_AUTO_RENEWAL_CLAUSE =
  'This Agreement shall automatically renew for successive one (1) year terms ' +
  'unless either party gives written notice of non-renewal at least ninety (90) days before expiry.'

export const SAMPLE_IP_ASSIGNMENT_CLAUSE =
  'Contractor hereby assigns to Company all right, title and interest in any work product, ' +
  'including pre-existing materials incorporated therein, throughout the world in perpetuity.'

export const SAMPLE_CLAUSES = [
  SAMPLE_LATE_FEE_CLAUSE,
  SAMPLE_AUTO_RENEWAL_CLAUSE,
  SAMPLE_IP_ASSIGNMENT_CLAUSE,
]

// ============================================================================
// Sample Model Output
// ============================================================================

/** Scorer output as the model might return it, including values to normalize */
export const SAMPLE_RAW_ASSESSMENTS: RawRiskAssessment[] = [
  {
    clause: SAMPLE_LATE_FEE_CLAUSE,
    riskType: 'Financial',
    riskScore: 8,
    reasoning: 'A weekly 5% late fee compounds to an extreme penalty.',
    suggestedRevision:
      'Overdue amounts accrue interest at 1% per month or the maximum lawful rate, whichever is lower.',
    confidence: 0.9,
  },
  {
    clause: SAMPLE_AUTO_RENEWAL_CLAUSE,
    riskType: 'Renewal',
    riskScore: 4.4,
    reasoning: 'A 90-day notice window makes it easy to miss the opt-out date.',
    suggestedRevision:
      'This Agreement renews for one (1) year terms unless either party gives thirty (30) days written notice.',
    confidence: 72,
  },
  {
    clause: SAMPLE_IP_ASSIGNMENT_CLAUSE,
    riskType: 'intellectual property',
    riskScore: 11,
    reasoning: 'Assigning pre-existing materials transfers IP the contractor already owned.',
    suggestedRevision:
      'Contractor assigns to Company all rights in work product created under this Agreement, excluding pre-existing materials, which are licensed non-exclusively.',
    confidence: 0.95,
  },
]

// ============================================================================
// Sample Clause Records
// ============================================================================

export function createClauseRecord(
  overrides: Partial<ClauseRecord> = {}
): ClauseRecord {
  return {
    id: 'clause-1',
    clauseText: SAMPLE_LATE_FEE_CLAUSE,
    riskType: 'Financial',
    riskScore: 5,
    reasoning: 'Late fee is above market rate.',
    suggestedRevision: 'Late payments accrue 1% interest per month.',
    confidence: 0.8,
    ...overrides,
  }
}
