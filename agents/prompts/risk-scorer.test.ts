import { describe, it, expect } from 'vitest'
import { RISK_SCORER_SYSTEM_PROMPT, createRiskScorerPrompt } from './risk-scorer'
import { RISK_TYPES } from '../types'

describe('RISK_SCORER_SYSTEM_PROMPT', () => {
  it('describes every risk type', () => {
    for (const type of RISK_TYPES) {
      expect(RISK_SCORER_SYSTEM_PROMPT).toContain(`- **${type}**:`)
    }
  })

  it('defines the score bands', () => {
    expect(RISK_SCORER_SYSTEM_PROMPT).toContain('- 1-3:')
    expect(RISK_SCORER_SYSTEM_PROMPT).toContain('- 4-6:')
    expect(RISK_SCORER_SYSTEM_PROMPT).toContain('- 7-10:')
  })

  it('requests JSON output format', () => {
    expect(RISK_SCORER_SYSTEM_PROMPT).toContain('"assessments"')
    expect(RISK_SCORER_SYSTEM_PROMPT).toContain('"suggestedRevision"')
    expect(RISK_SCORER_SYSTEM_PROMPT).toContain('"confidence"')
  })
})

describe('createRiskScorerPrompt', () => {
  it('numbers clauses and states the expected count', () => {
    const prompt = createRiskScorerPrompt([
      'Customer pays a 5% late fee per week.',
      'Vendor may terminate at any time without notice.',
    ])

    expect(prompt).toContain('Return exactly 2 assessments')
    expect(prompt).toContain('## Clause 1\n\nCustomer pays a 5% late fee per week.')
    expect(prompt).toContain(
      '---\n\n## Clause 2\n\nVendor may terminate at any time without notice.'
    )
  })
})
