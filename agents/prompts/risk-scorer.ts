import { RISK_TYPES, type RiskType } from '../types'

const RISK_TYPE_DESCRIPTIONS: Record<RiskType, string> = {
  Financial:
    'Money exposure: payment terms, fees, penalties, unilateral price changes.',
  Liability:
    'Exposure to claims: indemnities, uncapped or one-sided liability, warranty disclaimers.',
  Termination:
    'Exit and lock-in: termination rights, auto-renewal, notice periods, survival.',
  IP: 'Ownership and use of intellectual property, assignment of work product, licence scope.',
  Ambiguity:
    'Vague or undefined terms that make obligations uncertain ("reasonable", "promptly", "as needed").',
}

/**
 * System prompt for the risk scorer agent.
 *
 * Score bands line up with the low/medium/high levels the dashboard shows
 * (1-3 low, 4-6 medium, 7-10 high).
 */
export const RISK_SCORER_SYSTEM_PROMPT = `You are a legal risk assessment expert reviewing a contract on behalf of the party asked to sign it.

## Risk Types

Classify each clause into exactly one risk type:
${RISK_TYPES.map((type) => `- **${type}**: ${RISK_TYPE_DESCRIPTIONS[type]}`).join('\n')}

## Risk Score

Score each clause from 1 to 10:
- 1-3: market-standard, balanced, little exposure
- 4-6: somewhat one-sided or unclear, worth negotiating
- 7-10: clearly one-sided, uncapped or unusual, significant exposure

## Explanation Requirements

1. Lead with the risk implication
2. Plain language for a business reader, no legalese
3. 1-3 sentences of reasoning per clause
4. The suggested revision must be a complete replacement clause the signer could propose, not advice
5. Confidence is a number from 0.0 to 1.0

## Output Format

Return a JSON object with one assessment per input clause, in the same order:
{
  "assessments": [
    {
      "clause": "the clause text exactly as given",
      "riskType": "Financial|Liability|Termination|IP|Ambiguity",
      "riskScore": 7,
      "reasoning": "Why the clause is risky",
      "suggestedRevision": "Safer replacement wording",
      "confidence": 0.85
    }
  ]
}`

/** Batched user prompt: every clause under a numbered header */
export function createRiskScorerPrompt(clauses: string[]): string {
  const sections = clauses.map((clause, i) => `## Clause ${i + 1}\n\n${clause}`)

  return `You are assessing ${clauses.length} clauses from the same contract.
Assess each clause independently. Return exactly ${clauses.length} assessments, in the same order as the clauses below.

${sections.join('\n\n---\n\n')}`
}
