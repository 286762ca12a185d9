import type { AnalysisTokenUsage, UsageSummary } from '@/agents/types'

/** USD per 1M tokens; the scorer's rates, used for both calls as an upper bound */
const PRICING = {
  input: 3.00,
  output: 15.00,
} as const

const EMPTY_USAGE: UsageSummary = { input: 0, output: 0, total: 0, estimatedCost: 0 }

/**
 * Token and cost ledger for one contract analysis.
 *
 * Agents record every call, including failed ones that still reported usage;
 * the totals end up in `AnalysisResult.tokenUsage`.
 */
export class BudgetTracker {
  private usage = new Map<string, UsageSummary>()

  record(agent: string, input: number, output: number): void {
    const existing = this.usage.get(agent) ?? EMPTY_USAGE

    this.usage.set(agent, {
      input: existing.input + input,
      output: existing.output + output,
      total: existing.total + input + output,
      estimatedCost: existing.estimatedCost + estimateCost(input, output),
    })
  }

  getUsage(): AnalysisTokenUsage {
    const entries = Array.from(this.usage.values())
    const sum = (pick: (u: UsageSummary) => number) =>
      entries.reduce((acc, u) => acc + pick(u), 0)

    return {
      byAgent: Object.fromEntries(this.usage),
      total: {
        input: sum((u) => u.input),
        output: sum((u) => u.output),
        total: sum((u) => u.total),
        estimatedCost: sum((u) => u.estimatedCost),
      },
    }
  }
}

/** Cost of one call in USD, rounded to 4 decimals */
export function estimateCost(input: number, output: number): number {
  const cost = (input / 1_000_000) * PRICING.input + (output / 1_000_000) * PRICING.output
  return Math.round(cost * 10000) / 10000
}
