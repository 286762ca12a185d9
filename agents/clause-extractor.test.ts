import { describe, it, expect, vi, beforeEach } from 'vitest'
import { APICallError } from 'ai'
import { runClauseExtractor } from './clause-extractor'
import { BudgetTracker } from '@/lib/ai/budget'
import { InvalidApiKeyError, MalformedModelOutputError } from '@/lib/errors'

vi.mock('ai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ai')>()
  return {
    ...actual,
    generateText: vi.fn(),
    Output: {
      object: vi.fn().mockReturnValue({}),
    },
    NoObjectGeneratedError: {
      isInstance: vi.fn().mockReturnValue(false),
    },
  }
})

vi.mock('@/lib/ai/config', () => ({
  getAgentModel: vi.fn().mockReturnValue({}),
  GENERATION_CONFIG: { temperature: 0, maxOutputTokens: 8192 },
}))

const CONTRACT =
  '1. Fees. Customer shall pay a late fee of 5% per week on overdue invoices.\n\n' +
  '2. Term. This Agreement renews automatically for successive one-year terms.'

describe('Clause Extractor Agent', () => {
  let budgetTracker: BudgetTracker

  beforeEach(async () => {
    vi.clearAllMocks()
    budgetTracker = new BudgetTracker()

    const { generateText, NoObjectGeneratedError } = await import('ai')
    vi.mocked(NoObjectGeneratedError.isInstance).mockReturnValue(false)
    vi.mocked(generateText).mockResolvedValue({
      output: {
        clauses: [
          'Customer shall pay a late fee of 5% per week on overdue invoices.',
          'This Agreement renews automatically for successive one-year terms.',
        ],
      },
      usage: { inputTokens: 1200, outputTokens: 150 },
    } as unknown as Awaited<ReturnType<typeof generateText>>)
  })

  it('returns the extracted clauses', async () => {
    const result = await runClauseExtractor({ text: CONTRACT, budgetTracker })

    expect(result.clauses).toEqual([
      'Customer shall pay a late fee of 5% per week on overdue invoices.',
      'This Agreement renews automatically for successive one-year terms.',
    ])
    expect(result.tokenUsage).toEqual({ inputTokens: 1200, outputTokens: 150 })
  })

  it('records token usage', async () => {
    await runClauseExtractor({ text: CONTRACT, budgetTracker })

    const usage = budgetTracker.getUsage()
    expect(usage.byAgent['clauseExtractor'].input).toBe(1200)
    expect(usage.byAgent['clauseExtractor'].output).toBe(150)
  })

  it('passes the contract text and a per-request key', async () => {
    const { generateText } = await import('ai')
    const { getAgentModel } = await import('@/lib/ai/config')

    await runClauseExtractor({ text: CONTRACT, budgetTracker, apiKey: 'test-key' })

    expect(getAgentModel).toHaveBeenCalledWith('clauseExtractor', 'test-key')
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        prompt: expect.stringContaining(CONTRACT),
        temperature: 0,
      })
    )
  })

  it('drops blank and duplicate clauses', async () => {
    const { generateText } = await import('ai')
    vi.mocked(generateText).mockResolvedValue({
      output: {
        clauses: ['Fees are non-refundable.', '', 'Fees  are\nnon-refundable.'],
      },
      usage: { inputTokens: 100, outputTokens: 20 },
    } as unknown as Awaited<ReturnType<typeof generateText>>)

    const result = await runClauseExtractor({ text: CONTRACT, budgetTracker })

    expect(result.clauses).toEqual(['Fees are non-refundable.'])
  })

  it('throws MalformedModelOutputError when output does not match the schema', async () => {
    const { generateText, NoObjectGeneratedError } = await import('ai')
    vi.mocked(NoObjectGeneratedError.isInstance).mockReturnValue(true)
    vi.mocked(generateText).mockRejectedValue({
      text: '{"clauses": "not a list"}',
      usage: { inputTokens: 900, outputTokens: 10 },
      cause: new Error('Type validation failed'),
    })

    await expect(
      runClauseExtractor({ text: CONTRACT, budgetTracker })
    ).rejects.toBeInstanceOf(MalformedModelOutputError)
    expect(budgetTracker.getUsage().byAgent['clauseExtractor'].input).toBe(900)
  })

  it('maps a rejected key to InvalidApiKeyError', async () => {
    const { generateText } = await import('ai')
    vi.mocked(generateText).mockRejectedValue(
      new APICallError({
        message: 'Unauthorized',
        url: 'https://gateway.test/v1/chat',
        requestBodyValues: {},
        statusCode: 401,
      })
    )

    await expect(
      runClauseExtractor({ text: CONTRACT, budgetTracker })
    ).rejects.toBeInstanceOf(InvalidApiKeyError)
  })
})
