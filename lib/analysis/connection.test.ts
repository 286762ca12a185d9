import { describe, it, expect, vi, beforeEach } from 'vitest'
import { APICallError, generateText } from 'ai'
import { testModelConnection } from './connection'
import { mockGenerateText } from '@/agents/testing/mock-ai'
import { InvalidApiKeyError } from '@/lib/errors'

vi.mock('ai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('ai')>()
  return {
    ...actual,
    generateText: vi.fn(),
  }
})

vi.mock('@/lib/ai/config', () => ({
  getAgentModel: vi.fn().mockReturnValue({}),
  resolveAgentModelId: vi.fn().mockReturnValue('anthropic/claude-haiku-4.5'),
}))

describe('testModelConnection', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('returns the model id and trimmed reply', async () => {
    vi.mocked(generateText).mockResolvedValue(
      mockGenerateText(' OK\n') as unknown as Awaited<ReturnType<typeof generateText>>
    )

    const result = await testModelConnection('test-key')

    expect(result.modelId).toBe('anthropic/claude-haiku-4.5')
    expect(result.reply).toBe('OK')
    expect(result.latencyMs).toBeGreaterThanOrEqual(0)
  })

  it('uses the supplied key', async () => {
    const { getAgentModel } = await import('@/lib/ai/config')
    vi.mocked(generateText).mockResolvedValue(
      mockGenerateText('OK') as unknown as Awaited<ReturnType<typeof generateText>>
    )

    await testModelConnection('test-key')

    expect(getAgentModel).toHaveBeenCalledWith('clauseExtractor', 'test-key')
  })

  it('maps a rejected key to InvalidApiKeyError', async () => {
    vi.mocked(generateText).mockRejectedValue(
      new APICallError({
        message: 'Unauthorized',
        url: 'https://gateway.test/v1/chat',
        requestBodyValues: {},
        statusCode: 401,
      })
    )

    await expect(testModelConnection('test-key')).rejects.toBeInstanceOf(InvalidApiKeyError)
  })
})
