import { describe, it, expect, vi, beforeEach } from 'vitest'
import { extractPdf } from './pdf-extractor'
import { CorruptDocumentError, EncryptedDocumentError } from '@/lib/errors'
import { logger } from '@/lib/logger'

const destroy = vi.fn().mockResolvedValue(undefined)

vi.mock('unpdf', () => ({
  getDocumentProxy: vi.fn(),
  extractText: vi.fn(),
  getMeta: vi.fn(),
}))

const CONTRACT_TEXT =
  'MASTER SERVICES AGREEMENT\n\n1. Fees. Customer shall pay all invoices within fifteen (15) days of receipt.'

describe('extractPdf', () => {
  beforeEach(async () => {
    vi.clearAllMocks()
    const unpdf = await import('unpdf')
    vi.mocked(unpdf.getDocumentProxy).mockResolvedValue(
      { destroy } as unknown as Awaited<ReturnType<typeof unpdf.getDocumentProxy>>
    )
    vi.mocked(unpdf.extractText).mockResolvedValue({ totalPages: 3, text: CONTRACT_TEXT })
    vi.mocked(unpdf.getMeta).mockResolvedValue({
      info: { Title: 'MSA', Author: 'Legal', CreationDate: 'D:20240101' },
      metadata: {},
    } as unknown as Awaited<ReturnType<typeof unpdf.getMeta>>)
  })

  it('returns merged text, page count and metadata', async () => {
    const result = await extractPdf(Buffer.from('%PDF-1.7 fake'))

    expect(result.text).toBe(CONTRACT_TEXT)
    expect(result.pageCount).toBe(3)
    expect(result.quality.pageCount).toBe(3)
    expect(result.quality.charCount).toBe(CONTRACT_TEXT.length)
    expect(result.metadata).toEqual({
      title: 'MSA',
      author: 'Legal',
      creationDate: 'D:20240101',
      modificationDate: undefined,
    })
    expect(destroy).toHaveBeenCalledTimes(1)
  })

  it('NFC-normalizes extracted text', async () => {
    const unpdf = await import('unpdf')
    // "é" as e + combining acute accent
    vi.mocked(unpdf.extractText).mockResolvedValue({ totalPages: 1, text: 'Cafe\u0301 lease' })

    const result = await extractPdf(Buffer.from('%PDF'))

    expect(result.text).toBe('Caf\u00e9 lease')
  })

  it('keeps the text when metadata cannot be read', async () => {
    const unpdf = await import('unpdf')
    vi.mocked(unpdf.getMeta).mockRejectedValue(new Error('bad info dict'))

    const result = await extractPdf(Buffer.from('%PDF'))

    expect(result.text).toBe(CONTRACT_TEXT)
    expect(result.metadata).toEqual({})
    expect(logger.warn).toHaveBeenCalledWith('[extractPdf] Metadata unavailable', {
      message: 'bad info dict',
    })
    expect(destroy).toHaveBeenCalledTimes(1)
  })

  it('releases the document when text extraction fails', async () => {
    const unpdf = await import('unpdf')
    vi.mocked(unpdf.extractText).mockRejectedValue(new Error('Invalid PDF structure.'))

    await expect(extractPdf(Buffer.from('%PDF'))).rejects.toBeInstanceOf(CorruptDocumentError)
    expect(destroy).toHaveBeenCalledTimes(1)
  })

  it('maps password errors to EncryptedDocumentError', async () => {
    const unpdf = await import('unpdf')
    const error = new Error('No password given')
    error.name = 'PasswordException'
    vi.mocked(unpdf.getDocumentProxy).mockRejectedValue(error)

    await expect(extractPdf(Buffer.from('%PDF'))).rejects.toBeInstanceOf(EncryptedDocumentError)
  })

  it('maps invalid PDF structure to CorruptDocumentError', async () => {
    const unpdf = await import('unpdf')
    vi.mocked(unpdf.getDocumentProxy).mockRejectedValue(new Error('Invalid PDF structure.'))

    await expect(extractPdf(Buffer.from('hello'))).rejects.toBeInstanceOf(CorruptDocumentError)
  })

  it('re-throws unknown errors unchanged', async () => {
    const unpdf = await import('unpdf')
    const boom = new Error('worker crashed')
    vi.mocked(unpdf.getDocumentProxy).mockRejectedValue(boom)

    await expect(extractPdf(Buffer.from('%PDF'))).rejects.toBe(boom)
  })
})
