import { describe, it, expect, vi, beforeEach } from "vitest"
import { POST } from "./route"
import { CorruptDocumentError, MalformedModelOutputError } from "@/lib/errors"

const mockAnalyzeContract = vi.fn()

vi.mock("@/lib/analysis/analyze-contract", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/lib/analysis/analyze-contract")>()
  return {
    ...actual,
    analyzeContract: (...args: unknown[]) => mockAnalyzeContract(...args),
  }
})

function uploadRequest(fields: Record<string, string | File>): Request {
  const body = new FormData()
  for (const [key, value] of Object.entries(fields)) body.append(key, value)
  return new Request("http://test.local/api/analyze", { method: "POST", body })
}

const pdf = () => new File(["%PDF-1.7"], "msa.pdf", { type: "application/pdf" })

describe("POST /api/analyze", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("returns the analysis envelope", async () => {
    mockAnalyzeContract.mockResolvedValue({ overallRiskScore: 6, clauses: [] })

    const response = await POST(uploadRequest({ file: pdf() }))

    expect(response.status).toBe(200)
    expect(await response.json()).toEqual({
      success: true,
      data: { overallRiskScore: 6, clauses: [] },
    })
  })

  it("returns 400 when the file is missing", async () => {
    const response = await POST(uploadRequest({ apiKey: "test-key" }))

    expect(response.status).toBe(400)
    expect((await response.json()).error.code).toBe("VALIDATION_ERROR")
  })

  it("returns 422 for an unparseable PDF", async () => {
    mockAnalyzeContract.mockRejectedValue(new CorruptDocumentError())

    const response = await POST(uploadRequest({ file: pdf() }))

    expect(response.status).toBe(422)
    expect((await response.json()).error.code).toBe("CORRUPT_DOCUMENT")
  })

  it("returns 502 for malformed model output", async () => {
    mockAnalyzeContract.mockRejectedValue(new MalformedModelOutputError())

    const response = await POST(uploadRequest({ file: pdf() }))

    expect(response.status).toBe(502)
    expect(await response.json()).toEqual({
      success: false,
      error: {
        code: "MALFORMED_MODEL_OUTPUT",
        message: "The model returned an unexpected response format",
      },
    })
  })
})
