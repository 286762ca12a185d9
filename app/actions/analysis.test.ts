import { describe, it, expect, vi, beforeEach } from "vitest"
import { analyzeContractAction, testConnectionAction } from "./analysis"
import { createClauseRecord } from "@/agents/testing/fixtures"
import { buildAnalysisResult } from "@/lib/analysis/analyze-contract"
import { BudgetTracker } from "@/lib/ai/budget"
import {
  CorruptDocumentError,
  EmptyDocumentError,
  MalformedModelOutputError,
} from "@/lib/errors"
import { logger } from "@/lib/logger"

const mockAnalyzeContract = vi.fn()
const mockTestModelConnection = vi.fn()

vi.mock("@/lib/analysis/analyze-contract", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/lib/analysis/analyze-contract")>()
  return {
    ...actual,
    analyzeContract: (...args: unknown[]) => mockAnalyzeContract(...args),
  }
})

vi.mock("@/lib/analysis/connection", () => ({
  testModelConnection: (...args: unknown[]) => mockTestModelConnection(...args),
}))

function pdfForm(apiKey?: string): FormData {
  const formData = new FormData()
  formData.append("file", new File(["%PDF-1.7"], "lease.pdf", { type: "application/pdf" }))
  if (apiKey !== undefined) formData.append("apiKey", apiKey)
  return formData
}

describe("analyzeContractAction", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("returns the analysis in a success envelope", async () => {
    const analysis = buildAnalysisResult(
      [
        createClauseRecord({ id: "clause-1", riskScore: 8 }),
        createClauseRecord({ id: "clause-2", riskScore: 4 }),
      ],
      {
        fileName: "lease.pdf",
        pageCount: 2,
        charCount: 100,
        wordCount: 20,
        truncated: false,
        warnings: [],
      },
      new BudgetTracker(),
      1200
    )
    mockAnalyzeContract.mockResolvedValue(analysis)

    const result = await analyzeContractAction(pdfForm("test-key"))

    expect(result).toEqual({ success: true, data: analysis })
    expect(analysis.overallRiskScore).toBe(6)
    expect(mockAnalyzeContract).toHaveBeenCalledWith(
      expect.objectContaining({
        fileName: "lease.pdf",
        mimeType: "application/pdf",
        apiKey: "test-key",
      })
    )
  })

  it("returns a validation envelope when no file is attached", async () => {
    const result = await analyzeContractAction(new FormData())

    expect(result).toEqual({
      success: false,
      error: {
        code: "VALIDATION_ERROR",
        message: "No file provided",
        details: [{ field: "file", message: "Choose a PDF to analyze" }],
      },
    })
    expect(mockAnalyzeContract).not.toHaveBeenCalled()
  })

  it("returns an error envelope for an unparseable PDF instead of throwing", async () => {
    mockAnalyzeContract.mockRejectedValue(new CorruptDocumentError())

    const result = await analyzeContractAction(pdfForm())

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe("CORRUPT_DOCUMENT")
    }
  })

  it("returns an error envelope for an empty PDF", async () => {
    mockAnalyzeContract.mockRejectedValue(new EmptyDocumentError())

    const result = await analyzeContractAction(pdfForm())

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe("EMPTY_DOCUMENT")
    }
  })

  it("returns MALFORMED_MODEL_OUTPUT for malformed model output and logs it", async () => {
    mockAnalyzeContract.mockRejectedValue(
      new MalformedModelOutputError("Risk scoring returned an unexpected format for 2 clauses")
    )

    const result = await analyzeContractAction(pdfForm())

    expect(result).toEqual({
      success: false,
      error: {
        code: "MALFORMED_MODEL_OUTPUT",
        message: "Risk scoring returned an unexpected format for 2 clauses",
      },
    })
    expect(logger.error).toHaveBeenCalledWith(
      "[Action Error]",
      expect.objectContaining({ code: "MALFORMED_MODEL_OUTPUT" })
    )
  })

  it("wraps unexpected failures as INTERNAL_ERROR", async () => {
    mockAnalyzeContract.mockRejectedValue(new TypeError("Cannot read properties of undefined"))

    const result = await analyzeContractAction(pdfForm())

    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.code).toBe("INTERNAL_ERROR")
    }
  })
})

describe("testConnectionAction", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("returns the connection check", async () => {
    mockTestModelConnection.mockResolvedValue({
      modelId: "anthropic/claude-haiku-4.5",
      reply: "OK",
      latencyMs: 320,
    })

    const result = await testConnectionAction("  test-key ")

    expect(result).toEqual({
      success: true,
      data: { modelId: "anthropic/claude-haiku-4.5", reply: "OK", latencyMs: 320 },
    })
    expect(mockTestModelConnection).toHaveBeenCalledWith("test-key")
  })

  it("falls back to the server key for a blank input", async () => {
    mockTestModelConnection.mockResolvedValue({ modelId: "m", reply: "OK", latencyMs: 1 })

    await testConnectionAction("")

    expect(mockTestModelConnection).toHaveBeenCalledWith(undefined)
  })

  it("returns the error envelope when the key is rejected", async () => {
    const { InvalidApiKeyError } = await import("@/lib/errors")
    mockTestModelConnection.mockRejectedValue(new InvalidApiKeyError())

    const result = await testConnectionAction("test-key")

    expect(result).toEqual({
      success: false,
      error: { code: "INVALID_API_KEY", message: "The AI Gateway API key was rejected" },
    })
  })
})
