// @vitest-environment jsdom
import { describe, it, expect, vi, afterEach } from "vitest"
import { render, screen } from "@testing-library/react"
import { RiskOverview } from "./risk-overview"
import { buildAnalysisResult } from "@/lib/analysis/analyze-contract"
import { BudgetTracker } from "@/lib/ai/budget"
import { createClauseRecord } from "@/agents/testing/fixtures"

const LOW_TEXT_WARNING = "Very little text was extracted. Results may be incomplete."

function resultWithWarnings(warnings: string[]) {
  return buildAnalysisResult(
    [
      createClauseRecord({ id: "clause-1", riskScore: 8 }),
      createClauseRecord({ id: "clause-2", riskScore: 4 }),
    ],
    {
      fileName: "lease.pdf",
      pageCount: 3,
      charCount: 6000,
      wordCount: 1200,
      truncated: false,
      warnings,
    },
    new BudgetTracker(),
    1500
  )
}

describe("RiskOverview", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("shows the overall score with two decimals", () => {
    render(<RiskOverview result={resultWithWarnings([])} />)

    expect(screen.getByText("6.00/10")).toBeTruthy()
    expect(screen.queryAllByRole("listitem")).toHaveLength(0)
  })

  it("renders repeated warnings without key collisions", () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {})

    render(<RiskOverview result={resultWithWarnings([LOW_TEXT_WARNING, LOW_TEXT_WARNING])} />)

    const items = screen.getAllByRole("listitem")
    expect(items.map((item) => item.textContent)).toEqual([LOW_TEXT_WARNING, LOW_TEXT_WARNING])
    expect(consoleError).not.toHaveBeenCalled()
  })
})
