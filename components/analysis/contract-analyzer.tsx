"use client"

import { Loader2Icon, RotateCcwIcon } from "lucide-react"
import { Button } from "@/components/ui/button"
import { useContractAnalysis } from "@/hooks/use-contract-analysis"
import { LEGAL_DISCLAIMER } from "@/agents/prompts"
import { UploadPanel } from "./upload-panel"
import { ErrorPanel } from "./error-panel"
import { RiskOverview } from "./risk-overview"
import { SummaryStrip } from "./summary-strip"
import { ClauseCardList } from "./clause-card-list"

export function ContractAnalyzer({ hasServerApiKey }: { hasServerApiKey: boolean }) {
  const { status, result, error, isAnalyzing, analyze, reset } = useContractAnalysis()

  return (
    <div className="mx-auto flex w-full max-w-3xl flex-col gap-6 px-4 py-10">
      <header className="space-y-1">
        <h1 className="text-2xl font-semibold tracking-tight">RiskLens</h1>
        <p className="text-sm text-muted-foreground">
          Clause-level risk scoring for contracts.
        </p>
      </header>

      {status !== "done" && (
        <UploadPanel
          hasServerApiKey={hasServerApiKey}
          disabled={isAnalyzing}
          onAnalyze={(formData) => void analyze(formData)}
        />
      )}

      {isAnalyzing && (
        <div className="flex items-center justify-center gap-2 text-sm text-muted-foreground">
          <Loader2Icon className="size-4 animate-spin" />
          Extracting and scoring clauses...
        </div>
      )}

      {status === "failed" && error && <ErrorPanel error={error} />}

      {status === "done" && result && (
        <>
          <RiskOverview result={result} />
          <SummaryStrip
            clauseCount={result.clauses.length}
            levelCounts={result.riskLevelDistribution}
            typeCounts={result.riskTypeDistribution}
            processingTime={result.processingTimeMs}
            estimatedCost={result.tokenUsage.total.estimatedCost}
          />
          <ClauseCardList
            clauses={result.clauses}
            highestRiskClauseId={result.highestRiskClause?.id}
          />
          <Button variant="outline" onClick={reset} className="self-center">
            <RotateCcwIcon className="size-4" />
            Analyze another contract
          </Button>
        </>
      )}

      <footer className="border-t pt-4 text-xs text-muted-foreground">{LEGAL_DISCLAIMER}</footer>
    </div>
  )
}
