"use client"

import { motion } from "motion/react"
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card"
import { RiskBadge } from "@/components/analysis/risk-badge"
import { riskConfig } from "@/components/analysis/config"
import type { AnalysisResult } from "@/agents/types"

/** Headline score, level and executive summary */
export function RiskOverview({ result }: { result: AnalysisResult }) {
  const config = riskConfig[result.overallRiskLevel]
  const { document } = result

  return (
    <Card>
      <CardHeader>
        <CardTitle className="text-sm text-muted-foreground">Overall risk</CardTitle>
        <div className="flex items-baseline gap-3">
          <motion.span
            initial={{ opacity: 0, y: 4 }}
            animate={{ opacity: 1, y: 0 }}
            className="text-4xl font-semibold tabular-nums"
            style={{ color: config.textColor }}
          >
            {result.overallRiskScore.toFixed(2)}/10
          </motion.span>
          <RiskBadge level={result.overallRiskLevel} />
        </div>
        <p className="text-xs text-muted-foreground">
          {document.fileName} &middot; {document.pageCount}{" "}
          {document.pageCount === 1 ? "page" : "pages"} &middot;{" "}
          {document.wordCount.toLocaleString("en-US")} words
          {document.truncated && " (truncated)"}
        </p>
      </CardHeader>
      <CardContent className="space-y-3">
        <p className="whitespace-pre-line text-sm">{result.executiveSummary}</p>
        {document.warnings.length > 0 && (
          <ul className="list-disc space-y-1 pl-5 text-xs text-muted-foreground">
            {document.warnings.map((warning, i) => (
              <li key={`${i}-${warning}`}>{warning}</li>
            ))}
          </ul>
        )}
      </CardContent>
    </Card>
  )
}
