"use client"

import { motion } from "motion/react"
import { cn } from "@/lib/utils"
import { Badge } from "@/components/ui/badge"
import { riskConfig, riskTypeConfig } from "@/components/analysis/config"
import { rankRiskTypes } from "@/lib/analysis/scoring"
import type { RiskLevel, RiskType } from "@/agents/types"

// ============================================================================
// Types
// ============================================================================

interface SummaryStripProps {
  clauseCount: number
  levelCounts: Record<RiskLevel, number>
  typeCounts: Record<RiskType, number>
  processingTime?: number | null
  estimatedCost?: number | null
  className?: string
}

const LEVEL_ORDER: RiskLevel[] = ["high", "medium", "low"]

// ============================================================================
// SummaryStrip
// ============================================================================

export function SummaryStrip({
  clauseCount,
  levelCounts,
  typeCounts,
  processingTime,
  estimatedCost,
  className,
}: SummaryStripProps) {
  const rankedTypes = rankRiskTypes(typeCounts).filter((t) => t.count > 0)

  return (
    <div className={cn("rounded-lg border bg-muted/30 px-4 py-2.5", className)}>
      {/* Row 1: Clause count + risk level distribution */}
      <div className="flex flex-wrap items-center gap-x-2 gap-y-1 text-xs text-muted-foreground">
        <motion.span
          initial={{ opacity: 0 }}
          animate={{ opacity: 1 }}
          className="font-medium text-foreground"
        >
          {clauseCount} {clauseCount === 1 ? "clause" : "clauses"}
        </motion.span>
        <span>&middot;</span>
        {LEVEL_ORDER.map((level, i) => {
          const config = riskConfig[level]
          return (
            <motion.span
              key={level}
              initial={{ opacity: 0, scale: 0.9 }}
              animate={{ opacity: 1, scale: 1 }}
              transition={{ delay: i * 0.05, type: "spring", bounce: 0.2, duration: 0.3 }}
            >
              <Badge
                variant="outline"
                className="gap-1 px-1.5 py-0 text-xs"
                style={{
                  background: config.bgColor,
                  color: config.textColor,
                  borderColor: config.borderColor,
                }}
              >
                {levelCounts[level]} {config.label.toLowerCase()}
              </Badge>
            </motion.span>
          )
        })}
      </div>

      {/* Row 2: Risk types */}
      {rankedTypes.length > 0 && (
        <div className="mt-2 flex flex-wrap items-center gap-1.5">
          {rankedTypes.map(({ riskType, count }) => (
            <span key={riskType} className="text-xs text-muted-foreground">
              <span style={{ color: riskTypeConfig[riskType].textColor }}>
                {riskTypeConfig[riskType].label}
              </span>{" "}
              {count}
            </span>
          ))}
        </div>
      )}

      {/* Row 3: Processing stats (subtle) */}
      {(processingTime != null || estimatedCost != null) && (
        <div className="mt-1.5 flex items-center gap-2 text-[10px] text-muted-foreground/70">
          {processingTime != null && (
            <span>{(processingTime / 1000).toFixed(1)}s</span>
          )}
          {estimatedCost != null && (
            <span>${estimatedCost.toFixed(2)}</span>
          )}
        </div>
      )}
    </div>
  )
}
