"use client"

import * as React from "react"
import { AnimatePresence, motion } from "motion/react"
import { ChevronDownIcon, ChevronRightIcon } from "lucide-react"
import { cn } from "@/lib/utils"
import { Card, CardContent, CardHeader } from "@/components/ui/card"
import { ScoreBadge, RiskTypeBadge } from "@/components/analysis/risk-badge"
import { sortByRisk } from "@/lib/analysis/scoring"
import type { ClauseRecord } from "@/agents/types"

/** Cards open on first render */
const EXPANDED_BY_DEFAULT = 3

// ============================================================================
// ClauseCard
// ============================================================================

function ClauseCard({
  clause,
  defaultOpen,
  isHighest,
}: {
  clause: ClauseRecord
  defaultOpen: boolean
  isHighest: boolean
}) {
  const [open, setOpen] = React.useState(defaultOpen)

  return (
    <Card className={cn("min-w-0", isHighest && "ring-2 ring-offset-1")}>
      <CardHeader className="pb-2">
        <button
          type="button"
          className="flex w-full min-w-0 items-start justify-between gap-2 text-left"
          aria-expanded={open}
          onClick={() => setOpen((o) => !o)}
        >
          <span className="flex min-w-0 flex-1 items-start gap-1.5">
            {open ? (
              <ChevronDownIcon className="mt-0.5 size-4 shrink-0" />
            ) : (
              <ChevronRightIcon className="mt-0.5 size-4 shrink-0" />
            )}
            <span className={cn("text-sm", !open && "line-clamp-2")}>{clause.clauseText}</span>
          </span>
          <span className="flex shrink-0 items-center gap-1.5">
            <RiskTypeBadge riskType={clause.riskType} />
            <ScoreBadge score={clause.riskScore} />
          </span>
        </button>
      </CardHeader>
      <AnimatePresence initial={false}>
        {open && (
          <motion.div
            initial={{ height: 0, opacity: 0 }}
            animate={{ height: "auto", opacity: 1 }}
            exit={{ height: 0, opacity: 0 }}
            transition={{ duration: 0.2 }}
            className="overflow-hidden"
          >
            <CardContent className="space-y-3 text-sm">
              <div>
                <p className="mb-1 font-medium text-muted-foreground">Why it matters</p>
                <p>{clause.reasoning}</p>
              </div>
              <div>
                <p className="mb-1 font-medium text-muted-foreground">Suggested revision</p>
                <blockquote className="border-l-2 border-muted pl-3 italic">
                  {clause.suggestedRevision}
                </blockquote>
              </div>
              <p className="text-xs text-muted-foreground">
                Confidence: {Math.round(clause.confidence * 100)}%
              </p>
            </CardContent>
          </motion.div>
        )}
      </AnimatePresence>
    </Card>
  )
}

// ============================================================================
// ClauseCardList
// ============================================================================

export function ClauseCardList({
  clauses,
  highestRiskClauseId,
}: {
  clauses: ClauseRecord[]
  highestRiskClauseId?: string | null
}) {
  const sorted = React.useMemo(() => sortByRisk(clauses), [clauses])

  if (sorted.length === 0) {
    return (
      <p className="rounded-lg border border-dashed p-6 text-center text-sm text-muted-foreground">
        No clauses to show.
      </p>
    )
  }

  return (
    <div className="space-y-3">
      {sorted.map((clause, i) => (
        <ClauseCard
          key={clause.id}
          clause={clause}
          defaultOpen={i < EXPANDED_BY_DEFAULT}
          isHighest={clause.id === highestRiskClauseId}
        />
      ))}
    </div>
  )
}
