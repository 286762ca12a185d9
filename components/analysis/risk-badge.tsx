import { Badge } from "@/components/ui/badge"
import { cn } from "@/lib/utils"
import { riskConfig, riskTypeConfig } from "@/components/analysis/config"
import { getRiskLevel } from "@/lib/analysis/scoring"
import type { RiskLevel, RiskType } from "@/agents/types"

export function RiskBadge({ level, className }: { level: RiskLevel; className?: string }) {
  const config = riskConfig[level]
  const Icon = config.icon
  return (
    <Badge
      variant="outline"
      className={className}
      style={{
        background: config.bgColor,
        color: config.textColor,
        borderColor: config.borderColor,
      }}
    >
      <Icon className="size-3" />
      {config.label}
    </Badge>
  )
}

/** "8/10" colored by the score's level */
export function ScoreBadge({ score, className }: { score: number; className?: string }) {
  const config = riskConfig[getRiskLevel(score)]
  return (
    <Badge
      variant="outline"
      className={cn("tabular-nums", className)}
      style={{
        background: config.bgColor,
        color: config.textColor,
        borderColor: config.borderColor,
      }}
    >
      {score}/10
    </Badge>
  )
}

export function RiskTypeBadge({ riskType }: { riskType: RiskType }) {
  const config = riskTypeConfig[riskType]
  const Icon = config.icon
  return (
    <Badge
      variant="outline"
      style={{
        background: config.bgColor,
        color: config.textColor,
        borderColor: config.borderColor,
      }}
    >
      <Icon className="size-3" />
      {config.label}
    </Badge>
  )
}
