import { errorConfig } from "@/components/analysis/config"
import type { SerializedError } from "@/lib/errors"

export function ErrorPanel({ error }: { error: SerializedError }) {
  const config = errorConfig[error.code]
  const Icon = config.icon

  return (
    <div
      role="alert"
      className="rounded-lg border p-4"
      style={{
        background: "oklch(0.96 0.03 25)",
        borderColor: "oklch(0.85 0.10 25)",
      }}
    >
      <div className="flex items-start gap-3">
        <Icon className="mt-0.5 size-5 shrink-0" style={{ color: "oklch(0.50 0.14 25)" }} />
        <div className="space-y-1 text-sm">
          <p className="font-medium">{config.title}</p>
          <p>{error.message}</p>
          {error.details && error.details.length > 0 && (
            <ul className="list-disc pl-5 text-xs text-muted-foreground">
              {error.details.map((detail, i) => (
                <li key={`${detail.field ?? ""}-${i}`}>{detail.message}</li>
              ))}
            </ul>
          )}
          <p className="text-xs text-muted-foreground">{config.hint}</p>
        </div>
      </div>
    </div>
  )
}
