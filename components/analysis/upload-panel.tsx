"use client"

import * as React from "react"
import { FileTextIcon, Loader2Icon, PlugZapIcon, UploadIcon } from "lucide-react"
import { Button } from "@/components/ui/button"
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card"
import { testConnectionAction } from "@/app/actions/analysis"
import { formatKilobytes } from "@/lib/utils"
import type { ConnectionCheck } from "@/agents/types"

interface UploadPanelProps {
  /** A gateway key is configured on the server; the key field becomes optional */
  hasServerApiKey: boolean
  disabled?: boolean
  onAnalyze: (formData: FormData) => void
}

type ConnectionState =
  | { status: "idle" }
  | { status: "ok"; check: ConnectionCheck }
  | { status: "failed"; message: string }

export function UploadPanel({ hasServerApiKey, disabled, onAnalyze }: UploadPanelProps) {
  const [file, setFile] = React.useState<File | null>(null)
  const [apiKey, setApiKey] = React.useState("")
  const [connection, setConnection] = React.useState<ConnectionState>({ status: "idle" })
  const [isTesting, startTesting] = React.useTransition()

  const handleSubmit = (e: React.FormEvent<HTMLFormElement>) => {
    e.preventDefault()
    if (!file) return

    const formData = new FormData()
    formData.set("file", file)
    if (apiKey.trim()) formData.set("apiKey", apiKey)
    onAnalyze(formData)
  }

  const handleTestConnection = () => {
    startTesting(async () => {
      const response = await testConnectionAction(apiKey)
      setConnection(
        response.success
          ? { status: "ok", check: response.data }
          : { status: "failed", message: response.error.message }
      )
    })
  }

  return (
    <Card>
      <CardHeader>
        <CardTitle>Analyze a contract</CardTitle>
        <p className="text-sm text-muted-foreground">
          Upload a PDF. Each clause is scored 1-10 with an explanation and a safer rewrite.
        </p>
      </CardHeader>
      <CardContent>
        <form onSubmit={handleSubmit} className="space-y-4">
          <label className="flex cursor-pointer flex-col items-center gap-2 rounded-lg border border-dashed p-6 text-sm text-muted-foreground hover:bg-muted/40">
            <UploadIcon className="size-6" />
            <span>{file ? "Choose a different file" : "Choose a PDF (max 10MB, 50 pages)"}</span>
            <input
              type="file"
              name="file"
              accept="application/pdf,.pdf"
              className="sr-only"
              disabled={disabled}
              onChange={(e) => setFile(e.target.files?.[0] ?? null)}
            />
          </label>

          {file && (
            <p className="flex items-center gap-2 text-sm">
              <FileTextIcon className="size-4 shrink-0" />
              <span className="truncate">{file.name}</span>
              <span className="text-muted-foreground">{formatKilobytes(file.size)}</span>
            </p>
          )}

          <div className="space-y-1.5">
            <label htmlFor="apiKey" className="text-sm font-medium">
              AI Gateway API key{hasServerApiKey && " (optional)"}
            </label>
            <div className="flex gap-2">
              <input
                id="apiKey"
                type="password"
                autoComplete="off"
                value={apiKey}
                onChange={(e) => {
                  setApiKey(e.target.value)
                  setConnection({ status: "idle" })
                }}
                placeholder={hasServerApiKey ? "Using the server key" : "Paste your key"}
                className="min-w-0 flex-1 rounded-md border bg-background px-3 py-2 text-sm"
              />
              <Button
                variant="outline"
                onClick={handleTestConnection}
                disabled={isTesting || (!hasServerApiKey && !apiKey.trim())}
              >
                {isTesting ? (
                  <Loader2Icon className="size-4 animate-spin" />
                ) : (
                  <PlugZapIcon className="size-4" />
                )}
                Test connection
              </Button>
            </div>
            {connection.status === "ok" && (
              <p className="text-xs" style={{ color: "oklch(0.45 0.14 175)" }}>
                Connected to {connection.check.modelId} in {connection.check.latencyMs}ms
              </p>
            )}
            {connection.status === "failed" && (
              <p className="text-xs" style={{ color: "oklch(0.50 0.14 25)" }}>
                {connection.message}
              </p>
            )}
          </div>

          <Button type="submit" className="w-full" disabled={!file || disabled}>
            Analyze contract
          </Button>
        </form>
      </CardContent>
    </Card>
  )
}
