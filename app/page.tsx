import { ContractAnalyzer } from "@/components/analysis/contract-analyzer"
import { hasServerApiKey } from "@/lib/env"

// Reads the environment per request
export const dynamic = "force-dynamic"

export default function Home() {
  return (
    <main className="min-h-screen">
      <ContractAnalyzer hasServerApiKey={hasServerApiKey()} />
    </main>
  )
}
