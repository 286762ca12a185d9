"use client"

import { useState, useRef, useCallback } from "react"
import { analyzeContractAction } from "@/app/actions/analysis"
import type { AnalysisResult } from "@/agents/types"
import type { SerializedError } from "@/lib/errors"

export type ContractAnalysisStatus = "idle" | "analyzing" | "done" | "failed"

interface ContractAnalysisState {
  status: ContractAnalysisStatus
  result: AnalysisResult | null
  error: SerializedError | null
}

const INITIAL_STATE: ContractAnalysisState = {
  status: "idle",
  result: null,
  error: null,
}

/**
 * Holds the page's analysis state and runs the server action.
 *
 * A response that arrives after `reset()` (or after a newer `analyze()`) is
 * dropped.
 */
export function useContractAnalysis() {
  const [state, setState] = useState<ContractAnalysisState>(INITIAL_STATE)
  const requestIdRef = useRef(0)

  const analyze = useCallback(async (formData: FormData) => {
    const requestId = ++requestIdRef.current
    setState({ status: "analyzing", result: null, error: null })

    try {
      const response = await analyzeContractAction(formData)
      if (requestId !== requestIdRef.current) return

      if (response.success) {
        setState({ status: "done", result: response.data, error: null })
      } else {
        setState({ status: "failed", result: null, error: response.error })
      }
    } catch (e) {
      // Transport failure (network, server restart); the action itself never throws
      if (requestId !== requestIdRef.current) return
      setState({
        status: "failed",
        result: null,
        error: {
          code: "INTERNAL_ERROR",
          message: e instanceof Error ? e.message : "Unknown error",
        },
      })
    }
  }, [])

  const reset = useCallback(() => {
    requestIdRef.current++
    setState(INITIAL_STATE)
  }, [])

  return {
    ...state,
    isAnalyzing: state.status === "analyzing",
    analyze,
    reset,
  }
}
