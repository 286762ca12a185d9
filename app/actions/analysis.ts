"use server"

/**
 * @fileoverview Contract analysis Server Actions
 *
 * Both actions return an ActionResult and never throw, so the client always
 * gets an envelope it can render (including for unreadable PDFs and
 * malformed model output).
 *
 * @module app/actions/analysis
 */

import { actionSuccess, withActionErrorHandling, type ActionResult } from "@/lib/api-utils"
import { analyzeContract, readUpload, testModelConnection, apiKeySchema } from "@/lib/analysis"
import { ValidationError } from "@/lib/errors"
import type { AnalysisResult, ConnectionCheck } from "@/agents/types"

const runAnalysis = withActionErrorHandling(async (formData: FormData) => {
  const upload = await readUpload(formData)
  return actionSuccess(await analyzeContract(upload))
})

const runConnectionTest = withActionErrorHandling(async (apiKey?: string | null) => {
  const parsed = apiKeySchema.safeParse(apiKey ?? undefined)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  return actionSuccess(await testModelConnection(parsed.data))
})

/**
 * Analyze an uploaded contract.
 *
 * @param formData - `file` (PDF) and optional `apiKey`
 */
export async function analyzeContractAction(
  formData: FormData
): Promise<ActionResult<AnalysisResult>> {
  return runAnalysis(formData)
}

/**
 * Check that the gateway key works with a one-line model call.
 */
export async function testConnectionAction(
  apiKey?: string | null
): Promise<ActionResult<ConnectionCheck>> {
  return runConnectionTest(apiKey)
}
