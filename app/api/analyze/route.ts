import { analyzeContract, readUpload } from "@/lib/analysis"
import { success, withErrorHandling } from "@/lib/api-utils"

export const runtime = "nodejs"
export const maxDuration = 120

/**
 * POST /api/analyze
 *
 * Multipart form with `file` and optional `apiKey`; same pipeline as the
 * page's server action, returned in the ApiResponse envelope.
 */
export const POST = withErrorHandling(async (request) => {
  const formData = await request.formData()
  const result = await analyzeContract(await readUpload(formData))
  return success(result)
})
