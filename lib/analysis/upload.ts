import { z } from 'zod'
import { ValidationError } from '@/lib/errors'
import type { AnalyzeContractInput } from './analyze-contract'

const EXTENSION_MIME_TYPES: Record<string, string> = {
  pdf: 'application/pdf',
  txt: 'text/plain',
}

/** Optional key typed into the form; blank means "use the server key" */
export const apiKeySchema = z
  .string()
  .trim()
  .max(512, 'API key is too long')
  .optional()
  .transform((v) => (v ? v : undefined))

/** Browsers leave `type` empty for some uploads; fall back to the extension */
export function resolveMimeType(file: { name: string; type: string }): string {
  if (file.type) return file.type
  const extension = file.name.split('.').pop()?.toLowerCase() ?? ''
  return EXTENSION_MIME_TYPES[extension] ?? ''
}

/**
 * Reads the multipart form shared by the server action and `POST /api/analyze`:
 * a `file` field and an optional `apiKey` field.
 *
 * @throws ValidationError - no file, or a malformed key field
 */
export async function readUpload(formData: FormData): Promise<AnalyzeContractInput> {
  const file = formData.get('file')

  if (!file || !(file instanceof File)) {
    throw new ValidationError('No file provided', [
      { field: 'file', message: 'Choose a PDF to analyze' },
    ])
  }

  const rawKey = formData.get('apiKey')
  const apiKey = apiKeySchema.safeParse(typeof rawKey === 'string' ? rawKey : undefined)
  if (!apiKey.success) {
    throw ValidationError.fromZodError(apiKey.error)
  }

  return {
    buffer: Buffer.from(await file.arrayBuffer()),
    fileName: file.name,
    mimeType: resolveMimeType(file),
    apiKey: apiKey.data,
  }
}
