import { z } from "zod"
import { ConfigurationError } from "@/lib/errors"

/**
 * Server environment. Nothing is required at boot so the page can render and
 * tell the user what is missing; the gateway key is enforced by
 * {@link requireGatewayApiKey} when a model call is about to happen.
 */
const ServerEnvSchema = z.object({
  // Vercel AI Gateway credential (the only secret the app needs)
  AI_GATEWAY_API_KEY: z.string().trim().optional(),

  // Optional model overrides, AI Gateway ids like "google/gemini-2.5-flash"
  RISKLENS_EXTRACTOR_MODEL: z.string().trim().min(1).optional(),
  RISKLENS_SCORER_MODEL: z.string().trim().min(1).optional(),

  // Optional observability
  NEXT_PUBLIC_SENTRY_DSN: z.string().min(1).optional(),

  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
})

export type ServerEnv = z.infer<typeof ServerEnvSchema>

/** Empty strings from .env files count as unset */
function compact(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value
  }
  return out
}

export function serverEnv(): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(compact(process.env))
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.map(String).join(".")).join(", ")
    throw new ConfigurationError(`Invalid server environment variables: ${fields}`)
  }
  return parsed.data
}

/**
 * Resolves the credential for a model call. A key typed into the UI wins over
 * the environment; surrounding whitespace from copy-paste is dropped.
 *
 * @throws ConfigurationError - neither source provides a key
 */
export function requireGatewayApiKey(override?: string | null): string {
  const fromUser = override?.trim()
  if (fromUser) return fromUser

  const fromEnv = serverEnv().AI_GATEWAY_API_KEY
  if (fromEnv) return fromEnv

  throw new ConfigurationError(
    "AI_GATEWAY_API_KEY is not set. Add it to .env.local or enter a key in the form."
  )
}

/** True when the server has a key of its own (UI hides the setup notice) */
export function hasServerApiKey(): boolean {
  return Boolean(serverEnv().AI_GATEWAY_API_KEY)
}
