// test/setup.ts
// Shared setup: no test in this suite talks to Sentry, the AI Gateway or the network
import { vi } from "vitest"

// Silence the Sentry logger; tests assert on it through vi.mocked(logger)
vi.mock("@/lib/logger", () => ({
  logger: {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  },
  fmt: vi.fn(),
}))

// Never let a test pick up a developer's real gateway credential
vi.stubEnv("AI_GATEWAY_API_KEY", "")
