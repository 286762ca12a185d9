import * as Sentry from "@sentry/nextjs";

Sentry.init({
  dsn: process.env.NEXT_PUBLIC_SENTRY_DSN,

  // Enable structured logging (lib/logger.ts writes through Sentry.logger)
  enableLogs: true,

  // Contract text is confidential: never attach request bodies or user data
  sendDefaultPii: false,

  integrations: [
    // Console integration - captures console.log, console.warn, console.error
    Sentry.consoleLoggingIntegration({
      levels: ["log", "warn", "error"],
    }),
    // Vercel AI SDK integration - tracks LLM calls, tokens, latency.
    // Prompts contain the uploaded contract, so inputs and outputs stay out.
    Sentry.vercelAIIntegration({
      recordInputs: false,
      recordOutputs: false,
    }),
  ],

  tracesSampler: ({ name, parentSampled }) => {
    // Always skip internal routes
    if (name.includes("_next")) {
      return 0;
    }
    // Always capture the analysis path
    if (name.includes("analyze")) {
      return 1.0;
    }
    if (typeof parentSampled === "boolean") {
      return parentSampled;
    }
    // Production: 10%, Development: 100%
    return process.env.NODE_ENV === "production" ? 0.1 : 1.0;
  },

  debug: false,
});
