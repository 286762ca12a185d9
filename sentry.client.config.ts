import * as Sentry from "@sentry/nextjs";

Sentry.init({
  dsn: process.env.NEXT_PUBLIC_SENTRY_DSN,

  enableLogs: true,

  integrations: [
    Sentry.consoleLoggingIntegration({
      levels: ["warn", "error"],
    }),
    // Page loads and the analyze server action round trip
    Sentry.browserTracingIntegration({
      enableInp: true,
    }),
  ],

  tracePropagationTargets: ["localhost", /^\/api\//],

  tracesSampler: ({ parentSampled }) => {
    if (typeof parentSampled === "boolean") {
      return parentSampled;
    }
    return process.env.NODE_ENV === "production" ? 0.1 : 1.0;
  },

  debug: false,
});
