import * as Sentry from "@sentry/nextjs";

Sentry.init({
  dsn: process.env.NEXT_PUBLIC_SENTRY_DSN,

  enableLogs: true,

  sendDefaultPii: false,

  integrations: [
    Sentry.consoleLoggingIntegration({
      levels: ["log", "warn", "error"],
    }),
  ],

  tracesSampler: ({ parentSampled }) => {
    if (typeof parentSampled === "boolean") {
      return parentSampled;
    }
    return process.env.NODE_ENV === "production" ? 0.1 : 1.0;
  },

  debug: false,
});
