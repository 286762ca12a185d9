import type { NextConfig } from "next";
import { withSentryConfig } from "@sentry/nextjs";

const nextConfig: NextConfig = {
  // pdfjs (inside unpdf) resolves its worker wrongly when bundled into the server build
  serverExternalPackages: ["unpdf"],

  experimental: {
    // Uploads are read through a server action; the default 1MB body limit is too small
    serverActions: {
      bodySizeLimit: "11mb",
    },
    optimizePackageImports: ["motion"],
  },
};

const sentryConfig = {
  // For all available options, see:
  // https://www.npmjs.com/package/@sentry/webpack-plugin#options
  org: process.env.SENTRY_ORG,
  project: process.env.SENTRY_PROJECT,

  // Only print logs for uploading source maps in CI
  silent: !process.env.CI,

  widenClientFileUpload: true,

  webpack: {
    treeshake: {
      // Automatically tree-shake Sentry logger statements to reduce bundle size
      removeDebugLogging: true,
    },
  },
};

// Disable Sentry wrapper in development for faster compilation
export default process.env.NODE_ENV === "development"
  ? nextConfig
  : withSentryConfig(nextConfig, sentryConfig);
