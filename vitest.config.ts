import { defineConfig } from "vitest/config"
import path from "path"

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./test/setup.ts"],
    include: [
      "agents/**/*.test.ts",
      "lib/**/*.test.ts",
      "app/**/*.test.ts",
      "hooks/**/*.test.ts",
      "components/**/*.test.tsx",
    ],
    exclude: ["node_modules", ".next"],
    // Pure unit tests with no shared state
    fileParallelism: true,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules",
        ".next",
        "test/**",
        "agents/testing/**",
        "**/*.config.ts",
      ],
    },
  },
  // tsconfig keeps jsx "preserve" for Next; tests need the automatic runtime
  esbuild: {
    jsx: "automatic",
  },
  resolve: {
    alias: {
      "@": path.resolve(__dirname, "./"),
    },
  },
})
