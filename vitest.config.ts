/**
 * Vitest configuration
 *
 * Unit tests live under tests/unit and share the global setup file.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    disableConsoleIntercept: true,
    include: ["tests/unit/**/*.test.ts"],
    setupFiles: ["./tests/setup.ts"],

    coverage: {
      provider: "v8",
      reporter: ["text", "json", "lcov", "json-summary"],
      reportsDirectory: "./coverage",
      exclude: ["node_modules/", "tests/", "dist/", "**/*.d.ts", "**/*.config.*"],
      thresholds: {
        lines: 90,
        branches: 85,
        functions: 90,
        statements: 90,
        "src/services/compiler/compiler-pipeline.ts": {
          lines: 95,
          functions: 100,
          branches: 90,
          statements: 95,
        },
      },
    },
  },
});
