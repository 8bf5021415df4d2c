/**
 * Vitest multi-project configuration
 *
 * Unit tests exercise the sweep engine and the AWS service handlers against
 * in-process test doubles. Integration tests drive the oclif commands end to
 * end against mocked AWS SDK clients.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    testTimeout: 30_000,

    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "./coverage",
      exclude: ["node_modules/", "tests/", "dist/", "**/*.d.ts", "**/*.config.*"],
      thresholds: {
        lines: 85,
        branches: 80,
        functions: 85,
        statements: 85,
        "src/sweep/deleter.ts": {
          lines: 95,
          functions: 100,
          branches: 90,
          statements: 95,
        },
      },
    },

    projects: [
      {
        test: {
          name: "unit",
          globals: true,
          include: ["tests/unit/**/*.test.ts"],
          setupFiles: ["./tests/setup.ts"],
        },
      },
      {
        test: {
          name: "integration",
          globals: true,
          include: ["tests/integration/**/*.test.ts"],
          setupFiles: ["./tests/setup.ts"],
          pool: "forks",
          disableConsoleIntercept: true,
        },
      },
    ],
  },
});
