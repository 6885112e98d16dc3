import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/test-helpers.ts", "src/index.ts"],
      thresholds: {
        // Core math modules should have high coverage
        "src/wide.ts": {
          statements: 95,
          branches: 90,
          functions: 95,
        },
        "src/curve.ts": {
          statements: 95,
          branches: 90,
          functions: 95,
        },
        "src/fill.ts": {
          statements: 95,
          branches: 85,
          functions: 95,
        },
      },
    },
  },
});
