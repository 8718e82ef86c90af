import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    coverage: {
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "packages/*/src/**/*.test.ts",
        "packages/*/src/**/index.ts",
        "packages/*/src/types/**",
        "packages/*/src/test-helpers.ts",
        "packages/orchestrator/src/cli.ts",
      ],
    },
  },
});
