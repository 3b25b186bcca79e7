import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text"],
      reportOnFailure: true,
      exclude: [
        "**/dist/**",
        "**/node_modules/**",
        "**/tests/**",
        "**/*.config.{ts,mts}",
        "**/types.ts",
        "packages/**/index.ts", // Re-export files in packages
      ],
      include: ["packages/*/src/**/*.ts"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
    include: ["packages/*/tests/**/*.test.ts"],
  },
});
