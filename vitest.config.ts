import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    setupFiles: ["./vitest.setup.ts"],
    include: ["tests/**/*.test.ts", "packages/*/src/__tests__/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "json-summary", "lcov"],
      reportsDirectory: "./coverage",
      include: ["packages/*/src/**"],
      exclude: ["**/__tests__/**"],
      thresholds: {
        lines: 80,
        branches: 75,
        functions: 80,
        statements: 80,
      },
    },
  },
  resolve: {
    alias: {
      "@footfall/core": fromRoot("./packages/core/src/index.ts"),
      "@footfall/detect": fromRoot("./packages/detect/src/index.ts"),
      "@footfall/express": fromRoot("./packages/express/src/index.ts"),
    },
  },
});
