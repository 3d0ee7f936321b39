import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/cli.ts", "src/index.ts"],
      reporter: ["text"],
      reportsDirectory: ".coverage",
      thresholds: {
        lines: 95,
      },
    },
  },
});
