/// <reference types="vitest" />
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    coverage: {
      enabled: false,
      exclude: ["src/cli.ts", "src/index.ts"],
      include: ["src/**"],
      provider: "v8",
      reporter: ["text", "text-summary", "html", "json", "lcov"],
      reportsDirectory: "./coverage",
    },
    environment: "node",
    include: ["test/**/*.test.ts"],
  },
});
