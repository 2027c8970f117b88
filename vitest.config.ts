import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/**/*.spec.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
    reporters: ["default"],
    coverage: {
      clean: true,
      reporter: ["json", "json-summary", "html", "lcov", "text"],
      provider: "v8",
      include: ["packages/*/src/**"],
    },
  },
});
