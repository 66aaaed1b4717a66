import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["libs/**/tests/**/*.test.ts", "services/**/tests/**/*.test.ts"],
    exclude: ["**/node_modules/**"],
    coverage: {
      reporter: ["text", "lcov"],
      include: ["libs/*/src/**", "services/*/src/**"]
    }
  }
});
