import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // workspace packages export their TypeScript sources under "source"
    conditions: ["source"],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts", "services/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    environment: "node",
  },
});
