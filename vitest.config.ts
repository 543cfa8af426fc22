import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["apps/*/tests/**/*.{test,spec}.ts", "packages/*/tests/**/*.{test,spec}.ts"],
    testTimeout: 10_000,
    restoreMocks: true
  }
});
