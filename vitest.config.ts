import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // large-dataset generation tests
    testTimeout: 30_000,
  },
});
