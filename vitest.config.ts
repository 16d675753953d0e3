import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
    // sharp encodes and tsx-spawned CLI runs
    testTimeout: 30000,
  },
});
