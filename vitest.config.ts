import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    // BLS pairings in pure JS take a few hundred milliseconds each.
    testTimeout: 30000,
  },
});
