import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["core/tests/**/*.test.ts", "tools/**/*.test.ts"],
    testTimeout: 10_000,
    sequence: { concurrent: false, shuffle: false },
  },
});
