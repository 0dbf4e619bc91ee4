// vitest.config.ts — Vitest configuration for unit tests.

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
    // env.ts validates process.env at import time
    setupFiles: ["src/__tests__/setup.ts"],
    testTimeout: 10_000,
  },
});
