// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.spec.ts"],
    // Z3 runs its own worker threads; a forked process per file keeps them contained
    pool: "forks",
    testTimeout: 20_000,
    hookTimeout: 30_000,
  },
});
