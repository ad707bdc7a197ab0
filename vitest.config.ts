// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files - this makes them available to tests
  const env = loadEnv(mode, process.cwd(), "");

  return {
    test: {
      env,
      environment: "node",
      // Spawn loops and the HTTP service settle quickly; keep a margin for slow CI
      testTimeout: 20_000,
      pool: "threads",
      include: ["test/**/*.spec.ts"],
    },
  };
});
