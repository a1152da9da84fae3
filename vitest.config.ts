// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";
import { loadEnv } from "vite";

export default defineConfig(({ mode }) => {
  // Load .env files - MULTIMETHODS_* settings become visible to tests
  const env = loadEnv(mode, process.cwd(), "MULTIMETHODS_");

  return {
    test: {
      env,
      include: ["test/**/*.spec.ts"],
    },
  };
});
