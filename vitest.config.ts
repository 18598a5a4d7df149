import path from "node:path";

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    env: {
      CAVERN_LOG_LEVEL: "silent"
    },
    alias: {
      "@": path.resolve(__dirname, "packages/engine/src")
    }
  }
});
