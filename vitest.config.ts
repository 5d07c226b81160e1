import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/api/tests/**/*.test.ts"],
    environment: "node",
    env: {
      PICKEM_DB_PATH: ":memory:",
      LOG_LEVEL: "silent"
    }
  }
});
