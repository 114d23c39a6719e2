import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    // Unit tests only: every external service is replaced in-process
    include: ["src/__tests__/unit/**/*.test.ts"],
    // Sets env vars before config.ts is imported
    setupFiles: ["./test/setup-env.ts"],
  },
});
