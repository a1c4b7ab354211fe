import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
    },
    // grammar loading
    testTimeout: 20000,
    hookTimeout: 30000,
  },
});
