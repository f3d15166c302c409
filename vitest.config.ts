import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/__tests__/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    environment: "node",
    testTimeout: 30000,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "error"
    }
  }
});
