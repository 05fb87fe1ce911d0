import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/*/src/**/__tests__/*.test.ts", "packages/*/src/**/__tests__/*.test.ts"],
    environment: "node",
    testTimeout: 20_000,
    env: {
      NODE_ENV: "test"
    }
  }
});
