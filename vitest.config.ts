import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/__tests__/**/*.test.ts", "tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 5000,
    hookTimeout: 5000,
    setupFiles: ["./vitest.setup.ts"],
  },
});
