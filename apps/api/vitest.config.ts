import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    include: ["src/**/*.test.ts"],
    setupFiles: ["./src/test-env.ts"],
    testTimeout: 15000,
    sequence: { concurrent: false },
  },
});
