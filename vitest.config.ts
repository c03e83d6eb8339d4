import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: ["src/**/*.test.ts"],
    // several suites build the 0.25° grid (~660k bricks)
    testTimeout: 30_000,
  },
});
