import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      DEPSYNC_ICONS: "unicode", // Force Unicode icons in tests for consistent assertions
      NO_COLOR: "1",
    },
  },
});
