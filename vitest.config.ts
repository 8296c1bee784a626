import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Cross-package scenarios
      {
        test: {
          name: "integration",
          include: ["tests/**/*.test.ts"],
          globals: true,
          environment: "node",
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    typecheck: {
      enabled: false,
    },

    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
