import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Cross-package tests
      {
        test: {
          name: "pegcode",
          include: ["tests/**/*.test.ts"],
          environment: "node",
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: ["packages/*/src/**/*.ts", "src/**/*.ts"],
      exclude: ["**/*.d.ts", "**/*.test.ts"],
    },
  },
});
