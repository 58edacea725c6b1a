import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegcode/core",
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
