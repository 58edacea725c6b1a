import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegcode/generator",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
