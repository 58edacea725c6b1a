import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegcode/vm",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
