import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegcode/grammar",
    environment: "node",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
