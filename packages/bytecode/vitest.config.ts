import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@pegcode/bytecode",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
