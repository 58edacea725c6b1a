import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    cli: "src/cli/bin.ts",
  },
  outDir: "dist/bundle",
  format: ["esm"],
  dts: { entry: { index: "src/index.ts" } },
  sourcemap: true,
  clean: true,
  splitting: false,
  // Workspace packages point at their TypeScript sources; bundle them in.
  noExternal: [/^@pegcode\//],
  external: ["cosmiconfig"],
});
