import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
  },
  format: ["esm", "cjs"],
  splitting: false,
  sourcemap: true,
  skipNodeModulesBundle: true,
  minify: false,
  treeshake: false,
  target: "node20",
  keepNames: true,
  dts: false,
  clean: true,
  outDir: "dist",
  outExtension: ({ format }) => ({
    js: format === "cjs" ? ".cjs" : ".js",
  }),
});
