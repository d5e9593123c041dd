import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    bin: "src/bin.ts",
  },
  format: ["esm"],
  target: "node20",
  sourcemap: true,
  clean: true,
  // The library workspace exports TypeScript sources, so it is bundled in.
  noExternal: ["reachgraph"],
});
