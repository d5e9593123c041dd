import { fileURLToPath } from "node:url";

import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      reachgraph: fileURLToPath(new URL("src/index.ts", import.meta.url)),
    },
  },
  test: {
    name: "reachgraph",
    include: ["tests/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "**/dist/**"],
    globals: false,
  },
});
