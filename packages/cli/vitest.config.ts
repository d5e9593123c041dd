import { fileURLToPath } from "node:url";

import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      reachgraph: fileURLToPath(
        new URL("../reachgraph/src/index.ts", import.meta.url),
      ),
    },
  },
  test: {
    name: "cli",
    include: ["tests/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "**/dist/**"],
    globals: false,
  },
});
