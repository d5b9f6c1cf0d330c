import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@strata/core": fileURLToPath(new URL("./core/src/index.ts", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["core/src/**/*.test.ts", "common/node/src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    globals: false,
  },
});
