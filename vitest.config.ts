import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    alias: {
      "@java-import-tools/add-import": fileURLToPath(
        new URL("./packages/add-import/src/index.ts", import.meta.url),
      ),
    },
  },
});
