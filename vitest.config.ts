import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Workspace packages export their TypeScript sources; alias them so tests
    // never depend on a build.
    alias: {
      "@ravenhold/engine": fileURLToPath(new URL("./packages/engine/src/index.ts", import.meta.url)),
      "@ravenhold/cards": fileURLToPath(new URL("./packages/cards/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/src/**/__tests__/*.test.ts"],
  },
});
