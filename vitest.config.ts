import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    globals: false,
    testTimeout: 30000,
    hookTimeout: 30000,
    // Workspace packages resolve to their TypeScript sources, no build needed
    alias: {
      "@q2lsp/core": source("./packages/core/src/index.ts"),
      "@q2lsp/language-server/api": source("./packages/language-server/src/api.ts"),
    },
  },
});
