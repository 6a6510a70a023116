import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages are tested from their sources
const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@docfeed/sdk": source("./packages/sdk/src/index.ts"),
      "@docfeed/testkit": source("./packages/testkit/src/index.ts"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts", "packages/*/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
