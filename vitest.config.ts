import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      "@commandry/sdk": source("./packages/sdk/src/index.ts"),
      "@commandry/shared": source("./packages/shared/src/index.ts"),
      "@commandry/core": source("./packages/core/src/index.ts"),
    },
  },
});
