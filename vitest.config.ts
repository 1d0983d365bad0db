import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/__tests__/**/*.test.ts"],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: "@cmdbind/sdk/testing", replacement: src("./packages/sdk/src/testing/index.ts") },
      { find: "@cmdbind/sdk", replacement: src("./packages/sdk/src/index.ts") },
      { find: "@cmdbind/shared", replacement: src("./packages/shared/src/index.ts") },
      { find: "@cmdbind/core", replacement: src("./packages/core/src/index.ts") },
    ],
  },
});
