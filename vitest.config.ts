import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  // Workspace packages export their build output; tests run against sources
  resolve: {
    alias: [
      { find: /^@subdoc\/sdk$/, replacement: fromRoot("./packages/sdk/src/index.ts") },
      { find: /^@subdoc\/testkit$/, replacement: fromRoot("./packages/testkit/src/index.ts") },
    ],
  },
  test: {
    root: fromRoot("."),
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/test/**/*.test.ts",
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 20000,
  },
});
