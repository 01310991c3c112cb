import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (path: string): string => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: /^@storyloom\/sdk\/testing$/, replacement: pkg("sdk/src/testing/index.ts") },
      { find: /^@storyloom\/sdk$/, replacement: pkg("sdk/src/index.ts") },
      { find: /^@storyloom\/shared$/, replacement: pkg("shared/src/index.ts") },
      { find: /^@storyloom\/core$/, replacement: pkg("core/src/index.ts") },
    ],
  },
});
