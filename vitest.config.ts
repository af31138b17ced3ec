import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Workspace packages are tested from source
    alias: [
      {
        find: /^silo$/,
        replacement: fileURLToPath(new URL("./packages/silo/src/index.ts", import.meta.url)),
      },
    ],
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 10000,
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      exclude: ["**/*.test.ts", "**/node_modules/**", "**/dist/**", "**/cli.ts", "**/index.ts"],
    },
  },
});
