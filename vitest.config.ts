import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@tabledb/sdk": fileURLToPath(new URL("./packages/sdk/src/index.ts", import.meta.url)),
      "@tabledb/testkit": fileURLToPath(new URL("./packages/testkit/src/index.ts", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/test/**/*.test.ts",
      ...(process.env.VITEST_PERF ? ["packages/*/benchmarks/**/*.bench.ts"] : []),
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
