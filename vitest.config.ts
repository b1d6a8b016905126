import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const root = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@logscope/shared/utils": root("./packages/shared/src/utils/index.ts"),
      "@logscope/shared/db": root("./packages/shared/src/db/index.ts"),
      "@logscope/log-analyzer": root("./packages/log-analyzer/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/**/src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "lcov"],
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/*.test.ts",
        "**/index.ts",
        "**/types.ts",
        "**/main.ts",
      ],
    },
    testTimeout: 15000,
    hookTimeout: 10000,
    pool: "forks",
    fileParallelism: true,
  },
});
