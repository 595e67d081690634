import { fileURLToPath } from "node:url";

import { configDefaults, defineConfig } from "vitest/config";

const resolveSource = (path: string): string =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "cascade-purge/postgres": resolveSource("./src/backend/postgres/index.ts"),
      "cascade-purge/sqlite/local": resolveSource("./src/backend/sqlite/local.ts"),
      "cascade-purge/sqlite": resolveSource("./src/backend/sqlite/index.ts"),
      "cascade-purge": resolveSource("./src/index.ts"),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: [...configDefaults.exclude, "**/dist/**"],
    globals: false,
    coverage: {
      provider: "v8",
      reporter: ["text", "html", "json-summary"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts"],
      thresholds: {
        branches: 64,
        functions: 74,
        lines: 75,
      },
    },
  },
});
