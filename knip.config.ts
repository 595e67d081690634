import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/cascade-purge": {
      entry: ["src/**/index.ts", "src/backend/sqlite/local.ts", "examples/*.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts", "examples/**/*.ts"],
      ignore: ["**/test-utils.ts"],
      ignoreDependencies: ["better-sqlite3", "pg"],
    },
  },
};

export default config;
