/**
 * SQLite backend for cascade-purge.
 *
 * Driver-agnostic: pass any Drizzle SQLite database. For a ready-made
 * better-sqlite3 database, see `cascade-purge/sqlite/local`.
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/better-sqlite3";
 * import Database from "better-sqlite3";
 * import { createSqliteBackend, getSqliteMigrationSQL } from "cascade-purge/sqlite";
 *
 * const sqlite = new Database("app.db");
 * sqlite.exec(getSqliteMigrationSQL());
 * const backend = createSqliteBackend(drizzle(sqlite));
 * ```
 */

export {
  type AnySqliteDatabase,
  createSqliteBackend,
  createSqliteTables,
  type SqliteBackendOptions,
  type SqliteExecutionProfileHints,
  type SqliteTableNames,
  type SqliteTables,
  tables,
} from "../drizzle/sqlite";

export { batches, records, tasks } from "../drizzle/schema/sqlite";

export { generateSqliteDDL, getSqliteMigrationSQL } from "../drizzle/ddl";
