/**
 * Local SQLite backend on better-sqlite3.
 *
 * @example Quick start with in-memory database
 * ```typescript
 * import { createLocalSqliteBackend } from "cascade-purge/sqlite/local";
 *
 * const { backend } = createLocalSqliteBackend();
 * const store = createStore(schema, backend);
 * ```
 *
 * @example File-based database for persistent local development
 * ```typescript
 * const { backend } = createLocalSqliteBackend({ path: "./dev.db" });
 * ```
 */
import Database from "better-sqlite3";
import { type Logger as DrizzleLogger } from "drizzle-orm";
import {
  type BetterSQLite3Database,
  drizzle,
} from "drizzle-orm/better-sqlite3";

import { ConfigurationError } from "../../errors";
import { generateSqliteDDL } from "../drizzle/ddl";
import { type SqliteTables, tables as defaultTables } from "../drizzle/schema/sqlite";
import { createSqliteBackend } from "../drizzle/sqlite";
import type { PurgeBackend } from "../types";

type NodeModuleVersionMismatch = Readonly<{
  compiled: number;
  required: number;
}>;

function getUnknownErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function parseNodeModuleVersionMismatchMessage(
  message: string,
): NodeModuleVersionMismatch | undefined {
  const regexp =
    /NODE_MODULE_VERSION (?<compiled>\d+)[\s\S]*?NODE_MODULE_VERSION (?<required>\d+)/;
  const match = regexp.exec(message);
  if (!match?.groups) return undefined;

  const compiled = Number(match.groups.compiled);
  const required = Number(match.groups.required);

  if (!Number.isFinite(compiled) || !Number.isFinite(required))
    return undefined;

  return { compiled, required };
}

function createDatabase(path: string): Database.Database {
  try {
    return new Database(path);
  } catch (error) {
    const message = getUnknownErrorMessage(error);
    const mismatch = parseNodeModuleVersionMismatchMessage(message);
    if (!mismatch) throw error;

    throw new ConfigurationError(
      [
        "Failed to load better-sqlite3 native addon.",
        `It was compiled for NODE_MODULE_VERSION ${mismatch.compiled}, but this Node.js runtime requires ${mismatch.required}.`,
        "Rebuild with: npm rebuild better-sqlite3.",
      ].join(" "),
      {
        nodeVersion: process.version,
        compiledNodeModuleVersion: mismatch.compiled,
        requiredNodeModuleVersion: mismatch.required,
      },
      { cause: error },
    );
  }
}

// ============================================================
// Types
// ============================================================

export type LocalSqliteBackendOptions = Readonly<{
  /**
   * Path to the SQLite database file.
   * Defaults to ":memory:" for an in-memory database.
   */
  path?: string;
  tables?: SqliteTables;
  /** Drizzle query logger, called with every statement the backend runs */
  queryLogger?: DrizzleLogger;
}>;

export type LocalSqliteBackendResult = Readonly<{
  backend: PurgeBackend;
  /**
   * The underlying Drizzle database instance.
   * Useful for direct SQL access or cleanup.
   */
  db: BetterSQLite3Database;
}>;

// ============================================================
// Factory Function
// ============================================================

/**
 * Creates a SQLite backend with minimal configuration.
 *
 * Handles database creation, table creation and backend setup. For
 * production deployments use createSqliteBackend with your own
 * Drizzle database instance.
 */
export function createLocalSqliteBackend(
  options: LocalSqliteBackendOptions = {},
): LocalSqliteBackendResult {
  const path = options.path ?? ":memory:";
  const tables = options.tables ?? defaultTables;

  const sqlite = createDatabase(path);
  const db =
    options.queryLogger === undefined ?
      drizzle(sqlite)
    : drizzle(sqlite, { logger: options.queryLogger });

  for (const statement of generateSqliteDDL(tables)) {
    sqlite.exec(statement);
  }

  const backend = createSqliteBackend(db, {
    executionProfile: { isSync: true },
    tables,
  });
  let isClosed = false;

  function close(): Promise<void> {
    if (isClosed) return Promise.resolve();
    isClosed = true;
    sqlite.close();
    return Promise.resolve();
  }

  const managedBackend: PurgeBackend = { ...backend, close };

  return { backend: managedBackend, db };
}
