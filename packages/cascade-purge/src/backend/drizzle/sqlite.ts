/**
 * SQLite backend adapter for cascade-purge.
 *
 * Works with any Drizzle SQLite database instance:
 * - better-sqlite3
 * - libsql / Turso
 * - sql.js
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
import { type SQL, sql } from "drizzle-orm";
import { type BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

import type { PurgeBackend, TransactionBackend } from "../types";
import { createCommonOperationBackend } from "./operation-backend-core";
import {
  createSqliteOperationStrategy,
  type OperationStrategy,
} from "./operations/strategy";
import {
  createBatchRowMapper,
  createRecordRowMapper,
  createTaskRowMapper,
  nowIso,
  SQLITE_ROW_MAPPER_CONFIG,
} from "./row-mappers";
import { type SqliteTables, tables as defaultTables } from "./schema/sqlite";

// ============================================================
// Types
// ============================================================

export type AnySqliteDatabase = BaseSQLiteDatabase<"sync" | "async", unknown>;

export type SqliteExecutionProfileHints = Readonly<{
  /** Set for drivers that execute synchronously (better-sqlite3, bun:sqlite) */
  isSync?: boolean;
}>;

export type SqliteBackendOptions = Readonly<{
  /**
   * Custom table definitions. Use createSqliteTables() to customize table names.
   */
  tables?: SqliteTables;
  /**
   * Optional execution profile hints used to avoid runtime driver reflection.
   */
  executionProfile?: SqliteExecutionProfileHints;
}>;

const SQLITE_MAX_BIND_PARAMETERS = 999;
const TASK_INSERT_PARAM_COUNT = 12;
const SQLITE_TASK_INSERT_BATCH_SIZE = Math.max(
  1,
  Math.floor(SQLITE_MAX_BIND_PARAMETERS / TASK_INSERT_PARAM_COUNT),
);

type SerializedExecutionQueue = Readonly<{
  runExclusive: <T>(task: () => Promise<T>) => Promise<T>;
}>;

type SessionLike = Readonly<{
  constructor?: Readonly<{
    name?: string;
  }>;
}>;

type DatabaseWithSession = Readonly<{
  session?: SessionLike;
}>;

// ============================================================
// Utilities
// ============================================================

const toRecordRow = createRecordRowMapper(SQLITE_ROW_MAPPER_CONFIG);
const toBatchRow = createBatchRowMapper(SQLITE_ROW_MAPPER_CONFIG);
const toTaskRow = createTaskRowMapper(SQLITE_ROW_MAPPER_CONFIG);

function createSerializedExecutionQueue(): SerializedExecutionQueue {
  let tail: Promise<unknown> = Promise.resolve();

  return {
    async runExclusive<T>(task: () => Promise<T>): Promise<T> {
      const runTask = async (): Promise<T> => task();
      const result = tail.then(runTask, runTask);
      tail = result.then(
        () => 0,
        () => 0,
      );
      return result;
    },
  };
}

async function runWithSerializedQueue<T>(
  queue: SerializedExecutionQueue | undefined,
  task: () => Promise<T>,
): Promise<T> {
  if (queue === undefined) return task();
  return queue.runExclusive(task);
}

function detectSyncProfile(
  db: AnySqliteDatabase,
  profileHints: SqliteExecutionProfileHints,
): boolean {
  if (profileHints.isSync !== undefined) {
    return profileHints.isSync;
  }
  const sessionName = (db as DatabaseWithSession).session?.constructor?.name;
  return (
    sessionName === "BetterSQLiteSession" || sessionName === "BunSQLiteSession"
  );
}

// ============================================================
// Backend Factory
// ============================================================

type CreateSqliteOperationBackendOptions = Readonly<{
  db: AnySqliteDatabase;
  operationStrategy: OperationStrategy;
  serializedQueue?: SerializedExecutionQueue;
}>;

function createSqliteOperationBackend(
  options: CreateSqliteOperationBackendOptions,
): TransactionBackend {
  const { db, operationStrategy, serializedQueue } = options;

  async function execGet<T>(query: SQL): Promise<T | undefined> {
    return runWithSerializedQueue(serializedQueue, async () => {
      const result = db.get(query);
      return (result instanceof Promise ? await result : result) as T | undefined;
    });
  }

  async function execAll<T>(query: SQL): Promise<T[]> {
    return runWithSerializedQueue(serializedQueue, async () => {
      const result = db.all(query);
      return (result instanceof Promise ? await result : result) as T[];
    });
  }

  async function execRun(query: SQL): Promise<void> {
    await runWithSerializedQueue(serializedQueue, async () => {
      const result = db.run(query);
      if (result instanceof Promise) await result;
    });
  }

  const commonBackend = createCommonOperationBackend({
    taskInsertBatchSize: SQLITE_TASK_INSERT_BATCH_SIZE,
    execution: {
      execAll,
      execGet,
      execRun,
    },
    nowIso,
    operationStrategy,
    rowMappers: {
      toBatchRow,
      toRecordRow,
      toTaskRow,
    },
  });

  return {
    ...commonBackend,
    dialect: "sqlite",
  };
}

/**
 * Creates a purge backend for SQLite databases.
 *
 * Works with any Drizzle SQLite instance regardless of the underlying driver.
 * Synchronous drivers have every statement and transaction serialized
 * through one queue, so a transaction never interleaves with other work.
 */
export function createSqliteBackend(
  db: AnySqliteDatabase,
  options: SqliteBackendOptions = {},
): PurgeBackend {
  const tables = options.tables ?? defaultTables;
  const isSync = detectSyncProfile(db, options.executionProfile ?? {});
  const operationStrategy = createSqliteOperationStrategy(tables);
  const serializedQueue = isSync ? createSerializedExecutionQueue() : undefined;
  const operations = createSqliteOperationBackend({
    db,
    operationStrategy,
    ...(serializedQueue === undefined ? {} : { serializedQueue }),
  });

  return {
    ...operations,

    async transaction<T>(
      fn: (tx: TransactionBackend) => Promise<T>,
    ): Promise<T> {
      if (isSync) {
        return runWithSerializedQueue(serializedQueue, async () => {
          const txBackend = createSqliteOperationBackend({
            db,
            operationStrategy,
          });
          db.run(sql`BEGIN`);

          try {
            const result = await fn(txBackend);
            db.run(sql`COMMIT`);
            return result;
          } catch (error) {
            db.run(sql`ROLLBACK`);
            throw error;
          }
        });
      }

      return db.transaction(async (tx) => {
        const txBackend = createSqliteOperationBackend({
          db: tx as AnySqliteDatabase,
          operationStrategy,
        });
        return fn(txBackend);
      }) as Promise<T>;
    },

    async close(): Promise<void> {
      // Drizzle doesn't expose a close method
      // Users manage connection lifecycle themselves
    },
  };
}

// Re-export schema utilities
export type { SqliteTableNames, SqliteTables } from "./schema/sqlite";
export { createSqliteTables, tables } from "./schema/sqlite";
