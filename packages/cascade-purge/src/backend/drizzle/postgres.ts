/**
 * PostgreSQL backend adapter for cascade-purge.
 *
 * Works with any Drizzle PostgreSQL database instance:
 * - node-postgres (pg)
 * - PGlite
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { createPostgresBackend } from "cascade-purge/postgres";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const backend = createPostgresBackend(drizzle(pool));
 * ```
 */
import { type SQL } from "drizzle-orm";
import { type PgDatabase, type PgQueryResultHKT } from "drizzle-orm/pg-core";

import type { PurgeBackend, TransactionBackend } from "../types";
import { createCommonOperationBackend } from "./operation-backend-core";
import {
  createPostgresOperationStrategy,
  type OperationStrategy,
} from "./operations/strategy";
import {
  createBatchRowMapper,
  createRecordRowMapper,
  createTaskRowMapper,
  nowIso,
  POSTGRES_ROW_MAPPER_CONFIG,
} from "./row-mappers";
import {
  type PostgresTables,
  tables as defaultTables,
} from "./schema/postgres";

// ============================================================
// Types
// ============================================================

export type AnyPgDatabase = PgDatabase<PgQueryResultHKT, Record<string, unknown>>;

export type PostgresBackendOptions = Readonly<{
  /**
   * Custom table definitions. Use createPostgresTables() to customize table names.
   */
  tables?: PostgresTables;
}>;

const POSTGRES_MAX_BIND_PARAMETERS = 65_535;
const TASK_INSERT_PARAM_COUNT = 12;
const POSTGRES_TASK_INSERT_BATCH_SIZE = Math.max(
  1,
  Math.floor(POSTGRES_MAX_BIND_PARAMETERS / TASK_INSERT_PARAM_COUNT),
);

// ============================================================
// Utilities
// ============================================================

const toRecordRow = createRecordRowMapper(POSTGRES_ROW_MAPPER_CONFIG);
const toBatchRow = createBatchRowMapper(POSTGRES_ROW_MAPPER_CONFIG);
const toTaskRow = createTaskRowMapper(POSTGRES_ROW_MAPPER_CONFIG);

// ============================================================
// Backend Factory
// ============================================================

/**
 * Creates a purge backend for PostgreSQL databases.
 *
 * Works with any Drizzle PostgreSQL instance regardless of the underlying driver.
 * Transactions use the driver's own `db.transaction`; concurrent purge
 * tasks each take a pooled connection.
 */
export function createPostgresBackend(
  db: AnyPgDatabase,
  options: PostgresBackendOptions = {},
): PurgeBackend {
  const tables = options.tables ?? defaultTables;
  const operationStrategy = createPostgresOperationStrategy(tables);
  const operations = createPostgresOperationBackend({ db, operationStrategy });

  return {
    ...operations,

    async transaction<T>(
      fn: (tx: TransactionBackend) => Promise<T>,
    ): Promise<T> {
      return db.transaction(async (tx) => {
        const txBackend = createPostgresOperationBackend({
          db: tx as AnyPgDatabase,
          operationStrategy,
        });
        return fn(txBackend);
      });
    },

    async close(): Promise<void> {
      // Connection lifecycle is managed by the caller's pool
    },
  };
}

type CreatePostgresOperationBackendOptions = Readonly<{
  db: AnyPgDatabase;
  operationStrategy: OperationStrategy;
}>;

function createPostgresOperationBackend(
  options: CreatePostgresOperationBackendOptions,
): TransactionBackend {
  const { db, operationStrategy } = options;

  async function execAll<T>(query: SQL): Promise<T[]> {
    const result = (await db.execute(query)) as Readonly<{
      rows: T[];
    }>;
    return result.rows;
  }

  async function execGet<T>(query: SQL): Promise<T | undefined> {
    const result = (await db.execute(query)) as Readonly<{
      rows: T[];
    }>;
    return result.rows[0];
  }

  async function execRun(query: SQL): Promise<void> {
    await db.execute(query);
  }

  const commonBackend = createCommonOperationBackend({
    taskInsertBatchSize: POSTGRES_TASK_INSERT_BATCH_SIZE,
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
    dialect: "postgres",
  };
}

// Re-export schema utilities
export type { PostgresTableNames, PostgresTables } from "./schema/postgres";
export { createPostgresTables, tables } from "./schema/postgres";
