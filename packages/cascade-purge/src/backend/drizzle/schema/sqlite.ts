/**
 * Drizzle SQLite schema for cascade-purge.
 *
 * Provides table definitions that can be customized via the factory function.
 * Users import these tables into their Drizzle schema and use drizzle-kit
 * for migrations.
 *
 * @example
 * ```typescript
 * // Default table names
 * import { tables } from "cascade-purge/sqlite";
 *
 * // Custom table names
 * import { createSqliteTables } from "cascade-purge/sqlite";
 * const tables = createSqliteTables({ records: "blog_records" });
 * ```
 */
import {
  index,
  integer,
  primaryKey,
  sqliteTable,
  text,
} from "drizzle-orm/sqlite-core";

/**
 * Table name configuration.
 */
export type TableNames = Readonly<{
  records: string;
  batches: string;
  tasks: string;
}>;

export const DEFAULT_TABLE_NAMES: TableNames = {
  records: "purge_records",
  batches: "purge_orphan_batches",
  tasks: "purge_tasks",
};

/**
 * Creates SQLite table definitions with customizable table names.
 * Index names are derived from table names.
 */
export function createSqliteTables(names: Partial<TableNames> = {}) {
  const n: TableNames = { ...DEFAULT_TABLE_NAMES, ...names };

  const records = sqliteTable(
    n.records,
    {
      schemaId: text("schema_id").notNull(),
      kind: text("kind").notNull(),
      id: text("id").notNull(),
      props: text("props").notNull(),
      createdAt: text("created_at").notNull(),
      updatedAt: text("updated_at").notNull(),
    },
    (t) => [
      primaryKey({ columns: [t.schemaId, t.kind, t.id] }),
      index(`${n.records}_kind_created_idx`).on(t.schemaId, t.kind, t.createdAt),
    ],
  );

  const batches = sqliteTable(
    n.batches,
    {
      schemaId: text("schema_id").notNull(),
      id: text("id").notNull(),
      relation: text("relation").notNull(),
      parentKind: text("parent_kind").notNull(),
      parentId: text("parent_id").notNull(),
      childKind: text("child_kind").notNull(),
      ids: text("ids").notNull(),
      status: text("status").notNull(),
      errorReport: text("error_report").notNull().default("[]"),
      createdAt: text("created_at").notNull(),
      updatedAt: text("updated_at").notNull(),
      scheduledAt: text("scheduled_at"),
    },
    (t) => [
      primaryKey({ columns: [t.schemaId, t.id] }),
      index(`${n.batches}_status_idx`).on(t.schemaId, t.status, t.createdAt),
    ],
  );

  const tasks = sqliteTable(
    n.tasks,
    {
      schemaId: text("schema_id").notNull(),
      id: text("id").notNull(),
      batchId: text("batch_id").notNull(),
      relation: text("relation").notNull(),
      childKind: text("child_kind").notNull(),
      chunkIndex: integer("chunk_index").notNull(),
      ids: text("ids").notNull(),
      remainingIds: text("remaining_ids").notNull(),
      status: text("status").notNull(),
      attempts: integer("attempts").notNull().default(0),
      maxAttempts: integer("max_attempts").notNull(),
      failures: text("failures").notNull().default("[]"),
      lastError: text("last_error"),
      retryAt: text("retry_at"),
      createdAt: text("created_at").notNull(),
      updatedAt: text("updated_at").notNull(),
      completedAt: text("completed_at"),
    },
    (t) => [
      primaryKey({ columns: [t.schemaId, t.id] }),
      index(`${n.tasks}_batch_idx`).on(t.schemaId, t.batchId, t.chunkIndex),
      index(`${n.tasks}_status_idx`).on(t.schemaId, t.status),
    ],
  );

  return { records, batches, tasks } as const;
}

/**
 * Default tables with standard table names.
 */
export const tables = createSqliteTables();

export const { records, batches, tasks } = tables;

export type SqliteTables = ReturnType<typeof createSqliteTables>;

export type SqliteTableNames = TableNames;
