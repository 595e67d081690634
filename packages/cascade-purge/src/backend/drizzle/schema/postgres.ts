/**
 * Drizzle PostgreSQL schema for cascade-purge.
 *
 * @example
 * ```typescript
 * import { createPostgresTables } from "cascade-purge/postgres";
 * const tables = createPostgresTables({ records: "blog_records" });
 * ```
 */
import {
  index,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

import { DEFAULT_TABLE_NAMES, type TableNames } from "./sqlite";

export type PostgresTableNames = TableNames;

/**
 * Creates PostgreSQL table definitions with customizable table names.
 * Index names are derived from table names.
 */
export function createPostgresTables(names: Partial<PostgresTableNames> = {}) {
  const n: PostgresTableNames = { ...DEFAULT_TABLE_NAMES, ...names };

  const records = pgTable(
    n.records,
    {
      schemaId: text("schema_id").notNull(),
      kind: text("kind").notNull(),
      id: text("id").notNull(),
      props: jsonb("props").notNull(),
      createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
      updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
    },
    (t) => [
      primaryKey({ columns: [t.schemaId, t.kind, t.id] }),
      index(`${n.records}_kind_created_idx`).on(t.schemaId, t.kind, t.createdAt),
    ],
  );

  const batches = pgTable(
    n.batches,
    {
      schemaId: text("schema_id").notNull(),
      id: text("id").notNull(),
      relation: text("relation").notNull(),
      parentKind: text("parent_kind").notNull(),
      parentId: text("parent_id").notNull(),
      childKind: text("child_kind").notNull(),
      ids: jsonb("ids").notNull(),
      status: text("status").notNull(),
      errorReport: jsonb("error_report").notNull().default([]),
      createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
      updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
      scheduledAt: timestamp("scheduled_at", { withTimezone: true }),
    },
    (t) => [
      primaryKey({ columns: [t.schemaId, t.id] }),
      index(`${n.batches}_status_idx`).on(t.schemaId, t.status, t.createdAt),
    ],
  );

  const tasks = pgTable(
    n.tasks,
    {
      schemaId: text("schema_id").notNull(),
      id: text("id").notNull(),
      batchId: text("batch_id").notNull(),
      relation: text("relation").notNull(),
      childKind: text("child_kind").notNull(),
      chunkIndex: integer("chunk_index").notNull(),
      ids: jsonb("ids").notNull(),
      remainingIds: jsonb("remaining_ids").notNull(),
      status: text("status").notNull(),
      attempts: integer("attempts").notNull().default(0),
      maxAttempts: integer("max_attempts").notNull(),
      failures: jsonb("failures").notNull().default([]),
      lastError: text("last_error"),
      retryAt: timestamp("retry_at", { withTimezone: true }),
      createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
      updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
      completedAt: timestamp("completed_at", { withTimezone: true }),
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
export const tables = createPostgresTables();

export const { records, batches, tasks } = tables;

export type PostgresTables = ReturnType<typeof createPostgresTables>;
