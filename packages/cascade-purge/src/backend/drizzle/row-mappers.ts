/**
 * Shared row-mapping utilities for Drizzle backend adapters.
 */
import { z } from "zod";

import { DatabaseOperationError } from "../../errors";
import type {
  BatchStatus,
  OrphanBatchRow,
  PurgeTaskRow,
  RecordRow,
  TaskStatus,
} from "../types";

function requireTimestamp(value: string | undefined, field: string): string {
  if (value === undefined) {
    throw new DatabaseOperationError(
      `Expected non-null ${field} timestamp`,
      { operation: "select", entity: "row" },
    );
  }
  return value;
}

export function nowIso(): string {
  return new Date().toISOString();
}

function nullToUndefined<T>(value: T | null): T | undefined {
  return value ?? undefined;
}

/**
 * Formats a PostgreSQL timestamp value to ISO string.
 * PostgreSQL returns Date objects or timestamp strings that need normalization.
 */
export function formatPostgresTimestamp(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") {
    if (value.includes("T")) return value;
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) return date.toISOString();
    return value;
  }
  return undefined;
}

/**
 * Normalizes a JSON column that may be returned as a parsed value (JSONB) or string.
 */
function normalizeJsonColumn(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value ?? {});
}

/**
 * Dialect-specific configuration for row mappers.
 *
 * The `formatTimestamp` and `normalizeJson` functions handle
 * the differences between how SQLite and PostgreSQL return timestamps
 * and JSON columns.
 */
type DialectRowMapperConfig = Readonly<{
  formatTimestamp: (value: unknown) => string | undefined;
  normalizeJson: (value: unknown) => string;
}>;

/**
 * SQLite row mapper config.
 * Timestamps are stored as ISO strings; JSON is stored as TEXT.
 */
export const SQLITE_ROW_MAPPER_CONFIG: DialectRowMapperConfig = {
  formatTimestamp: (value) => nullToUndefined(value as string | null),
  normalizeJson: (value) => value as string,
};

/**
 * PostgreSQL row mapper config.
 * Timestamps may be Date objects or PG-format strings; JSONB is parsed values.
 */
export const POSTGRES_ROW_MAPPER_CONFIG: DialectRowMapperConfig = {
  formatTimestamp: formatPostgresTimestamp,
  normalizeJson: normalizeJsonColumn,
};

// ============================================================
// Column Schemas
// ============================================================

const batchStatusSchema: z.ZodType<BatchStatus> = z.enum(["pending", "scheduled", "failed"]);

const taskStatusSchema: z.ZodType<TaskStatus> = z.enum([
  "pending",
  "running",
  "completed",
  "failed_retryable",
  "failed_terminal",
]);

const identifierListSchema = z.array(z.string());

const taskFailureListSchema = z.array(
  z.object({
    id: z.string(),
    code: z.string(),
    message: z.string(),
    attempts: z.number().int(),
    permanent: z.boolean(),
  }),
);

function parseJsonColumn<T>(
  schema: z.ZodType<T>,
  raw: string,
  column: string,
): T {
  return parseColumn(schema, JSON.parse(raw), column);
}

function parseColumn<T>(schema: z.ZodType<T>, value: unknown, column: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DatabaseOperationError(
      `Malformed ${column} column: ${result.error.message}`,
      { operation: "select", entity: column },
      { cause: result.error },
    );
  }
  return result.data;
}

function toCount(value: unknown): number {
  return typeof value === "number" ? value : Number(value);
}

// Trust boundary: Drizzle raw SQL returns Record<string, unknown> rows.
// The field access patterns below are intentional unsafe casts at the
// database driver boundary where we know the column shapes.

export function createRecordRowMapper(
  config: DialectRowMapperConfig,
): (row: Record<string, unknown>) => RecordRow {
  return (row) => ({
    schema_id: row.schema_id as string,
    kind: row.kind as string,
    id: row.id as string,
    props: config.normalizeJson(row.props),
    created_at: requireTimestamp(config.formatTimestamp(row.created_at), "created_at"),
    updated_at: requireTimestamp(config.formatTimestamp(row.updated_at), "updated_at"),
  });
}

export function createBatchRowMapper(
  config: DialectRowMapperConfig,
): (row: Record<string, unknown>) => OrphanBatchRow {
  return (row) => ({
    schemaId: row.schema_id as string,
    id: row.id as string,
    relation: row.relation as string,
    parentKind: row.parent_kind as string,
    parentId: row.parent_id as string,
    childKind: row.child_kind as string,
    ids: parseJsonColumn(identifierListSchema, config.normalizeJson(row.ids), "ids"),
    status: parseColumn(batchStatusSchema, row.status, "status"),
    errorReport: parseJsonColumn(
      taskFailureListSchema,
      config.normalizeJson(row.error_report),
      "error_report",
    ),
    createdAt: requireTimestamp(config.formatTimestamp(row.created_at), "created_at"),
    updatedAt: requireTimestamp(config.formatTimestamp(row.updated_at), "updated_at"),
    scheduledAt: nullToUndefined(config.formatTimestamp(row.scheduled_at)),
  });
}

export function createTaskRowMapper(
  config: DialectRowMapperConfig,
): (row: Record<string, unknown>) => PurgeTaskRow {
  return (row) => ({
    schemaId: row.schema_id as string,
    id: row.id as string,
    batchId: row.batch_id as string,
    relation: row.relation as string,
    childKind: row.child_kind as string,
    chunkIndex: toCount(row.chunk_index),
    ids: parseJsonColumn(identifierListSchema, config.normalizeJson(row.ids), "ids"),
    remainingIds: parseJsonColumn(
      identifierListSchema,
      config.normalizeJson(row.remaining_ids),
      "remaining_ids",
    ),
    status: parseColumn(taskStatusSchema, row.status, "status"),
    attempts: toCount(row.attempts),
    maxAttempts: toCount(row.max_attempts),
    failures: parseJsonColumn(
      taskFailureListSchema,
      config.normalizeJson(row.failures),
      "failures",
    ),
    lastError: nullToUndefined(row.last_error as string | null),
    retryAt: nullToUndefined(config.formatTimestamp(row.retry_at)),
    createdAt: requireTimestamp(config.formatTimestamp(row.created_at), "created_at"),
    updatedAt: requireTimestamp(config.formatTimestamp(row.updated_at), "updated_at"),
    completedAt: nullToUndefined(config.formatTimestamp(row.completed_at)),
  });
}

export function readCount(row: Record<string, unknown> | undefined): number {
  return row === undefined ? 0 : toCount(row.count);
}
