import { type SQL, sql } from "drizzle-orm";

import type {
  InsertBatchParams,
  ListBatchesParams,
  SqlDialect,
  UpdateBatchParams,
} from "../../types";
import {
  columnList,
  jsonParam,
  quotedColumn,
  sqlList,
  type Tables,
} from "./shared";

export function buildInsertBatch(
  tables: Tables,
  params: InsertBatchParams,
  timestamp: string,
): SQL {
  const { batches } = tables;
  const columns = columnList([
    batches.schemaId,
    batches.id,
    batches.relation,
    batches.parentKind,
    batches.parentId,
    batches.childKind,
    batches.ids,
    batches.status,
    batches.errorReport,
    batches.createdAt,
    batches.updatedAt,
  ]);

  return sql`
    INSERT INTO ${batches} (${columns})
    VALUES (
      ${params.schemaId}, ${params.id}, ${params.relation}, ${params.parentKind},
      ${params.parentId}, ${params.childKind}, ${jsonParam(params.ids)}, 'pending',
      ${jsonParam([])}, ${timestamp}, ${timestamp}
    )
    RETURNING *
  `;
}

export function buildGetBatch(
  tables: Tables,
  schemaId: string,
  id: string,
): SQL {
  const { batches } = tables;

  return sql`
    SELECT * FROM ${batches}
    WHERE ${batches.schemaId} = ${schemaId}
      AND ${batches.id} = ${id}
  `;
}

/**
 * SQLite has no row locks; its writers are already serialized, so the
 * plain read inside the transaction is enough.
 */
export function buildLockBatch(
  tables: Tables,
  dialect: SqlDialect,
  schemaId: string,
  id: string,
): SQL {
  const query = buildGetBatch(tables, schemaId, id);
  return dialect === "postgres" ? sql`${query} FOR UPDATE` : query;
}

export function buildListBatches(
  tables: Tables,
  params: ListBatchesParams,
): SQL {
  const { batches } = tables;

  return sql`
    SELECT * FROM ${batches}
    WHERE ${batches.schemaId} = ${params.schemaId}
      AND ${batches.status} IN (${sqlList(params.statuses)})
    ORDER BY ${batches.createdAt} ASC, ${batches.id} ASC
  `;
}

/**
 * Builds an UPDATE query for a batch's status.
 * Uses raw column names in SET clause (required by SQL syntax).
 */
export function buildUpdateBatch(
  tables: Tables,
  params: UpdateBatchParams,
  timestamp: string,
): SQL {
  const { batches } = tables;

  const setParts: SQL[] = [
    sql`${quotedColumn(batches.status)} = ${params.status}`,
    sql`${quotedColumn(batches.updatedAt)} = ${timestamp}`,
  ];

  if (params.errorReport !== undefined) {
    setParts.push(
      sql`${quotedColumn(batches.errorReport)} = ${jsonParam(params.errorReport)}`,
    );
  }

  if (params.scheduledAt !== undefined) {
    setParts.push(sql`${quotedColumn(batches.scheduledAt)} = ${params.scheduledAt}`);
  }

  return sql`
    UPDATE ${batches}
    SET ${sql.join(setParts, sql`, `)}
    WHERE ${batches.schemaId} = ${params.schemaId}
      AND ${batches.id} = ${params.id}
    RETURNING *
  `;
}

/**
 * Builds DELETE statements for a batch, tasks first.
 */
export function buildDeleteBatch(
  tables: Tables,
  schemaId: string,
  id: string,
): readonly SQL[] {
  const { batches, tasks } = tables;

  return [
    sql`DELETE FROM ${tasks} WHERE ${tasks.schemaId} = ${schemaId} AND ${tasks.batchId} = ${id}`,
    sql`DELETE FROM ${batches} WHERE ${batches.schemaId} = ${schemaId} AND ${batches.id} = ${id}`,
  ];
}

/**
 * Builds DELETE FROM statements for all tables filtered by schema_id.
 */
export function buildClearSchema(
  tables: Tables,
  schemaId: string,
): readonly SQL[] {
  return [
    sql`DELETE FROM ${tables.tasks} WHERE ${tables.tasks.schemaId} = ${schemaId}`,
    sql`DELETE FROM ${tables.batches} WHERE ${tables.batches.schemaId} = ${schemaId}`,
    sql`DELETE FROM ${tables.records} WHERE ${tables.records.schemaId} = ${schemaId}`,
  ];
}
