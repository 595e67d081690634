import { type SQL, sql } from "drizzle-orm";

import type {
  DeleteRecordParams,
  FindRecordsParams,
  InsertRecordParams,
  NullifyForeignKeyParams,
  SqlDialect,
  UpdateRecordParams,
} from "../../types";
import { columnList, jsonParam, quotedColumn, type Tables } from "./shared";

/**
 * Builds an INSERT query for a record.
 */
export function buildInsertRecord(
  tables: Tables,
  params: InsertRecordParams,
  timestamp: string,
): SQL {
  const { records } = tables;
  const columns = columnList([
    records.schemaId,
    records.kind,
    records.id,
    records.props,
    records.createdAt,
    records.updatedAt,
  ]);

  return sql`
    INSERT INTO ${records} (${columns})
    VALUES (
      ${params.schemaId}, ${params.kind}, ${params.id}, ${jsonParam(params.props)},
      ${timestamp}, ${timestamp}
    )
    RETURNING *
  `;
}

export function buildGetRecord(
  tables: Tables,
  schemaId: string,
  kind: string,
  id: string,
): SQL {
  const { records } = tables;

  return sql`
    SELECT * FROM ${records}
    WHERE ${records.schemaId} = ${schemaId}
      AND ${records.kind} = ${kind}
      AND ${records.id} = ${id}
  `;
}

/**
 * Builds an UPDATE query replacing a record's props.
 * Uses raw column names in SET clause (required by SQL syntax).
 */
export function buildUpdateRecord(
  tables: Tables,
  params: UpdateRecordParams,
  timestamp: string,
): SQL {
  const { records } = tables;

  return sql`
    UPDATE ${records}
    SET ${quotedColumn(records.props)} = ${jsonParam(params.props)},
        ${quotedColumn(records.updatedAt)} = ${timestamp}
    WHERE ${records.schemaId} = ${params.schemaId}
      AND ${records.kind} = ${params.kind}
      AND ${records.id} = ${params.id}
    RETURNING *
  `;
}

export function buildDeleteRecord(
  tables: Tables,
  params: DeleteRecordParams,
): SQL {
  const { records } = tables;

  return sql`
    DELETE FROM ${records}
    WHERE ${records.schemaId} = ${params.schemaId}
      AND ${records.kind} = ${params.kind}
      AND ${records.id} = ${params.id}
    RETURNING ${quotedColumn(records.id)}
  `;
}

export function buildCountRecords(
  tables: Tables,
  schemaId: string,
  kind: string,
): SQL {
  const { records } = tables;

  return sql`
    SELECT COUNT(*) AS count FROM ${records}
    WHERE ${records.schemaId} = ${schemaId}
      AND ${records.kind} = ${kind}
  `;
}

export function buildFindRecords(
  tables: Tables,
  dialect: SqlDialect,
  params: FindRecordsParams,
): SQL {
  const { records } = tables;
  const base = sql`
    SELECT * FROM ${records}
    WHERE ${records.schemaId} = ${params.schemaId}
      AND ${records.kind} = ${params.kind}
    ORDER BY ${records.createdAt} ASC, ${records.id} ASC
  `;

  if (params.limit !== undefined) {
    return sql`${base} LIMIT ${params.limit} OFFSET ${params.offset ?? 0}`;
  }
  if (params.offset !== undefined) {
    // SQLite requires a LIMIT before OFFSET; -1 means unbounded.
    return dialect === "postgres" ?
        sql`${base} OFFSET ${params.offset}`
      : sql`${base} LIMIT -1 OFFSET ${params.offset}`;
  }
  return base;
}

/**
 * Builds the single UPDATE that detaches every child of a parent.
 *
 * The foreign key has been validated as a plain identifier when the
 * relation was declared, so it is safe to use as a JSON path segment.
 */
export function buildNullifyForeignKey(
  tables: Tables,
  dialect: SqlDialect,
  params: NullifyForeignKeyParams,
  timestamp: string,
): SQL {
  const { records } = tables;
  const props = quotedColumn(records.props);

  if (dialect === "postgres") {
    return sql`
      UPDATE ${records}
      SET ${props} = jsonb_set(${props}, ARRAY[${params.foreignKey}::text], 'null'::jsonb),
          ${quotedColumn(records.updatedAt)} = ${timestamp}
      WHERE ${records.schemaId} = ${params.schemaId}
        AND ${records.kind} = ${params.childKind}
        AND ${props} ->> ${params.foreignKey}::text = ${params.parentId}
      RETURNING ${quotedColumn(records.id)}
    `;
  }

  const path = `$.${params.foreignKey}`;
  return sql`
    UPDATE ${records}
    SET ${props} = json_set(${props}, ${path}, NULL),
        ${quotedColumn(records.updatedAt)} = ${timestamp}
    WHERE ${records.schemaId} = ${params.schemaId}
      AND ${records.kind} = ${params.childKind}
      AND json_extract(${props}, ${path}) = ${params.parentId}
    RETURNING ${quotedColumn(records.id)}
  `;
}
