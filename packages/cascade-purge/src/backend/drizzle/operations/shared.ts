import { type SQL, sql } from "drizzle-orm";

import type { PostgresTables } from "../schema/postgres";
import type { SqliteTables } from "../schema/sqlite";

export type Tables = SqliteTables | PostgresTables;

/**
 * Converts undefined to SQL NULL for use in template literals.
 * Drizzle doesn't handle undefined in sql`` templates correctly.
 */
export function sqlNull(value: string | undefined): SQL | string {
  return value ?? sql.raw("NULL");
}

export function quotedColumn(column: { name: string }): SQL {
  return sql.raw(`"${column.name.replaceAll('"', '""')}"`);
}

/**
 * Unqualified column list for INSERT statements.
 */
export function columnList(columns: readonly { name: string }[]): SQL {
  return sql.join(
    columns.map((column) => quotedColumn(column)),
    sql`, `,
  );
}

export function sqlList(values: readonly (string | number)[]): SQL {
  return sql.join(
    values.map((value) => sql`${value}`),
    sql`, `,
  );
}

export function jsonParam(value: unknown): string {
  return JSON.stringify(value);
}
