/**
 * DDL generation for the purge tables.
 *
 * Statements are generated from the Drizzle table definitions so the
 * local and test databases match the production schema.
 */
import {
  getTableConfig as getPgTableConfig,
  type PgColumn,
} from "drizzle-orm/pg-core";
import {
  getTableConfig as getSqliteTableConfig,
  type SQLiteColumn,
} from "drizzle-orm/sqlite-core";

import { type PostgresTables, tables as postgresTables } from "./schema/postgres";
import { type SqliteTables, tables as sqliteTables } from "./schema/sqlite";

type IndexColumn = Readonly<{ name: string }>;

function renderIndexColumn(column: unknown): string {
  if (typeof column === "object" && column !== null && "name" in column) {
    return `"${(column as IndexColumn).name}"`;
  }
  throw new Error("Only column indexes are supported in generated DDL");
}

// ============================================================
// SQLite DDL Generation
// ============================================================

function getSqliteColumnType(column: SQLiteColumn): string {
  switch (column.columnType) {
    case "SQLiteInteger": {
      return "INTEGER";
    }
    case "SQLiteReal": {
      return "REAL";
    }
    default: {
      return "TEXT";
    }
  }
}

function formatSqliteDefaultValue(value: unknown): string {
  if (value === null) return "NULL";
  if (typeof value === "string") return `'${value.replaceAll("'", "''")}'`;
  if (typeof value === "number") return String(value);
  if (typeof value === "boolean") return value ? "1" : "0";
  return `'${JSON.stringify(value)}'`;
}

function generateSqliteTableDDL(table: SqliteTables[keyof SqliteTables]): string[] {
  const config = getSqliteTableConfig(table);
  const columnDefs: string[] = [];

  for (const column of config.columns) {
    const parts: string[] = [`"${column.name}"`, getSqliteColumnType(column)];
    if (column.notNull) {
      parts.push("NOT NULL");
    }
    if (column.hasDefault && column.default !== undefined) {
      parts.push(`DEFAULT ${formatSqliteDefaultValue(column.default)}`);
    }
    columnDefs.push(parts.join(" "));
  }

  const pk = config.primaryKeys[0];
  if (pk) {
    const pkColumns = pk.columns.map((c) => `"${c.name}"`).join(", ");
    columnDefs.push(`PRIMARY KEY (${pkColumns})`);
  }

  const statements = [
    `CREATE TABLE IF NOT EXISTS "${config.name}" (\n  ${columnDefs.join(",\n  ")}\n);`,
  ];

  for (const index of config.indexes) {
    const columns = index.config.columns.map((c) => renderIndexColumn(c)).join(", ");
    const unique = index.config.unique ? "UNIQUE " : "";
    statements.push(
      `CREATE ${unique}INDEX IF NOT EXISTS "${index.config.name}" ON "${config.name}" (${columns});`,
    );
  }

  return statements;
}

/**
 * Generates all DDL statements for the given SQLite tables.
 */
export function generateSqliteDDL(tables: SqliteTables = sqliteTables): string[] {
  return Object.values(tables).flatMap((table) => generateSqliteTableDDL(table));
}

/**
 * Generates a single SQL string for SQLite migrations.
 */
export function getSqliteMigrationSQL(tables: SqliteTables = sqliteTables): string {
  return generateSqliteDDL(tables).join("\n\n");
}

// ============================================================
// PostgreSQL DDL Generation
// ============================================================

function getPgColumnType(column: PgColumn): string {
  switch (column.columnType) {
    case "PgInteger": {
      return "INTEGER";
    }
    case "PgJsonb": {
      return "JSONB";
    }
    case "PgTimestamp":
    case "PgTimestampString": {
      return "TIMESTAMPTZ";
    }
    default: {
      return "TEXT";
    }
  }
}

function formatPgDefaultValue(value: unknown): string {
  if (value === null) return "NULL";
  if (typeof value === "string") return `'${value.replaceAll("'", "''")}'`;
  if (typeof value === "number") return String(value);
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  return `'${JSON.stringify(value)}'::jsonb`;
}

function generatePgTableDDL(table: PostgresTables[keyof PostgresTables]): string[] {
  const config = getPgTableConfig(table);
  const columnDefs: string[] = [];

  for (const column of config.columns) {
    const parts: string[] = [`"${column.name}"`, getPgColumnType(column)];
    if (column.notNull) {
      parts.push("NOT NULL");
    }
    if (column.hasDefault && column.default !== undefined) {
      parts.push(`DEFAULT ${formatPgDefaultValue(column.default)}`);
    }
    columnDefs.push(parts.join(" "));
  }

  const pk = config.primaryKeys[0];
  if (pk) {
    const pkColumns = pk.columns.map((c) => `"${c.name}"`).join(", ");
    columnDefs.push(`PRIMARY KEY (${pkColumns})`);
  }

  const statements = [
    `CREATE TABLE IF NOT EXISTS "${config.name}" (\n  ${columnDefs.join(",\n  ")}\n);`,
  ];

  for (const index of config.indexes) {
    const columns = index.config.columns.map((c) => renderIndexColumn(c)).join(", ");
    const unique = index.config.unique ? "UNIQUE " : "";
    statements.push(
      `CREATE ${unique}INDEX IF NOT EXISTS "${index.config.name}" ON "${config.name}" (${columns});`,
    );
  }

  return statements;
}

/**
 * Generates all DDL statements for the given PostgreSQL tables.
 */
export function generatePostgresDDL(
  tables: PostgresTables = postgresTables,
): string[] {
  return Object.values(tables).flatMap((table) => generatePgTableDDL(table));
}

/**
 * Generates a single SQL string for PostgreSQL migrations.
 */
export function getPostgresMigrationSQL(
  tables: PostgresTables = postgresTables,
): string {
  return generatePostgresDDL(tables).join("\n\n");
}
