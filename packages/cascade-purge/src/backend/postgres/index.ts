/**
 * PostgreSQL backend for cascade-purge.
 *
 * @example
 * ```typescript
 * import { drizzle } from "drizzle-orm/node-postgres";
 * import { Pool } from "pg";
 * import { createPostgresBackend, getPostgresMigrationSQL } from "cascade-purge/postgres";
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * await pool.query(getPostgresMigrationSQL());
 * const backend = createPostgresBackend(drizzle(pool));
 * ```
 */

export {
  type AnyPgDatabase,
  createPostgresBackend,
  createPostgresTables,
  type PostgresBackendOptions,
  type PostgresTableNames,
  type PostgresTables,
  tables,
} from "../drizzle/postgres";

export { batches, records, tasks } from "../drizzle/schema/postgres";

export { generatePostgresDDL, getPostgresMigrationSQL } from "../drizzle/ddl";
