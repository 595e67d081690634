/**
 * Backend interface types for purge storage.
 *
 * The backend abstracts database operations, allowing different
 * SQL implementations (SQLite, PostgreSQL) behind a common interface.
 */

// ============================================================
// SQL Dialect
// ============================================================

export type SqlDialect = "sqlite" | "postgres";

// ============================================================
// Row Types
// ============================================================

/**
 * Record row as stored in the database.
 */
export type RecordRow = Readonly<{
  schema_id: string;
  kind: string;
  id: string;
  /** JSON-encoded props */
  props: string;
  created_at: string;
  updated_at: string;
}>;

export type BatchStatus = "pending" | "scheduled" | "failed";

export type TaskStatus =
  | "pending"
  | "running"
  | "completed"
  | "failed_retryable"
  | "failed_terminal";

/**
 * One identifier a purge task could not destroy.
 */
export type TaskFailure = Readonly<{
  id: string;
  code: string;
  message: string;
  attempts: number;
  /** True when the error is not retried (e.g. PermanentRecordError) */
  permanent: boolean;
}>;

/**
 * The children detached from one parent by one relation.
 */
export type OrphanBatchRow = Readonly<{
  schemaId: string;
  id: string;
  relation: string;
  parentKind: string;
  parentId: string;
  childKind: string;
  /** Sorted, unique child identifiers */
  ids: readonly string[];
  status: BatchStatus;
  errorReport: readonly TaskFailure[];
  createdAt: string;
  updatedAt: string;
  scheduledAt: string | undefined;
}>;

/**
 * One chunk of an orphan batch, destroyed by one queue message.
 */
export type PurgeTaskRow = Readonly<{
  schemaId: string;
  /** `${batchId}:${chunkIndex}` */
  id: string;
  batchId: string;
  relation: string;
  childKind: string;
  chunkIndex: number;
  ids: readonly string[];
  /** Identifiers not yet destroyed or given up on */
  remainingIds: readonly string[];
  status: TaskStatus;
  attempts: number;
  maxAttempts: number;
  failures: readonly TaskFailure[];
  lastError: string | undefined;
  retryAt: string | undefined;
  createdAt: string;
  updatedAt: string;
  completedAt: string | undefined;
}>;

// ============================================================
// Operation Parameters
// ============================================================

export type InsertRecordParams = Readonly<{
  schemaId: string;
  kind: string;
  id: string;
  props: Record<string, unknown>;
}>;

export type UpdateRecordParams = InsertRecordParams;

export type DeleteRecordParams = Readonly<{
  schemaId: string;
  kind: string;
  id: string;
}>;

export type FindRecordsParams = Readonly<{
  schemaId: string;
  kind: string;
  limit?: number;
  offset?: number;
}>;

export type NullifyForeignKeyParams = Readonly<{
  schemaId: string;
  childKind: string;
  foreignKey: string;
  parentId: string;
}>;

export type InsertBatchParams = Readonly<{
  schemaId: string;
  id: string;
  relation: string;
  parentKind: string;
  parentId: string;
  childKind: string;
  ids: readonly string[];
}>;

export type UpdateBatchParams = Readonly<{
  schemaId: string;
  id: string;
  status: BatchStatus;
  errorReport?: readonly TaskFailure[];
  scheduledAt?: string;
}>;

export type ListBatchesParams = Readonly<{
  schemaId: string;
  statuses: readonly BatchStatus[];
}>;

export type InsertTaskParams = Readonly<{
  schemaId: string;
  id: string;
  batchId: string;
  relation: string;
  childKind: string;
  chunkIndex: number;
  ids: readonly string[];
  maxAttempts: number;
}>;

export type ListTasksParams = Readonly<{
  schemaId: string;
  batchId?: string;
  statuses?: readonly TaskStatus[];
}>;

/**
 * Writes the mutable state of a task.
 *
 * With `expectedStatus` the write only applies while the task is still in
 * that status, and `undefined` is returned when it is not.
 */
export type UpdateTaskParams = Readonly<{
  schemaId: string;
  id: string;
  status: TaskStatus;
  expectedStatus?: TaskStatus;
  remainingIds: readonly string[];
  failures: readonly TaskFailure[];
  lastError: string | undefined;
  retryAt: string | undefined;
  completedAt: string | undefined;
}>;

// ============================================================
// Backend Interface
// ============================================================

/**
 * Backend operations available inside and outside a transaction.
 */
export type TransactionBackend = Omit<PurgeBackend, "transaction" | "close">;

/**
 * The PurgeBackend interface abstracts database operations.
 *
 * Implementations:
 * - SQLite via any Drizzle SQLite driver (better-sqlite3, libsql)
 * - PostgreSQL via node-postgres or PGlite
 */
export type PurgeBackend = Readonly<{
  dialect: SqlDialect;

  // === Record Operations ===
  insertRecord: (params: InsertRecordParams) => Promise<RecordRow>;
  getRecord: (
    schemaId: string,
    kind: string,
    id: string,
  ) => Promise<RecordRow | undefined>;
  updateRecord: (params: UpdateRecordParams) => Promise<RecordRow | undefined>;
  /** Returns false when the record did not exist */
  deleteRecord: (params: DeleteRecordParams) => Promise<boolean>;
  countRecords: (schemaId: string, kind: string) => Promise<number>;
  findRecords: (params: FindRecordsParams) => Promise<readonly RecordRow[]>;

  /**
   * Clears the foreign key on every child referencing the parent in a
   * single statement, returning the affected child identifiers.
   */
  nullifyForeignKey: (
    params: NullifyForeignKeyParams,
  ) => Promise<readonly string[]>;

  // === Orphan Batch Operations ===
  insertBatch: (params: InsertBatchParams) => Promise<OrphanBatchRow>;
  getBatch: (
    schemaId: string,
    id: string,
  ) => Promise<OrphanBatchRow | undefined>;
  /** Reads the batch and holds a row lock until the transaction ends */
  lockBatch: (
    schemaId: string,
    id: string,
  ) => Promise<OrphanBatchRow | undefined>;
  listBatches: (params: ListBatchesParams) => Promise<readonly OrphanBatchRow[]>;
  updateBatch: (params: UpdateBatchParams) => Promise<OrphanBatchRow | undefined>;
  /** Deletes the batch and its tasks */
  deleteBatch: (schemaId: string, id: string) => Promise<void>;

  // === Purge Task Operations ===
  /** Inserts tasks, ignoring IDs that already exist */
  insertTasks: (params: readonly InsertTaskParams[]) => Promise<void>;
  getTask: (schemaId: string, id: string) => Promise<PurgeTaskRow | undefined>;
  listTasks: (params: ListTasksParams) => Promise<readonly PurgeTaskRow[]>;
  updateTask: (params: UpdateTaskParams) => Promise<PurgeTaskRow | undefined>;
  /**
   * Atomically moves a pending task to running and counts the attempt.
   * Returns undefined when the task is missing, not pending, or its
   * `retryAt` is still ahead.
   */
  claimTask: (schemaId: string, id: string) => Promise<PurgeTaskRow | undefined>;

  // === Maintenance ===
  /** Deletes all records, batches and tasks of a schema */
  clear: (schemaId: string) => Promise<void>;

  // === Transactions ===
  transaction: <T>(fn: (tx: TransactionBackend) => Promise<T>) => Promise<T>;

  close: () => Promise<void>;
}>;
