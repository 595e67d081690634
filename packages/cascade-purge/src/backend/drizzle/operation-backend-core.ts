import { type SQL } from "drizzle-orm";

import { DatabaseOperationError, toStoreError } from "../../errors";
import type {
  DeleteRecordParams,
  FindRecordsParams,
  InsertBatchParams,
  InsertRecordParams,
  InsertTaskParams,
  ListBatchesParams,
  ListTasksParams,
  NullifyForeignKeyParams,
  OrphanBatchRow,
  PurgeTaskRow,
  RecordRow,
  TransactionBackend,
  UpdateBatchParams,
  UpdateRecordParams,
  UpdateTaskParams,
} from "../types";
import { type OperationStrategy } from "./operations/strategy";
import { nowIso as defaultNowIso, readCount } from "./row-mappers";

type CommonOperationBackend = Omit<TransactionBackend, "dialect">;

type OperationBackendExecution = Readonly<{
  execAll: <TRow>(query: SQL) => Promise<readonly TRow[]>;
  execGet: <TRow>(query: SQL) => Promise<TRow | undefined>;
  execRun: (query: SQL) => Promise<void>;
}>;

type OperationBackendRowMappers = Readonly<{
  toRecordRow: (row: Record<string, unknown>) => RecordRow;
  toBatchRow: (row: Record<string, unknown>) => OrphanBatchRow;
  toTaskRow: (row: Record<string, unknown>) => PurgeTaskRow;
}>;

type CreateCommonOperationBackendOptions = Readonly<{
  /** Rows per multi-row INSERT, bounded by the driver's bind parameter limit */
  taskInsertBatchSize: number;
  execution: OperationBackendExecution;
  nowIso?: (() => string) | undefined;
  operationStrategy: OperationStrategy;
  rowMappers: OperationBackendRowMappers;
}>;

function chunkArray<T>(
  values: readonly T[],
  size: number,
): readonly (readonly T[])[] {
  if (values.length <= size) {
    return [values];
  }

  const chunks: T[][] = [];
  for (let index = 0; index < values.length; index += size) {
    chunks.push(values.slice(index, index + size));
  }
  return chunks;
}

/**
 * Runs a statement, translating driver errors into the library's hierarchy.
 */
async function translated<T>(operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw toStoreError(error, operation);
  }
}

export function createCommonOperationBackend(
  options: CreateCommonOperationBackendOptions,
): CommonOperationBackend {
  const { execution, operationStrategy, rowMappers, taskInsertBatchSize } = options;
  const nowIso = options.nowIso ?? defaultNowIso;

  async function execGetRow(
    operation: string,
    query: SQL,
  ): Promise<Record<string, unknown> | undefined> {
    return translated(operation, () =>
      execution.execGet<Record<string, unknown>>(query),
    );
  }

  async function execAllRows(
    operation: string,
    query: SQL,
  ): Promise<readonly Record<string, unknown>[]> {
    return translated(operation, () =>
      execution.execAll<Record<string, unknown>>(query),
    );
  }

  async function execRun(operation: string, query: SQL): Promise<void> {
    await translated(operation, () => execution.execRun(query));
  }

  return {
    // === Records ===

    async insertRecord(params: InsertRecordParams): Promise<RecordRow> {
      const query = operationStrategy.buildInsertRecord(params, nowIso());
      const row = await execGetRow("insert record", query);
      if (!row) {
        throw new DatabaseOperationError("Insert record failed: no row returned", {
          operation: "insert",
          entity: "record",
        });
      }
      return rowMappers.toRecordRow(row);
    },

    async getRecord(
      schemaId: string,
      kind: string,
      id: string,
    ): Promise<RecordRow | undefined> {
      const query = operationStrategy.buildGetRecord(schemaId, kind, id);
      const row = await execGetRow("get record", query);
      return row ? rowMappers.toRecordRow(row) : undefined;
    },

    async updateRecord(params: UpdateRecordParams): Promise<RecordRow | undefined> {
      const query = operationStrategy.buildUpdateRecord(params, nowIso());
      const row = await execGetRow("update record", query);
      return row ? rowMappers.toRecordRow(row) : undefined;
    },

    async deleteRecord(params: DeleteRecordParams): Promise<boolean> {
      const query = operationStrategy.buildDeleteRecord(params);
      const rows = await execAllRows("delete record", query);
      return rows.length > 0;
    },

    async countRecords(schemaId: string, kind: string): Promise<number> {
      const query = operationStrategy.buildCountRecords(schemaId, kind);
      return readCount(await execGetRow("count records", query));
    },

    async findRecords(params: FindRecordsParams): Promise<readonly RecordRow[]> {
      const query = operationStrategy.buildFindRecords(params);
      const rows = await execAllRows("find records", query);
      return rows.map((row) => rowMappers.toRecordRow(row));
    },

    async nullifyForeignKey(
      params: NullifyForeignKeyParams,
    ): Promise<readonly string[]> {
      const query = operationStrategy.buildNullifyForeignKey(params, nowIso());
      const rows = await execAllRows("nullify foreign key", query);
      return rows.map((row) => row.id as string);
    },

    // === Orphan Batches ===

    async insertBatch(params: InsertBatchParams): Promise<OrphanBatchRow> {
      const query = operationStrategy.buildInsertBatch(params, nowIso());
      const row = await execGetRow("insert orphan batch", query);
      if (!row) {
        throw new DatabaseOperationError("Insert orphan batch failed: no row returned", {
          operation: "insert",
          entity: "orphan batch",
        });
      }
      return rowMappers.toBatchRow(row);
    },

    async getBatch(
      schemaId: string,
      id: string,
    ): Promise<OrphanBatchRow | undefined> {
      const query = operationStrategy.buildGetBatch(schemaId, id);
      const row = await execGetRow("get orphan batch", query);
      return row ? rowMappers.toBatchRow(row) : undefined;
    },

    async lockBatch(
      schemaId: string,
      id: string,
    ): Promise<OrphanBatchRow | undefined> {
      const query = operationStrategy.buildLockBatch(schemaId, id);
      const row = await execGetRow("lock orphan batch", query);
      return row ? rowMappers.toBatchRow(row) : undefined;
    },

    async listBatches(
      params: ListBatchesParams,
    ): Promise<readonly OrphanBatchRow[]> {
      if (params.statuses.length === 0) return [];
      const query = operationStrategy.buildListBatches(params);
      const rows = await execAllRows("list orphan batches", query);
      return rows.map((row) => rowMappers.toBatchRow(row));
    },

    async updateBatch(
      params: UpdateBatchParams,
    ): Promise<OrphanBatchRow | undefined> {
      const query = operationStrategy.buildUpdateBatch(params, nowIso());
      const row = await execGetRow("update orphan batch", query);
      return row ? rowMappers.toBatchRow(row) : undefined;
    },

    async deleteBatch(schemaId: string, id: string): Promise<void> {
      for (const query of operationStrategy.buildDeleteBatch(schemaId, id)) {
        await execRun("delete orphan batch", query);
      }
    },

    // === Purge Tasks ===

    async insertTasks(params: readonly InsertTaskParams[]): Promise<void> {
      if (params.length === 0) {
        return;
      }
      const timestamp = nowIso();
      for (const chunk of chunkArray(params, taskInsertBatchSize)) {
        const query = operationStrategy.buildInsertTasks(chunk, timestamp);
        await execRun("insert purge tasks", query);
      }
    },

    async getTask(
      schemaId: string,
      id: string,
    ): Promise<PurgeTaskRow | undefined> {
      const query = operationStrategy.buildGetTask(schemaId, id);
      const row = await execGetRow("get purge task", query);
      return row ? rowMappers.toTaskRow(row) : undefined;
    },

    async listTasks(params: ListTasksParams): Promise<readonly PurgeTaskRow[]> {
      const query = operationStrategy.buildListTasks(params);
      const rows = await execAllRows("list purge tasks", query);
      return rows.map((row) => rowMappers.toTaskRow(row));
    },

    async updateTask(
      params: UpdateTaskParams,
    ): Promise<PurgeTaskRow | undefined> {
      const query = operationStrategy.buildUpdateTask(params, nowIso());
      const row = await execGetRow("update purge task", query);
      return row ? rowMappers.toTaskRow(row) : undefined;
    },

    async claimTask(
      schemaId: string,
      id: string,
    ): Promise<PurgeTaskRow | undefined> {
      const query = operationStrategy.buildClaimTask(schemaId, id, nowIso());
      const row = await execGetRow("claim purge task", query);
      return row ? rowMappers.toTaskRow(row) : undefined;
    },

    // === Maintenance ===

    async clear(schemaId: string): Promise<void> {
      for (const query of operationStrategy.buildClearSchema(schemaId)) {
        await execRun("clear schema", query);
      }
    },
  };
}
