import { type SQL } from "drizzle-orm";

import type {
  DeleteRecordParams,
  FindRecordsParams,
  InsertBatchParams,
  InsertRecordParams,
  InsertTaskParams,
  ListBatchesParams,
  ListTasksParams,
  NullifyForeignKeyParams,
  SqlDialect,
  UpdateBatchParams,
  UpdateRecordParams,
  UpdateTaskParams,
} from "../../types";
import type { PostgresTables } from "../schema/postgres";
import type { SqliteTables } from "../schema/sqlite";
import {
  buildClearSchema,
  buildDeleteBatch,
  buildGetBatch,
  buildInsertBatch,
  buildListBatches,
  buildLockBatch,
  buildUpdateBatch,
} from "./batches";
import {
  buildCountRecords,
  buildDeleteRecord,
  buildFindRecords,
  buildGetRecord,
  buildInsertRecord,
  buildNullifyForeignKey,
  buildUpdateRecord,
} from "./records";
import type { Tables } from "./shared";
import {
  buildClaimTask,
  buildGetTask,
  buildInsertTasks,
  buildListTasks,
  buildUpdateTask,
} from "./tasks";

export type OperationStrategy = Readonly<{
  buildInsertRecord: (params: InsertRecordParams, timestamp: string) => SQL;
  buildGetRecord: (schemaId: string, kind: string, id: string) => SQL;
  buildUpdateRecord: (params: UpdateRecordParams, timestamp: string) => SQL;
  buildDeleteRecord: (params: DeleteRecordParams) => SQL;
  buildCountRecords: (schemaId: string, kind: string) => SQL;
  buildFindRecords: (params: FindRecordsParams) => SQL;
  buildNullifyForeignKey: (
    params: NullifyForeignKeyParams,
    timestamp: string,
  ) => SQL;
  buildInsertBatch: (params: InsertBatchParams, timestamp: string) => SQL;
  buildGetBatch: (schemaId: string, id: string) => SQL;
  buildLockBatch: (schemaId: string, id: string) => SQL;
  buildListBatches: (params: ListBatchesParams) => SQL;
  buildUpdateBatch: (params: UpdateBatchParams, timestamp: string) => SQL;
  buildDeleteBatch: (schemaId: string, id: string) => readonly SQL[];
  buildInsertTasks: (
    params: readonly InsertTaskParams[],
    timestamp: string,
  ) => SQL;
  buildGetTask: (schemaId: string, id: string) => SQL;
  buildListTasks: (params: ListTasksParams) => SQL;
  buildUpdateTask: (params: UpdateTaskParams, timestamp: string) => SQL;
  buildClaimTask: (schemaId: string, id: string, timestamp: string) => SQL;
  buildClearSchema: (schemaId: string) => readonly SQL[];
}>;

type TableOperationBuilder = (
  tables: Tables,
  ...args: never[]
) => SQL | readonly SQL[];

type TableOperationBuilderMap = Readonly<Record<string, TableOperationBuilder>>;

type BoundTableOperationBuilderMap<TBuilders extends TableOperationBuilderMap> = Readonly<{
  [K in keyof TBuilders]: TBuilders[K] extends (
    tables: Tables,
    ...args: infer TArguments
  ) => infer TResult
    ? (...args: TArguments) => TResult
    : never;
}>;

function bindTableOperationBuilders<TBuilders extends TableOperationBuilderMap>(
  tables: Tables,
  builders: TBuilders,
): BoundTableOperationBuilderMap<TBuilders> {
  const boundEntries = Object.entries(builders).map(([name, builder]) => {
    function boundBuilder(...args: never[]): SQL | readonly SQL[] {
      return builder(tables, ...args);
    }

    return [name, boundBuilder] as const;
  });

  return Object.fromEntries(boundEntries) as BoundTableOperationBuilderMap<TBuilders>;
}

const COMMON_TABLE_OPERATION_BUILDERS = {
  buildInsertRecord,
  buildGetRecord,
  buildUpdateRecord,
  buildDeleteRecord,
  buildCountRecords,
  buildInsertBatch,
  buildGetBatch,
  buildListBatches,
  buildUpdateBatch,
  buildDeleteBatch,
  buildInsertTasks,
  buildGetTask,
  buildListTasks,
  buildUpdateTask,
  buildClaimTask,
  buildClearSchema,
} as const satisfies TableOperationBuilderMap;

function createOperationStrategy(
  tables: Tables,
  dialect: SqlDialect,
): OperationStrategy {
  const tableOperations = bindTableOperationBuilders(
    tables,
    COMMON_TABLE_OPERATION_BUILDERS,
  );

  return {
    ...tableOperations,
    buildFindRecords(params: FindRecordsParams): SQL {
      return buildFindRecords(tables, dialect, params);
    },
    buildNullifyForeignKey(
      params: NullifyForeignKeyParams,
      timestamp: string,
    ): SQL {
      return buildNullifyForeignKey(tables, dialect, params, timestamp);
    },
    buildLockBatch(schemaId: string, id: string): SQL {
      return buildLockBatch(tables, dialect, schemaId, id);
    },
  };
}

export function createSqliteOperationStrategy(
  tables: SqliteTables,
): OperationStrategy {
  return createOperationStrategy(tables, "sqlite");
}

export function createPostgresOperationStrategy(
  tables: PostgresTables,
): OperationStrategy {
  return createOperationStrategy(tables, "postgres");
}
