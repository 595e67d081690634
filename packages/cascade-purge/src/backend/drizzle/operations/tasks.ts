import { type SQL, sql } from "drizzle-orm";

import type {
  InsertTaskParams,
  ListTasksParams,
  UpdateTaskParams,
} from "../../types";
import {
  columnList,
  jsonParam,
  quotedColumn,
  sqlList,
  sqlNull,
  type Tables,
} from "./shared";

/**
 * Builds a batched INSERT for purge tasks that skips existing IDs,
 * so a batch can be scheduled more than once.
 */
export function buildInsertTasks(
  tables: Tables,
  params: readonly InsertTaskParams[],
  timestamp: string,
): SQL {
  const { tasks } = tables;
  const columns = columnList([
    tasks.schemaId,
    tasks.id,
    tasks.batchId,
    tasks.relation,
    tasks.childKind,
    tasks.chunkIndex,
    tasks.ids,
    tasks.remainingIds,
    tasks.status,
    tasks.attempts,
    tasks.maxAttempts,
    tasks.failures,
    tasks.createdAt,
    tasks.updatedAt,
  ]);
  const values = params.map((task) => {
    const ids = jsonParam(task.ids);
    return sql`(${task.schemaId}, ${task.id}, ${task.batchId}, ${task.relation}, ${task.childKind}, ${task.chunkIndex}, ${ids}, ${ids}, 'pending', 0, ${task.maxAttempts}, ${jsonParam([])}, ${timestamp}, ${timestamp})`;
  });

  return sql`
    INSERT INTO ${tasks} (${columns})
    VALUES ${sql.join(values, sql`, `)}
    ON CONFLICT DO NOTHING
  `;
}

export function buildGetTask(
  tables: Tables,
  schemaId: string,
  id: string,
): SQL {
  const { tasks } = tables;

  return sql`
    SELECT * FROM ${tasks}
    WHERE ${tasks.schemaId} = ${schemaId}
      AND ${tasks.id} = ${id}
  `;
}

export function buildListTasks(tables: Tables, params: ListTasksParams): SQL {
  const { tasks } = tables;

  const conditions: SQL[] = [sql`${tasks.schemaId} = ${params.schemaId}`];
  if (params.batchId !== undefined) {
    conditions.push(sql`${tasks.batchId} = ${params.batchId}`);
  }
  if (params.statuses !== undefined) {
    if (params.statuses.length === 0) {
      conditions.push(sql`1 = 0`);
    } else {
      conditions.push(sql`${tasks.status} IN (${sqlList(params.statuses)})`);
    }
  }

  return sql`
    SELECT * FROM ${tasks}
    WHERE ${sql.join(conditions, sql` AND `)}
    ORDER BY ${tasks.batchId} ASC, ${tasks.chunkIndex} ASC
  `;
}

/**
 * Builds an UPDATE writing a task's mutable state.
 * Uses raw column names in SET clause (required by SQL syntax).
 */
export function buildUpdateTask(
  tables: Tables,
  params: UpdateTaskParams,
  timestamp: string,
): SQL {
  const { tasks } = tables;

  const setClause = sql.join(
    [
      sql`${quotedColumn(tasks.status)} = ${params.status}`,
      sql`${quotedColumn(tasks.remainingIds)} = ${jsonParam(params.remainingIds)}`,
      sql`${quotedColumn(tasks.failures)} = ${jsonParam(params.failures)}`,
      sql`${quotedColumn(tasks.lastError)} = ${sqlNull(params.lastError)}`,
      sql`${quotedColumn(tasks.retryAt)} = ${sqlNull(params.retryAt)}`,
      sql`${quotedColumn(tasks.completedAt)} = ${sqlNull(params.completedAt)}`,
      sql`${quotedColumn(tasks.updatedAt)} = ${timestamp}`,
    ],
    sql`, `,
  );

  const guard =
    params.expectedStatus === undefined ?
      sql``
    : sql` AND ${tasks.status} = ${params.expectedStatus}`;

  return sql`
    UPDATE ${tasks}
    SET ${setClause}
    WHERE ${tasks.schemaId} = ${params.schemaId}
      AND ${tasks.id} = ${params.id}${guard}
    RETURNING *
  `;
}

/**
 * Builds the compare-and-set that claims a pending task for one consumer.
 * A task waiting out its retry delay is not claimed before `retry_at`.
 */
export function buildClaimTask(
  tables: Tables,
  schemaId: string,
  id: string,
  timestamp: string,
): SQL {
  const { tasks } = tables;
  const attempts = quotedColumn(tasks.attempts);

  return sql`
    UPDATE ${tasks}
    SET ${quotedColumn(tasks.status)} = 'running',
        ${attempts} = ${attempts} + 1,
        ${quotedColumn(tasks.updatedAt)} = ${timestamp}
    WHERE ${tasks.schemaId} = ${schemaId}
      AND ${tasks.id} = ${id}
      AND ${tasks.status} = 'pending'
      AND (${tasks.retryAt} IS NULL OR ${tasks.retryAt} <= ${timestamp})
    RETURNING *
  `;
}
