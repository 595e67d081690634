import type {
  InsertTaskParams,
  OrphanBatchRow,
  PurgeBackend,
  PurgeTaskRow,
} from "../backend/types";
import { ConfigurationError } from "../errors";
import { componentLogger } from "../logging";
import { msUntil, nowIso, purgeTaskId } from "../utils";
import type { PurgeContext } from "./context";
import { isOpenStatus, OPEN_TASK_STATUSES } from "./task-state";

// ============================================================
// Chunking
// ============================================================

/**
 * Splits identifiers into consecutive chunks of at most `size`.
 *
 * Order is preserved, every identifier lands in exactly one chunk and no
 * chunk is empty.
 *
 * @throws ConfigurationError when size is not a positive integer
 */
export function chunkIdentifiers(
  ids: readonly string[],
  size: number,
): readonly (readonly string[])[] {
  if (!Number.isInteger(size) || size < 1) {
    throw new ConfigurationError(
      `Purge batch size must be a positive integer, got ${size}`,
      { batchSize: size },
    );
  }

  const chunks: string[][] = [];
  for (let index = 0; index < ids.length; index += size) {
    chunks.push(ids.slice(index, index + size));
  }
  return chunks;
}

// ============================================================
// Scheduling
// ============================================================

export type ScheduleResult = Readonly<{
  batchId: string;
  /** Every task of the batch, in chunk order */
  taskIds: readonly string[];
  /** Tasks handed to the queue (the non-terminal ones) */
  enqueuedTaskIds: readonly string[];
}>;

/**
 * Enqueues an open task, delayed until its `retryAt` while that is ahead.
 */
export async function enqueueTask(
  ctx: PurgeContext,
  task: PurgeTaskRow,
): Promise<string> {
  const delayMs = msUntil(task.retryAt);
  return ctx.queue.enqueue(
    { schemaId: ctx.schemaId, taskId: task.id },
    delayMs > 0 ? { delayMs } : undefined,
  );
}

function resolveBatchSize(ctx: PurgeContext, relation: string): number {
  return ctx.registry.relations.get(relation)?.batchSize ?? ctx.config.batchSize;
}

/**
 * Fans an orphan batch out into purge tasks.
 *
 * Task rows and the batch status change commit together; messages are
 * enqueued only after the commit. Task IDs derive from the batch ID and
 * chunk index, so scheduling a batch again adds no task twice and only
 * re-enqueues tasks that are still open. If an enqueue fails the batch
 * returns to `pending` and the error is rethrown.
 */
export async function scheduleBatch(
  ctx: PurgeContext,
  batch: OrphanBatchRow,
): Promise<ScheduleResult> {
  const logger = componentLogger(ctx.logger, "scheduler");
  const chunks = chunkIdentifiers(batch.ids, resolveBatchSize(ctx, batch.relation));

  const tasks: InsertTaskParams[] = chunks.map((ids, chunkIndex) => ({
    schemaId: ctx.schemaId,
    id: purgeTaskId(batch.id, chunkIndex),
    batchId: batch.id,
    relation: batch.relation,
    childKind: batch.childKind,
    chunkIndex,
    ids,
    maxAttempts: ctx.config.maxAttempts,
  }));

  const openTasks = await ctx.backend.transaction(async (tx) => {
    await tx.insertTasks(tasks);
    await tx.updateBatch({
      schemaId: ctx.schemaId,
      id: batch.id,
      status: "scheduled",
      scheduledAt: nowIso(),
    });
    return tx.listTasks({
      schemaId: ctx.schemaId,
      batchId: batch.id,
      statuses: OPEN_TASK_STATUSES,
    });
  });

  const enqueuedTaskIds: string[] = [];
  try {
    for (const task of openTasks) {
      await enqueueTask(ctx, task);
      enqueuedTaskIds.push(task.id);
    }
  } catch (error) {
    // Back to pending so listPendingBatches() and recover() find it
    await ctx.backend.updateBatch({
      schemaId: ctx.schemaId,
      id: batch.id,
      status: "pending",
    });
    throw error;
  }

  logger.info(
    {
      batchId: batch.id,
      relation: batch.relation,
      ids: batch.ids.length,
      tasks: tasks.length,
      enqueued: enqueuedTaskIds.length,
    },
    "orphan batch scheduled",
  );

  return {
    batchId: batch.id,
    taskIds: tasks.map((task) => task.id),
    enqueuedTaskIds,
  };
}

// ============================================================
// Settling
// ============================================================

export type SettleOutcome = "missing" | "open" | "completed" | "failed";

/**
 * Closes out a batch once all of its tasks are terminal.
 *
 * The batch row is locked for the duration, so two consumers finishing
 * the last tasks of a batch at once settle it once. A fully completed
 * batch is deleted with its tasks; otherwise the batch is kept as
 * `failed` with every task failure in its error report.
 */
export async function settleBatch(
  backend: PurgeBackend,
  schemaId: string,
  batchId: string,
): Promise<SettleOutcome> {
  return backend.transaction(async (tx) => {
    const batch = await tx.lockBatch(schemaId, batchId);
    if (batch === undefined) return "missing";
    if (batch.status === "pending") return "open";

    const tasks = await tx.listTasks({ schemaId, batchId });
    if (tasks.some((task) => isOpenStatus(task.status))) return "open";

    if (tasks.every((task) => task.status === "completed")) {
      await tx.deleteBatch(schemaId, batchId);
      return "completed";
    }

    if (batch.status !== "failed") {
      await tx.updateBatch({
        schemaId,
        id: batchId,
        status: "failed",
        errorReport: tasks.flatMap((task) => task.failures),
      });
    }
    return "failed";
  });
}
