import type {
  PurgeBackend,
  PurgeTaskRow,
  TaskFailure,
  TaskStatus,
} from "../backend/types";
import { retryDelayMs } from "../config";
import {
  isPurgeError,
  isRetryableError,
  RelationNotFoundError,
} from "../errors";
import { componentLogger, type Logger } from "../logging";
import { isoAfter, msUntil, nowIso } from "../utils";
import type { PurgeContext } from "./context";
import { enqueueTask, type SettleOutcome, settleBatch } from "./scheduler";
import { assertTransition } from "./task-state";

// ============================================================
// Types
// ============================================================

/**
 * - `missing`: no such task, usually because its batch already settled
 * - `skipped`: the task is terminal or claimed by another consumer
 * - `completed`: every identifier was destroyed or already absent
 * - `retrying`: retryable failures remain; the task was re-enqueued
 * - `failed`: the task is `failed_terminal`
 * - `cancelled`: the signal aborted the task; unprocessed identifiers stay
 */
export type TaskOutcomeKind =
  | "missing"
  | "skipped"
  | "completed"
  | "retrying"
  | "failed"
  | "cancelled";

export type TaskOutcome = Readonly<{
  taskId: string;
  outcome: TaskOutcomeKind;
  /** Identifiers destroyed by this run */
  destroyed: number;
  /** Identifiers that no longer existed */
  absent: number;
  /** Identifiers given up on, across all attempts */
  failures: readonly TaskFailure[];
  /** Set when the outcome is `retrying` */
  retryAt?: string;
  /** Set when the task became terminal */
  settled?: SettleOutcome;
}>;

export type RunTaskOptions = Readonly<{
  signal?: AbortSignal;
}>;

type PurgeOne = (backend: PurgeBackend, childId: string) => Promise<boolean>;

type ChunkProgress = {
  destroyed: number;
  absent: number;
  failures: TaskFailure[];
  retry: string[];
  unprocessed: string[];
  lastError: string | undefined;
  cancelled: boolean;
};

// ============================================================
// Helpers
// ============================================================

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toFailure(
  id: string,
  error: unknown,
  attempts: number,
  permanent: boolean,
): TaskFailure {
  return {
    id,
    code: isPurgeError(error) ? error.code : "UNKNOWN_ERROR",
    message: errorMessage(error),
    attempts,
    permanent,
  };
}

async function resolvePurgeHandler(
  ctx: PurgeContext,
  task: PurgeTaskRow,
): Promise<PurgeOne> {
  const entry = ctx.registry.relations.get(task.relation);
  if (entry !== undefined) return entry.handlers.purge;

  // The relation was removed from the schema after the batch was written.
  // Retried like any other error until the task's attempts run out.
  const batch = await ctx.backend.getBatch(ctx.schemaId, task.batchId);
  const error = new RelationNotFoundError(
    batch?.parentKind ?? "(unknown)",
    task.relation,
  );
  return () => Promise.reject(error);
}

async function purgeChunk(
  ctx: PurgeContext,
  task: PurgeTaskRow,
  purge: PurgeOne,
  signal: AbortSignal | undefined,
): Promise<ChunkProgress> {
  const exhausted = task.attempts >= task.maxAttempts;
  const progress: ChunkProgress = {
    destroyed: 0,
    absent: 0,
    failures: [...task.failures],
    retry: [],
    unprocessed: [],
    lastError: undefined,
    cancelled: false,
  };

  for (const [index, id] of task.remainingIds.entries()) {
    if (signal?.aborted === true) {
      progress.cancelled = true;
      progress.unprocessed = task.remainingIds.slice(index);
      break;
    }

    try {
      const existed = await purge(ctx.backend, id);
      if (existed) {
        progress.destroyed++;
      } else {
        progress.absent++;
      }
    } catch (error) {
      if (!isRetryableError(error)) {
        progress.failures.push(toFailure(id, error, task.attempts, true));
      } else if (exhausted) {
        progress.failures.push(toFailure(id, error, task.attempts, false));
      } else {
        progress.retry.push(id);
        progress.lastError = errorMessage(error);
      }
    }
  }

  return progress;
}

async function transitionTask(
  ctx: PurgeContext,
  task: PurgeTaskRow,
  from: TaskStatus,
  to: TaskStatus,
  state: Readonly<{
    remainingIds: readonly string[];
    failures: readonly TaskFailure[];
    lastError?: string;
    retryAt?: string;
    completedAt?: string;
  }>,
): Promise<PurgeTaskRow | undefined> {
  assertTransition(task.id, from, to);
  return ctx.backend.updateTask({
    schemaId: ctx.schemaId,
    id: task.id,
    status: to,
    expectedStatus: from,
    remainingIds: state.remainingIds,
    failures: state.failures,
    lastError: state.lastError,
    retryAt: state.retryAt,
    completedAt: state.completedAt,
  });
}

// ============================================================
// Task Runner
// ============================================================

/**
 * Runs one purge task: destroys every remaining identifier of the chunk
 * through the relation's purge handler.
 *
 * Each identifier is destroyed in its own transaction, so one failure
 * never undoes its siblings. Permanent failures are recorded and skipped;
 * retryable ones keep their identifier for the next attempt. Destroying an
 * absent record counts as success, which makes redelivery harmless.
 */
export async function runPurgeTask(
  ctx: PurgeContext,
  taskId: string,
  options: RunTaskOptions = {},
): Promise<TaskOutcome> {
  const logger = componentLogger(ctx.logger, "destroyer").child({ taskId });

  const task = await ctx.backend.claimTask(ctx.schemaId, taskId);
  if (task === undefined) {
    const existing = await ctx.backend.getTask(ctx.schemaId, taskId);
    const outcome = existing === undefined ? "missing" : "skipped";
    if (existing?.status === "pending" && msUntil(existing.retryAt) > 0) {
      // Delivered before its retry time
      await enqueueTask(ctx, existing);
    }
    logger.debug({ outcome, status: existing?.status }, "purge task not claimed");
    return { taskId, outcome, destroyed: 0, absent: 0, failures: existing?.failures ?? [] };
  }

  logger.debug(
    {
      batchId: task.batchId,
      relation: task.relation,
      ids: task.remainingIds.length,
      attempt: task.attempts,
    },
    "purge task started",
  );

  const purge = await resolvePurgeHandler(ctx, task);
  const progress = await purgeChunk(ctx, task, purge, options.signal);
  const counts = { destroyed: progress.destroyed, absent: progress.absent };

  if (progress.cancelled) {
    return finishCancelled(ctx, task, progress, logger);
  }

  if (progress.retry.length > 0) {
    return finishRetrying(ctx, task, progress, logger);
  }

  const failed = progress.failures.length > 0;
  const status: TaskStatus = failed ? "failed_terminal" : "completed";
  const updated = await transitionTask(ctx, task, "running", status, {
    remainingIds: [],
    failures: progress.failures,
    completedAt: nowIso(),
  });
  if (updated === undefined) {
    logger.warn("purge task changed state while running");
    return { taskId, outcome: "skipped", ...counts, failures: progress.failures };
  }

  if (failed) {
    logger.error(
      { batchId: task.batchId, failures: progress.failures },
      "purge task failed",
    );
  }

  const settled = await settleBatch(ctx.backend, ctx.schemaId, task.batchId);
  if (settled === "completed" || settled === "failed") {
    componentLogger(ctx.logger, "scheduler").info(
      { batchId: task.batchId, relation: task.relation, outcome: settled },
      "orphan batch settled",
    );
  }

  const outcome = failed ? "failed" : "completed";
  logger.debug({ outcome, ...counts }, "purge task finished");
  return { taskId, outcome, ...counts, failures: progress.failures, settled };
}

async function finishCancelled(
  ctx: PurgeContext,
  task: PurgeTaskRow,
  progress: ChunkProgress,
  logger: Logger,
): Promise<TaskOutcome> {
  const remainingIds = [...progress.retry, ...progress.unprocessed];
  await transitionTask(ctx, task, "running", "pending", {
    remainingIds,
    failures: progress.failures,
    lastError: progress.lastError,
  });

  logger.warn({ remaining: remainingIds.length }, "purge task cancelled");
  return {
    taskId: task.id,
    outcome: "cancelled",
    destroyed: progress.destroyed,
    absent: progress.absent,
    failures: progress.failures,
  };
}

async function finishRetrying(
  ctx: PurgeContext,
  task: PurgeTaskRow,
  progress: ChunkProgress,
  logger: Logger,
): Promise<TaskOutcome> {
  const delayMs = retryDelayMs(ctx.config, task.attempts);
  const retryAt = isoAfter(delayMs);
  const state = {
    remainingIds: progress.retry,
    failures: progress.failures,
    lastError: progress.lastError,
  };
  const counts = { destroyed: progress.destroyed, absent: progress.absent };

  const failedRow = await transitionTask(ctx, task, "running", "failed_retryable", state);
  const pendingRow =
    failedRow === undefined ? undefined : (
      await transitionTask(ctx, failedRow, "failed_retryable", "pending", {
        ...state,
        retryAt,
      })
    );
  if (pendingRow === undefined) {
    logger.warn("purge task changed state while running");
    return { taskId: task.id, outcome: "skipped", ...counts, failures: progress.failures };
  }

  await ctx.queue.enqueue({ schemaId: ctx.schemaId, taskId: task.id }, { delayMs });

  logger.warn(
    {
      batchId: task.batchId,
      ids: progress.retry,
      attempt: task.attempts,
      maxAttempts: task.maxAttempts,
      delayMs,
      error: progress.lastError,
    },
    "purge task retrying",
  );
  return {
    taskId: task.id,
    outcome: "retrying",
    ...counts,
    failures: progress.failures,
    retryAt,
  };
}
