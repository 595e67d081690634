import { describe, expect, it } from "vitest";

import type { OrphanBatchRow, PurgeBackend, TaskFailure } from "../src/backend/types";
import { listPendingBatches, markOrphans } from "../src/purge/orphan-marker";
import { scheduleBatch, settleBatch } from "../src/purge/scheduler";
import { createTestContext, sequentialIds } from "./test-utils";

async function seedBatch(
  backend: PurgeBackend,
  relation: Readonly<{ name: string; parentKind: string; childKind: string }>,
  ids: readonly string[],
): Promise<OrphanBatchRow> {
  const batch = await markOrphans(backend, {
    schemaId: "blog",
    relation,
    parentId: "post-1",
    ids,
    idGenerator: sequentialIds("batch"),
  });
  if (batch === undefined) throw new Error("expected a batch");
  return batch;
}

const comments = { name: "comments", parentKind: "Post", childKind: "Comment" };
const likes = { name: "likes", parentKind: "Post", childKind: "Like" };

async function finishTask(
  backend: PurgeBackend,
  id: string,
  status: "completed" | "failed_terminal",
  failures: readonly TaskFailure[] = [],
): Promise<void> {
  await backend.updateTask({
    schemaId: "blog",
    id,
    status,
    remainingIds: [],
    failures,
    lastError: undefined,
    retryAt: undefined,
    completedAt: "2026-01-01T00:00:00.000Z",
  });
}

describe("scheduleBatch()", () => {
  it("splits a batch into tasks of the relation's batch size", async () => {
    const ctx = createTestContext();
    const batch = await seedBatch(ctx.backend, comments, ["c1", "c2", "c3", "c4", "c5"]);

    const result = await scheduleBatch(ctx, batch);

    expect(result).toEqual({
      batchId: "batch-1",
      taskIds: ["batch-1:0", "batch-1:1", "batch-1:2"],
      enqueuedTaskIds: ["batch-1:0", "batch-1:1", "batch-1:2"],
    });
    const tasks = await ctx.backend.listTasks({ schemaId: "blog", batchId: "batch-1" });
    expect(tasks.map((task) => task.ids)).toEqual([["c1", "c2"], ["c3", "c4"], ["c5"]]);
    expect(tasks[0]).toMatchObject({
      relation: "comments",
      childKind: "Comment",
      chunkIndex: 0,
      remainingIds: ["c1", "c2"],
      status: "pending",
      attempts: 0,
      maxAttempts: 5,
      failures: [],
    });
  });

  it("marks the batch scheduled and enqueues one message per task", async () => {
    const ctx = createTestContext();
    const batch = await seedBatch(ctx.backend, comments, ["c1", "c2", "c3"]);

    await scheduleBatch(ctx, batch);

    const stored = await ctx.backend.getBatch("blog", "batch-1");
    expect(stored?.status).toBe("scheduled");
    expect(stored?.scheduledAt).toEqual(expect.any(String));
    expect(ctx.queue.messages).toEqual([
      { payload: { schemaId: "blog", taskId: "batch-1:0" }, delayMs: undefined },
      { payload: { schemaId: "blog", taskId: "batch-1:1" }, delayMs: undefined },
    ]);
  });

  it("falls back to the configured batch size", async () => {
    const ctx = createTestContext({ config: { batchSize: 3 } });
    const batch = await seedBatch(ctx.backend, likes, ["l1", "l2", "l3", "l4"]);

    const result = await scheduleBatch(ctx, batch);

    expect(result.taskIds).toEqual(["batch-1:0", "batch-1:1"]);
  });

  it("adds no task twice and re-enqueues only open tasks", async () => {
    const ctx = createTestContext();
    const batch = await seedBatch(ctx.backend, comments, ["c1", "c2", "c3"]);
    await scheduleBatch(ctx, batch);
    await finishTask(ctx.backend, "batch-1:0", "completed");

    const again = await scheduleBatch(ctx, batch);

    expect(again.taskIds).toEqual(["batch-1:0", "batch-1:1"]);
    expect(again.enqueuedTaskIds).toEqual(["batch-1:1"]);
    await expect(
      ctx.backend.listTasks({ schemaId: "blog", batchId: "batch-1" }),
    ).resolves.toHaveLength(2);
    expect(ctx.queue.messages.map((message) => message.payload.taskId)).toEqual([
      "batch-1:0",
      "batch-1:1",
      "batch-1:1",
    ]);
  });

  it("returns the batch to pending when enqueueing fails", async () => {
    const ctx = createTestContext();
    const batch = await seedBatch(ctx.backend, comments, ["c1", "c2", "c3"]);
    const failing = {
      ...ctx,
      queue: { enqueue: () => Promise.reject(new Error("broker unavailable")) },
    };

    await expect(scheduleBatch(failing, batch)).rejects.toThrow("broker unavailable");

    const stored = await ctx.backend.getBatch("blog", "batch-1");
    expect(stored?.status).toBe("pending");
    const pending = await listPendingBatches(ctx.backend, "blog");
    expect(pending.map((row) => row.id)).toEqual(["batch-1"]);
    await expect(
      ctx.backend.listTasks({ schemaId: "blog", batchId: "batch-1" }),
    ).resolves.toHaveLength(2);
  });
});

describe("settleBatch()", () => {
  const failure: TaskFailure = {
    id: "c3",
    code: "PERMANENT_RECORD_ERROR",
    message: "Comment c3 is on legal hold",
    attempts: 1,
    permanent: true,
  };

  it("reports a missing batch", async () => {
    const ctx = createTestContext();

    await expect(settleBatch(ctx.backend, "blog", "batch-9")).resolves.toBe("missing");
  });

  it("leaves an unscheduled batch open", async () => {
    const ctx = createTestContext();
    await seedBatch(ctx.backend, comments, ["c1"]);

    await expect(settleBatch(ctx.backend, "blog", "batch-1")).resolves.toBe("open");
  });

  it("leaves a batch open while any task is open", async () => {
    const ctx = createTestContext();
    await scheduleBatch(ctx, await seedBatch(ctx.backend, comments, ["c1", "c2", "c3"]));
    await finishTask(ctx.backend, "batch-1:0", "completed");

    await expect(settleBatch(ctx.backend, "blog", "batch-1")).resolves.toBe("open");
  });

  it("deletes a batch whose tasks all completed", async () => {
    const ctx = createTestContext();
    await scheduleBatch(ctx, await seedBatch(ctx.backend, comments, ["c1", "c2", "c3"]));
    await finishTask(ctx.backend, "batch-1:0", "completed");
    await finishTask(ctx.backend, "batch-1:1", "completed");

    await expect(settleBatch(ctx.backend, "blog", "batch-1")).resolves.toBe("completed");
    await expect(ctx.backend.getBatch("blog", "batch-1")).resolves.toBeUndefined();
    await expect(
      ctx.backend.listTasks({ schemaId: "blog", batchId: "batch-1" }),
    ).resolves.toEqual([]);
  });

  it("keeps a failed batch with every task failure", async () => {
    const ctx = createTestContext();
    await scheduleBatch(ctx, await seedBatch(ctx.backend, comments, ["c1", "c2", "c3"]));
    await finishTask(ctx.backend, "batch-1:0", "completed");
    await finishTask(ctx.backend, "batch-1:1", "failed_terminal", [failure]);

    await expect(settleBatch(ctx.backend, "blog", "batch-1")).resolves.toBe("failed");
    await expect(settleBatch(ctx.backend, "blog", "batch-1")).resolves.toBe("failed");

    const batch = await ctx.backend.getBatch("blog", "batch-1");
    expect(batch?.status).toBe("failed");
    expect(batch?.errorReport).toEqual([failure]);
  });
});
