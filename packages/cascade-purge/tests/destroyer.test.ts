import { afterEach, describe, expect, it, vi } from "vitest";

import type { PurgeBackend } from "../src/backend/types";
import { defineSchema } from "../src/core/define-schema";
import { PermanentRecordError, TransientStoreError } from "../src/errors";
import { runPurgeTask } from "../src/purge/destroyer";
import { markOrphans } from "../src/purge/orphan-marker";
import { scheduleBatch } from "../src/purge/scheduler";
import { defaultRelationHandlers, type RelationHandlers } from "../src/registry";
import {
  Comment,
  createTestContext,
  Post,
  sequentialIds,
  type TestContextOptions,
} from "./test-utils";

const comments = { name: "comments", parentKind: "Post", childKind: "Comment" };

afterEach(() => {
  vi.useRealTimers();
});

function locked(id: string): TransientStoreError {
  return new TransientStoreError(`Comment ${id} is locked`, { operation: "delete record" });
}

async function seedComment(backend: PurgeBackend, id: string): Promise<void> {
  await backend.insertRecord({
    schemaId: "blog",
    kind: "Comment",
    id,
    props: { body: id, postId: null },
  });
}

/**
 * Creates a context whose purge handler is a mock, with one scheduled
 * comments batch `batch-1` of the given identifiers.
 */
async function setup(
  ids: readonly string[],
  options: Omit<TestContextOptions, "handlers"> = {},
) {
  const purge = vi.fn<RelationHandlers["purge"]>(() => Promise.resolve(true));
  const ctx = createTestContext({
    ...options,
    handlers: (relation, schemaId) => ({
      ...defaultRelationHandlers(relation, schemaId),
      purge,
    }),
  });
  const batch = await markOrphans(ctx.backend, {
    schemaId: "blog",
    relation: comments,
    parentId: "post-1",
    ids,
    idGenerator: sequentialIds("batch"),
  });
  if (batch === undefined) throw new Error("expected a batch");
  await scheduleBatch(ctx, batch);
  return { ctx, purge };
}

describe("runPurgeTask()", () => {
  it("reports a task that does not exist", async () => {
    const ctx = createTestContext();

    await expect(runPurgeTask(ctx, "batch-9:0")).resolves.toEqual({
      taskId: "batch-9:0",
      outcome: "missing",
      destroyed: 0,
      absent: 0,
      failures: [],
    });
  });

  it("destroys every identifier and settles the batch", async () => {
    const ctx = createTestContext();
    await seedComment(ctx.backend, "c1");
    const batch = await markOrphans(ctx.backend, {
      schemaId: "blog",
      relation: comments,
      parentId: "post-1",
      ids: ["c1", "c2"],
      idGenerator: sequentialIds("batch"),
    });
    if (batch === undefined) throw new Error("expected a batch");
    await scheduleBatch(ctx, batch);

    const outcome = await runPurgeTask(ctx, "batch-1:0");

    expect(outcome).toEqual({
      taskId: "batch-1:0",
      outcome: "completed",
      destroyed: 1,
      absent: 1,
      failures: [],
      settled: "completed",
    });
    await expect(ctx.backend.getRecord("blog", "Comment", "c1")).resolves.toBeUndefined();
    await expect(ctx.backend.getBatch("blog", "batch-1")).resolves.toBeUndefined();
  });

  it("skips a task that already finished", async () => {
    const { ctx, purge } = await setup(["c1", "c2", "c3"]);
    await runPurgeTask(ctx, "batch-1:0");

    const again = await runPurgeTask(ctx, "batch-1:0");

    expect(again).toEqual({
      taskId: "batch-1:0",
      outcome: "skipped",
      destroyed: 0,
      absent: 0,
      failures: [],
    });
    expect(purge).toHaveBeenCalledTimes(2);
  });

  it("retries the identifiers that failed with a retryable error", async () => {
    const { ctx, purge } = await setup(["c1", "c2"], { config: { retryBackoffMs: 0 } });
    purge.mockResolvedValueOnce(true).mockRejectedValueOnce(locked("c2"));

    const first = await runPurgeTask(ctx, "batch-1:0");

    expect(first).toMatchObject({
      outcome: "retrying",
      destroyed: 1,
      absent: 0,
      failures: [],
      retryAt: expect.any(String),
    });
    await expect(ctx.backend.getTask("blog", "batch-1:0")).resolves.toMatchObject({
      status: "pending",
      remainingIds: ["c2"],
      attempts: 1,
      lastError: "Comment c2 is locked",
    });
    expect(ctx.queue.messages.at(-1)).toEqual({
      payload: { schemaId: "blog", taskId: "batch-1:0" },
      delayMs: 0,
    });

    const second = await runPurgeTask(ctx, "batch-1:0");

    expect(second).toMatchObject({ outcome: "completed", destroyed: 1, settled: "completed" });
    expect(purge.mock.calls.map(([, id]) => id)).toEqual(["c1", "c2", "c2"]);
  });

  it("backs off by the configured delay", async () => {
    const { ctx, purge } = await setup(["c1"], {
      config: { retryBackoffMs: 500, retryBackoffFactor: 2 },
    });
    purge.mockRejectedValue(locked("c1"));
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-03-01T12:00:00.000Z"));

    await runPurgeTask(ctx, "batch-1:0");
    vi.setSystemTime(new Date("2026-03-01T12:00:00.500Z"));
    await runPurgeTask(ctx, "batch-1:0");

    expect(ctx.queue.messages.map((message) => message.delayMs)).toEqual([
      undefined,
      500,
      1000,
    ]);
    await expect(ctx.backend.getTask("blog", "batch-1:0")).resolves.toMatchObject({
      retryAt: "2026-03-01T12:00:01.500Z",
    });
  });

  it("skips a delivery that arrives before the retry time", async () => {
    const { ctx, purge } = await setup(["c1"], { config: { retryBackoffMs: 500 } });
    purge.mockRejectedValueOnce(locked("c1"));
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-03-01T12:00:00.000Z"));
    await runPurgeTask(ctx, "batch-1:0");

    vi.setSystemTime(new Date("2026-03-01T12:00:00.499Z"));
    const early = await runPurgeTask(ctx, "batch-1:0");
    vi.setSystemTime(new Date("2026-03-01T12:00:00.500Z"));
    const due = await runPurgeTask(ctx, "batch-1:0");

    expect(early).toMatchObject({ outcome: "skipped", destroyed: 0 });
    expect(due).toMatchObject({ outcome: "completed", destroyed: 1 });
    expect(purge).toHaveBeenCalledTimes(2);
    expect(ctx.queue.messages.map((message) => message.delayMs)).toEqual([
      undefined,
      500,
      1,
    ]);
  });

  it("records a permanent failure and moves on", async () => {
    const { ctx, purge } = await setup(["c1", "c2"]);
    purge.mockImplementation((_backend, id) =>
      id === "c1" ?
        Promise.reject(
          new PermanentRecordError("Comment c1 is on legal hold", { kind: "Comment", id }),
        )
      : Promise.resolve(true),
    );

    const outcome = await runPurgeTask(ctx, "batch-1:0");

    const failure = {
      id: "c1",
      code: "PERMANENT_RECORD_ERROR",
      message: "Comment c1 is on legal hold",
      attempts: 1,
      permanent: true,
    };
    expect(outcome).toEqual({
      taskId: "batch-1:0",
      outcome: "failed",
      destroyed: 1,
      absent: 0,
      failures: [failure],
      settled: "failed",
    });
    await expect(ctx.backend.getBatch("blog", "batch-1")).resolves.toMatchObject({
      status: "failed",
      errorReport: [failure],
    });
    await expect(ctx.backend.getTask("blog", "batch-1:0")).resolves.toMatchObject({
      status: "failed_terminal",
      remainingIds: [],
    });
  });

  it("gives up on retryable failures once attempts run out", async () => {
    const { ctx, purge } = await setup(["c1"], {
      config: { maxAttempts: 2, retryBackoffMs: 0 },
    });
    purge.mockRejectedValue(locked("c1"));

    await expect(runPurgeTask(ctx, "batch-1:0")).resolves.toMatchObject({
      outcome: "retrying",
    });
    const last = await runPurgeTask(ctx, "batch-1:0");

    expect(last).toMatchObject({
      outcome: "failed",
      failures: [
        {
          id: "c1",
          code: "TRANSIENT_STORE_ERROR",
          message: "Comment c1 is locked",
          attempts: 2,
          permanent: false,
        },
      ],
      settled: "failed",
    });
  });

  it("returns unprocessed identifiers to the task when cancelled", async () => {
    const { ctx, purge } = await setup(["c1", "c2"]);
    const controller = new AbortController();
    controller.abort();

    const outcome = await runPurgeTask(ctx, "batch-1:0", { signal: controller.signal });

    expect(outcome).toEqual({
      taskId: "batch-1:0",
      outcome: "cancelled",
      destroyed: 0,
      absent: 0,
      failures: [],
    });
    expect(purge).not.toHaveBeenCalled();
    await expect(ctx.backend.getTask("blog", "batch-1:0")).resolves.toMatchObject({
      status: "pending",
      remainingIds: ["c1", "c2"],
      attempts: 1,
    });
  });

  it("retries a task whose relation is no longer declared", async () => {
    const schema = defineSchema({
      id: "blog",
      entities: { Post: { type: Post }, Comment: { type: Comment } },
    });
    const ctx = createTestContext({ schema, config: { retryBackoffMs: 0 } });
    const batch = await markOrphans(ctx.backend, {
      schemaId: "blog",
      relation: comments,
      parentId: "post-1",
      ids: ["c1"],
      idGenerator: sequentialIds("batch"),
    });
    if (batch === undefined) throw new Error("expected a batch");
    await scheduleBatch(ctx, batch);

    const outcome = await runPurgeTask(ctx, "batch-1:0");

    expect(outcome.outcome).toBe("retrying");
    await expect(ctx.backend.getTask("blog", "batch-1:0")).resolves.toMatchObject({
      lastError: "Relation not found: Post.comments",
    });
  });
});
