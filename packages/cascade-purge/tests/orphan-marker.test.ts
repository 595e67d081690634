import { describe, expect, it } from "vitest";

import { listPendingBatches, markOrphans } from "../src/purge/orphan-marker";
import { createTestBackend, sequentialIds } from "./test-utils";

const comments = { name: "comments", parentKind: "Post", childKind: "Comment" };

describe("markOrphans()", () => {
  it("records a pending batch with sorted, unique identifiers", async () => {
    const backend = createTestBackend();

    const batch = await markOrphans(backend, {
      schemaId: "blog",
      relation: comments,
      parentId: "post-1",
      ids: ["c-3", "c-1", "c-2", "c-1"],
      idGenerator: sequentialIds("batch"),
    });

    expect(batch).toMatchObject({
      schemaId: "blog",
      id: "batch-1",
      relation: "comments",
      parentKind: "Post",
      parentId: "post-1",
      childKind: "Comment",
      ids: ["c-1", "c-2", "c-3"],
      status: "pending",
      errorReport: [],
      scheduledAt: undefined,
    });
    await expect(backend.getBatch("blog", "batch-1")).resolves.toEqual(batch);
  });

  it("creates no batch for an empty identifier set", async () => {
    const backend = createTestBackend();

    const batch = await markOrphans(backend, {
      schemaId: "blog",
      relation: comments,
      parentId: "post-1",
      ids: [],
      idGenerator: sequentialIds("batch"),
    });

    expect(batch).toBeUndefined();
    await expect(listPendingBatches(backend, "blog")).resolves.toEqual([]);
  });

  it("disappears with a rolled back transaction", async () => {
    const backend = createTestBackend();

    const attempt = backend.transaction(async (tx) => {
      await markOrphans(tx, {
        schemaId: "blog",
        relation: comments,
        parentId: "post-1",
        ids: ["c-1"],
        idGenerator: sequentialIds("batch"),
      });
      throw new Error("parent delete failed");
    });

    await expect(attempt).rejects.toThrow("parent delete failed");
    await expect(backend.getBatch("blog", "batch-1")).resolves.toBeUndefined();
  });
});

describe("listPendingBatches()", () => {
  it("returns only pending batches of the schema, oldest first", async () => {
    const backend = createTestBackend();
    const nextId = sequentialIds("batch");
    for (const parentId of ["post-1", "post-2", "post-3"]) {
      await markOrphans(backend, {
        schemaId: "blog",
        relation: comments,
        parentId,
        ids: [`${parentId}-c`],
        idGenerator: nextId,
      });
    }
    await markOrphans(backend, {
      schemaId: "other",
      relation: comments,
      parentId: "post-4",
      ids: ["post-4-c"],
      idGenerator: nextId,
    });
    await backend.updateBatch({ schemaId: "blog", id: "batch-2", status: "scheduled" });

    const pending = await listPendingBatches(backend, "blog");

    expect(pending.map((batch) => batch.id)).toEqual(["batch-1", "batch-3"]);
  });
});
