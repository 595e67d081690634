/**
 * PostgreSQL Backend Tests
 *
 * Runs the shared adapter suite and an end-to-end cascade against PGlite,
 * an in-process PostgreSQL, so no database server is needed.
 */
import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { afterAll, describe, expect, it } from "vitest";

import { createStore } from "../../../src";
import {
  createPostgresBackend,
  generatePostgresDDL,
  getPostgresMigrationSQL,
} from "../../../src/backend/postgres";
import type { PurgeBackend } from "../../../src/backend/types";
import { blogSchema, sequentialIds, silentLogger } from "../../test-utils";
import { createAdapterTestSuite } from "../adapter-test-suite";

// ============================================================
// Shared Database
// ============================================================

let sharedClient: Promise<PGlite> | undefined;

async function createClient(): Promise<PGlite> {
  const client = new PGlite();
  await client.exec(getPostgresMigrationSQL());
  return client;
}

function getClient(): Promise<PGlite> {
  sharedClient ??= createClient();
  return sharedClient;
}

/**
 * A backend on the shared database whose close() empties the tables.
 */
async function createTestPostgresBackend(): Promise<PurgeBackend> {
  const client = await getClient();
  const backend = createPostgresBackend(drizzle(client));
  return {
    ...backend,
    async close() {
      await client.exec(
        'TRUNCATE "purge_records", "purge_orphan_batches", "purge_tasks"',
      );
    },
  };
}

afterAll(async () => {
  if (sharedClient === undefined) return;
  const client = await sharedClient;
  await client.close();
});

createAdapterTestSuite("PostgreSQL", createTestPostgresBackend);

describe("PostgreSQL backend", () => {
  it("generates JSONB and TIMESTAMPTZ columns", () => {
    const [records, batches] = generatePostgresDDL().filter((statement) =>
      statement.startsWith("CREATE TABLE"),
    );

    expect(records).toContain('"props" JSONB NOT NULL');
    expect(batches).toContain(`"error_report" JSONB NOT NULL DEFAULT '[]'::jsonb`);
    expect(batches).toContain('"scheduled_at" TIMESTAMPTZ');
  });

  it("purges a cascade end to end", async () => {
    const backend = await createTestPostgresBackend();
    const store = createStore(blogSchema, backend, {
      logger: silentLogger(),
      idGenerator: sequentialIds("batch"),
    });

    try {
      await store.records.Author.create({ name: "Ada" }, { id: "a1" });
      await store.records.Post.create({ title: "First", authorId: "a1" }, { id: "p1" });
      await store.records.Comment.create({ body: "Nice", postId: "p1" }, { id: "c1" });
      await store.records.Like.create({ postId: "p1" }, { id: "l1" });

      const result = await store.records.Author.destroy("a1");
      await store.drain();

      expect(result).toEqual({ destroyed: true, batchIds: ["batch-1"], pendingBatchIds: [] });
      await expect(store.records.Post.count()).resolves.toBe(0);
      await expect(store.records.Comment.count()).resolves.toBe(0);
      await expect(store.records.Like.count()).resolves.toBe(0);
      await expect(store.purge.listTasks()).resolves.toEqual([]);
    } finally {
      await store.close();
    }
  });
});
