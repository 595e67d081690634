/**
 * Example 01: Basic Usage
 *
 * Destroying a parent detaches its children with one UPDATE per relation
 * and hands them to purge tasks, which destroy them in chunks. Children
 * purged this way cascade to their own children.
 */
import { z } from "zod";

import {
  createStore,
  defineEntity,
  defineRelation,
  defineSchema,
} from "cascade-purge";
import { createExampleBackend } from "./_helpers";

// ============================================================
// Define Entities
// ============================================================

const Author = defineEntity("Author", {
  schema: z.object({ name: z.string() }),
});

const Post = defineEntity("Post", {
  schema: z.object({
    title: z.string().min(1),
    authorId: z.string().nullable(),
  }),
});

const Comment = defineEntity("Comment", {
  schema: z.object({
    body: z.string(),
    postId: z.string().nullable(),
  }),
});

// ============================================================
// Define Schema
// ============================================================

const blog = defineSchema({
  id: "blog",
  entities: {
    Author: { type: Author },
    Post: { type: Post },
    Comment: { type: Comment },
  },
  relations: {
    posts: defineRelation(Author, Post, { foreignKey: "authorId" }),
    comments: defineRelation(Post, Comment, { foreignKey: "postId", batchSize: 10 }),
  },
});

// ============================================================
// Main
// ============================================================

export async function main(): Promise<void> {
  const backend = createExampleBackend();
  const store = createStore(blog, backend);

  console.log("=== Seeding ===\n");

  const author = await store.records.Author.create({ name: "Ada" });
  for (let index = 1; index <= 3; index++) {
    const post = await store.records.Post.create({
      title: `Post ${index}`,
      authorId: author.id,
    });
    for (let reply = 1; reply <= 25; reply++) {
      await store.records.Comment.create({ body: `Reply ${reply}`, postId: post.id });
    }
  }

  console.log(`Posts: ${await store.records.Post.count()}`);
  console.log(`Comments: ${await store.records.Comment.count()}`);

  console.log("\n=== Destroying the author ===\n");

  const result = await store.records.Author.destroy(author.id);
  console.log(`Destroyed: ${result.destroyed}`);
  console.log(`Orphan batches: ${result.batchIds.length}`);

  // Posts are detached at once and purged by queued tasks
  await store.drain();

  console.log(`Posts left: ${await store.records.Post.count()}`);
  console.log(`Comments left: ${await store.records.Comment.count()}`);
  console.log(`Failed batches: ${(await store.purge.failedBatches()).length}`);

  console.log("\n=== Basic usage example complete ===");

  await store.close();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
}
