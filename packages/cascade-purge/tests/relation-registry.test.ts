import { describe, expect, it, vi } from "vitest";

import {
  buildRelationRegistry,
  defineSchema,
  KindNotFoundError,
  type RelationHandlers,
  RelationNotFoundError,
} from "../src";
import { defineRelation } from "../src/core/relation";
import { Author, blogSchema, Comment, createTestBackend, Post } from "./test-utils";

describe("buildRelationRegistry()", () => {
  const registry = buildRelationRegistry(blogSchema);

  it("resolves every declared relation", () => {
    expect([...registry.relations.keys()]).toEqual(["posts", "comments", "likes"]);
    expect(registry.schemaId).toBe("blog");
  });

  it("resolves a relation by parent kind and name", () => {
    const entry = registry.get("Post", "comments");

    expect(entry).toMatchObject({
      name: "comments",
      parentKind: "Post",
      childKind: "Comment",
      foreignKey: "postId",
      batchSize: 2,
      description: undefined,
    });
    expect(Object.isFrozen(entry)).toBe(true);
    expect(Object.isFrozen(entry.handlers)).toBe(true);
  });

  it("throws RelationNotFoundError for an unknown pair", () => {
    expect(() => registry.get("Author", "comments")).toThrow(RelationNotFoundError);
    expect(registry.has("Author", "comments")).toBe(false);
    expect(registry.has("Author", "posts")).toBe(true);
  });

  it("lists relations by parent and by child in declaration order", () => {
    expect(registry.forParent("Post").map((entry) => entry.name)).toEqual([
      "comments",
      "likes",
    ]);
    expect(registry.forChild("Post").map((entry) => entry.name)).toEqual(["posts"]);
    expect(registry.forParent("Comment")).toEqual([]);
  });

  it("resolves entity registrations", () => {
    expect(registry.getEntity("Author").type).toBe(Author);
    expect(() => registry.getEntity("Tag")).toThrow(KindNotFoundError);
  });

  it("cannot be mutated", () => {
    expect(Object.isFrozen(registry)).toBe(true);
    expect(() => {
      Reflect.apply(Map.prototype.clear, registry.relations, []);
    }).toThrow();
  });

  it("falls back to the schema default batch size", () => {
    const schema = defineSchema({
      id: "defaults",
      entities: { Post: { type: Post }, Comment: { type: Comment } },
      relations: {
        comments: defineRelation(Post, Comment, { foreignKey: "postId" }),
      },
      defaults: { batchSize: 7 },
    });

    expect(buildRelationRegistry(schema).get("Post", "comments").batchSize).toBe(7);
  });

  it("leaves batch size undefined when neither relation nor schema sets one", () => {
    expect(registry.get("Author", "posts").batchSize).toBeUndefined();
  });

  it("builds handlers through the given factory", () => {
    const purge = vi.fn<RelationHandlers["purge"]>(() => Promise.resolve(true));
    const factory = vi.fn(
      (): RelationHandlers => ({ nullify: () => Promise.resolve([]), purge }),
    );

    const custom = buildRelationRegistry(blogSchema, factory);

    expect(factory).toHaveBeenCalledTimes(3);
    expect(factory).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ name: "posts", childKind: "Post" }),
      "blog",
    );
    expect(custom.get("Post", "likes").handlers.purge).toBe(purge);
  });
});

describe("defaultRelationHandlers", () => {
  it("nullifies children and deletes them by identifier", async () => {
    const backend = createTestBackend();
    const { handlers } = buildRelationRegistry(blogSchema).get("Author", "posts");
    await backend.insertRecord({
      schemaId: "blog",
      kind: "Post",
      id: "post-1",
      props: { title: "Hello", authorId: "author-1" },
    });

    const ids = await backend.transaction((tx) => handlers.nullify(tx, "author-1"));

    expect(ids).toEqual(["post-1"]);
    await expect(handlers.purge(backend, "post-1")).resolves.toBe(true);
    await expect(handlers.purge(backend, "post-1")).resolves.toBe(false);
  });
});
