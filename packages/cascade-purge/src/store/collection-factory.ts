/**
 * Collection Factory for Store
 *
 * Creates the typed `store.records` proxy.
 */
import type { SchemaDef } from "../core/define-schema";
import { KindNotFoundError } from "../errors";
import { createRecordCollection } from "./record-collection";
import type { RecordCollections, RecordOperations } from "./types";

/**
 * Creates a typed record collections proxy.
 *
 * The proxy creates a RecordCollection for each entity kind on first
 * access.
 */
export function createRecordCollectionsProxy<S extends SchemaDef>(
  schema: S,
  operations: RecordOperations,
): RecordCollections<S> {
  const collectionCache = new Map<string, unknown>();

  // The proxy dynamically returns typed collections for each key.
  // Type assertions are necessary because the proxy pattern doesn't preserve
  // the relationship between keys and their specific entity types at compile time.
  return new Proxy({} as unknown as RecordCollections<S>, {
    get: (_, kind) => {
      if (typeof kind !== "string") return undefined;
      if (!(kind in schema.entities)) {
        throw new KindNotFoundError(kind);
      }

      const cached = collectionCache.get(kind);
      if (cached !== undefined) {
        return cached;
      }

      const collection = createRecordCollection(kind, operations);
      collectionCache.set(kind, collection);
      return collection;
    },
  });
}
