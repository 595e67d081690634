/**
 * RecordCollection implementation.
 *
 * Provides typed CRUD for one entity kind on top of the store's
 * kind-agnostic record operations.
 */
import type { EntityRecord, EntityType } from "../core/types";
import type { RecordCollection, RecordOperations } from "./types";

/**
 * Narrows an unparameterized record to EntityRecord<E>.
 * Safe: props are validated by Zod at creation/update boundaries.
 */
function narrowRecord<E extends EntityType>(record: EntityRecord): EntityRecord<E> {
  return record as EntityRecord<E>;
}

/**
 * Creates a RecordCollection for a specific entity kind.
 */
export function createRecordCollection<E extends EntityType>(
  kind: E["name"],
  operations: RecordOperations,
): RecordCollection<E> {
  return {
    kind,

    async create(props, options) {
      return narrowRecord<E>(await operations.create(kind, props, options));
    },

    async getById(id) {
      const record = await operations.getById(kind, id);
      return record === undefined ? undefined : narrowRecord<E>(record);
    },

    async update(id, props) {
      return narrowRecord<E>(await operations.update(kind, id, props));
    },

    destroy: (id) => operations.destroy(kind, id),

    count: () => operations.count(kind),

    async find(options) {
      const records = await operations.find(kind, options);
      return records.map((record) => narrowRecord<E>(record));
    },
  };
}
