import { nanoid } from "nanoid";

/**
 * ID generation utilities.
 *
 * Default implementation uses nanoid: URL-safe, 21 characters.
 */

/**
 * Generates a new unique ID.
 */
export function generateId(): string {
  return nanoid();
}

/**
 * ID generator function type.
 */
export type IdGenerator = () => string;

/**
 * Builds the deterministic ID of the task covering one chunk of a batch.
 * Re-scheduling the same batch therefore produces the same task IDs.
 */
export function purgeTaskId(batchId: string, chunkIndex: number): string {
  return `${batchId}:${chunkIndex}`;
}
