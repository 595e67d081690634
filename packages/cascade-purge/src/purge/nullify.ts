import type { TransactionBackend } from "../backend/types";
import { toStoreError } from "../errors";

export type NullifyTarget = Readonly<{
  schemaId: string;
  childKind: string;
  foreignKey: string;
}>;

/**
 * Detaches every child of `parentId` with one statement and returns the
 * detached identifiers.
 *
 * Runs no per-child lifecycle. Meant to run inside the parent's
 * destroying transaction: a failure leaves no child nullified once the
 * transaction rolls back.
 *
 * @throws ConstraintViolationError when the store rejects the NULL
 * @throws TransientStoreError on lock contention or lost connections
 */
export async function nullifyChildren(
  backend: TransactionBackend,
  target: NullifyTarget,
  parentId: string,
): Promise<readonly string[]> {
  try {
    return await backend.nullifyForeignKey({
      schemaId: target.schemaId,
      childKind: target.childKind,
      foreignKey: target.foreignKey,
      parentId,
    });
  } catch (error) {
    throw toStoreError(error, "nullify foreign key");
  }
}
