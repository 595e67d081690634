import type { OrphanBatchRow, TransactionBackend } from "../backend/types";
import type { IdGenerator } from "../utils";

export type MarkOrphansParams = Readonly<{
  schemaId: string;
  relation: Readonly<{
    name: string;
    parentKind: string;
    childKind: string;
  }>;
  parentId: string;
  ids: readonly string[];
  idGenerator: IdGenerator;
}>;

/**
 * Records nullified children as a pending orphan batch.
 *
 * Must run in the same transaction as the nullification so the children
 * are never detached without a durable record of them. Identifiers are
 * de-duplicated and sorted; an empty set creates no batch.
 */
export async function markOrphans(
  backend: TransactionBackend,
  params: MarkOrphansParams,
): Promise<OrphanBatchRow | undefined> {
  const ids = [...new Set(params.ids)].sort();
  if (ids.length === 0) {
    return undefined;
  }

  return backend.insertBatch({
    schemaId: params.schemaId,
    id: params.idGenerator(),
    relation: params.relation.name,
    parentKind: params.relation.parentKind,
    parentId: params.parentId,
    childKind: params.relation.childKind,
    ids,
  });
}

/**
 * Batches whose children were nullified but never scheduled, oldest first.
 */
export async function listPendingBatches(
  backend: TransactionBackend,
  schemaId: string,
): Promise<readonly OrphanBatchRow[]> {
  return backend.listBatches({ schemaId, statuses: ["pending"] });
}
