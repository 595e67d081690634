import { type z } from "zod";

import type { OrphanBatchRow, PurgeTaskRow } from "../backend/types";
import type { PurgeConfig, PurgeConfigInput } from "../config";
import type { EntityKindNames, GetEntityType, SchemaDef } from "../core/define-schema";
import type { EntityRecord, EntityType } from "../core/types";
import type { Logger } from "../logging";
import type { RunTaskOptions, TaskOutcome } from "../purge/destroyer";
import type { PurgeQueue } from "../queue/types";
import type { IdGenerator } from "../utils";

// ============================================================
// Store Options
// ============================================================

export type StoreOptions = Readonly<{
  /** Validated with `resolvePurgeConfig`; omitted keys take their defaults */
  config?: PurgeConfigInput | PurgeConfig;
  /** Defaults to a pino logger at `config.logLevel` */
  logger?: Logger;
  /**
   * External queue for purge tasks. Its consumers must call
   * `store.purge.runTask(taskId)`. Without one the store runs tasks on an
   * in-process queue.
   */
  queue?: PurgeQueue;
  /** Concurrency of the in-process queue (default 1) */
  queueConcurrency?: number;
  idGenerator?: IdGenerator;
}>;

// ============================================================
// Record Collections
// ============================================================

export type FindOptions = Readonly<{
  limit?: number;
  offset?: number;
}>;

export type CreateRecordOptions = Readonly<{
  id?: string;
}>;

/**
 * Outcome of destroying one record.
 */
export type DestroyResult = Readonly<{
  /** False when the record did not exist */
  destroyed: boolean;
  /** Orphan batches created for the record's children */
  batchIds: readonly string[];
  /** Batches whose scheduling failed; `store.purge.recover()` retries them */
  pendingBatchIds: readonly string[];
}>;

/**
 * CRUD operations for the records of one entity kind.
 */
export type RecordCollection<E extends EntityType> = Readonly<{
  kind: E["name"];
  /** @throws ValidationError when props fail the entity schema */
  create: (
    props: z.input<E["schema"]>,
    options?: CreateRecordOptions,
  ) => Promise<EntityRecord<E>>;
  getById: (id: string) => Promise<EntityRecord<E> | undefined>;
  /**
   * Merges `props` into the stored props.
   *
   * @throws RecordNotFoundError
   * @throws ValidationError
   */
  update: (
    id: string,
    props: Partial<z.input<E["schema"]>>,
  ) => Promise<EntityRecord<E>>;
  /**
   * Destroys the record, nullifying and scheduling the purge of its
   * children. Destroying an absent record is a no-op.
   */
  destroy: (id: string) => Promise<DestroyResult>;
  count: () => Promise<number>;
  find: (options?: FindOptions) => Promise<EntityRecord<E>[]>;
}>;

export type RecordCollections<S extends SchemaDef> = {
  [K in EntityKindNames<S>]-?: RecordCollection<GetEntityType<S, K>>;
};

/**
 * Record operations bound to a store, shared by every collection.
 */
export type RecordOperations = Readonly<{
  create: (
    kind: string,
    props: unknown,
    options?: CreateRecordOptions,
  ) => Promise<EntityRecord>;
  getById: (kind: string, id: string) => Promise<EntityRecord | undefined>;
  update: (kind: string, id: string, props: unknown) => Promise<EntityRecord>;
  destroy: (kind: string, id: string) => Promise<DestroyResult>;
  count: (kind: string) => Promise<number>;
  find: (kind: string, options?: FindOptions) => Promise<readonly EntityRecord[]>;
}>;

// ============================================================
// Purge API
// ============================================================

export type RecoveryReport = Readonly<{
  /** Pending batches that were scheduled */
  scheduledBatches: readonly string[];
  /** Open tasks that were reset where needed and enqueued */
  requeuedTasks: readonly string[];
  /** Batches settled because all their tasks were terminal */
  settledBatches: readonly string[];
}>;

export type PurgeApi = Readonly<{
  /** Runs one purge task; the body of every queue consumer */
  runTask: (taskId: string, options?: RunTaskOptions) => Promise<TaskOutcome>;
  /**
   * Resumes work interrupted by a crash. Meant for startup, before any
   * consumer is running: tasks left `running` are reset to `pending`.
   */
  recover: () => Promise<RecoveryReport>;
  pendingBatches: () => Promise<readonly OrphanBatchRow[]>;
  failedBatches: () => Promise<readonly OrphanBatchRow[]>;
  getBatch: (id: string) => Promise<OrphanBatchRow | undefined>;
  listTasks: (batchId?: string) => Promise<readonly PurgeTaskRow[]>;
  getTask: (id: string) => Promise<PurgeTaskRow | undefined>;
}>;
