/**
 * Main Store implementation.
 *
 * The Store is the primary interface for a schema's records. It
 * coordinates:
 * - Record CRUD with Zod validation
 * - The destroy path: hooks, nullification, orphan batches
 * - Purge task scheduling, execution and recovery
 */
import type {
  OrphanBatchRow,
  PurgeBackend,
  PurgeTaskRow,
} from "../backend/types";
import { type PurgeConfig, resolvePurgeConfig } from "../config";
import type { SchemaDef } from "../core/define-schema";
import type { EntityRecord } from "../core/types";
import { RecordNotFoundError } from "../errors";
import { validateProps } from "../errors/validation";
import { componentLogger, createLogger, type Logger } from "../logging";
import type { PurgeContext } from "../purge/context";
import {
  runPurgeTask,
  type RunTaskOptions,
  type TaskOutcome,
} from "../purge/destroyer";
import { listPendingBatches, markOrphans } from "../purge/orphan-marker";
import { enqueueTask, scheduleBatch, settleBatch } from "../purge/scheduler";
import { assertTransition, OPEN_TASK_STATUSES } from "../purge/task-state";
import { createInProcessQueue, type InProcessQueue } from "../queue/in-process";
import type { PurgeQueue } from "../queue/types";
import {
  buildRelationRegistry,
  defaultRelationHandlers,
  type RelationRegistry,
} from "../registry";
import { generateId, type IdGenerator } from "../utils";
import { createRecordCollectionsProxy } from "./collection-factory";
import { parseRecordProps, rowToRecord } from "./row-mappers";
import type {
  CreateRecordOptions,
  DestroyResult,
  FindOptions,
  PurgeApi,
  RecordCollections,
  RecordOperations,
  RecoveryReport,
  StoreOptions,
} from "./types";

const NOT_DESTROYED: DestroyResult = Object.freeze({
  destroyed: false,
  batchIds: [],
  pendingBatchIds: [],
});

// ============================================================
// Store Class
// ============================================================

/**
 * The Store provides typed record access with nullify-then-purge deletes.
 *
 * @example
 * ```typescript
 * const store = createStore(blog, backend);
 *
 * const author = await store.records.Author.create({ name: "Ada" });
 * await store.records.Post.create({ title: "Hello", authorId: author.id });
 *
 * // Nullifies Post.authorId in one statement and purges the posts later
 * const result = await store.records.Author.destroy(author.id);
 * await store.drain();
 * ```
 */
export class Store<S extends SchemaDef> {
  readonly #schema: S;
  readonly #backend: PurgeBackend;
  readonly #config: PurgeConfig;
  readonly #logger: Logger;
  readonly #registry: RelationRegistry;
  readonly #queue: PurgeQueue;
  readonly #ownQueue: InProcessQueue | undefined;
  readonly #idGenerator: IdGenerator;

  constructor(schema: S, backend: PurgeBackend, options: StoreOptions = {}) {
    this.#schema = schema;
    this.#backend = backend;
    this.#config = resolvePurgeConfig(options.config ?? {});
    this.#logger =
      options.logger ?? createLogger({ level: this.#config.logLevel });
    this.#idGenerator = options.idGenerator ?? generateId;

    // Children are purged through the full destroy path so their own
    // hooks run and their own relations cascade.
    this.#registry = buildRelationRegistry(schema, (relation, schemaId) => ({
      ...defaultRelationHandlers(relation, schemaId),
      purge: async (_backend, childId) =>
        (await this.#destroy(relation.childKind, childId)).destroyed,
    }));

    if (options.queue === undefined) {
      const queue = createInProcessQueue({
        concurrency: options.queueConcurrency ?? 1,
        logger: this.#logger,
      });
      queue.process((message, signal) =>
        this.#runTask(message.taskId, { signal }),
      );
      this.#ownQueue = queue;
      this.#queue = queue;
    } else {
      this.#ownQueue = undefined;
      this.#queue = options.queue;
    }
  }

  // === Accessors ===

  /** The schema definition */
  get schema(): S {
    return this.#schema;
  }

  /** The schema ID */
  get schemaId(): string {
    return this.#schema.id;
  }

  /** The resolved purge configuration */
  get config(): PurgeConfig {
    return this.#config;
  }

  /** The relation registry built from the schema */
  get registry(): RelationRegistry {
    return this.#registry;
  }

  /** The database backend */
  get backend(): PurgeBackend {
    return this.#backend;
  }

  /** The queue purge tasks are sent to */
  get queue(): PurgeQueue {
    return this.#queue;
  }

  // === Collections ===

  /**
   * Record collections for CRUD operations.
   *
   * @example
   * ```typescript
   * const post = await store.records.Post.create({ title: "Hello", authorId: null });
   * const fetched = await store.records.Post.getById(post.id);
   * await store.records.Post.destroy(post.id);
   * ```
   */
  get records(): RecordCollections<S> {
    return createRecordCollectionsProxy(this.#schema, this.#recordOperations);
  }

  get #recordOperations(): RecordOperations {
    return {
      create: (kind, props, options) => this.#create(kind, props, options),
      getById: (kind, id) => this.#getById(kind, id),
      update: (kind, id, props) => this.#update(kind, id, props),
      destroy: (kind, id) => this.#destroy(kind, id),
      count: (kind) => this.#backend.countRecords(this.schemaId, kind),
      find: (kind, options) => this.#find(kind, options),
    };
  }

  /**
   * Destroys a record by kind.
   *
   * Runs `beforeDestroy`, nullifies the foreign key of every child of each
   * relation the kind parents, records one orphan batch per relation that
   * had children and deletes the record, all in one transaction. After
   * commit, schedules the batches for purge and runs `afterDestroy`.
   *
   * @throws KindNotFoundError
   * @throws ConstraintViolationError when a foreign key cannot be cleared;
   * nothing is changed
   */
  async destroy(kind: string, id: string): Promise<DestroyResult> {
    return this.#destroy(kind, id);
  }

  // === Purge ===

  /**
   * Purge task execution, recovery and inspection.
   */
  get purge(): PurgeApi {
    const schemaId = this.schemaId;
    const backend = this.#backend;
    return {
      runTask: (taskId, options) => this.#runTask(taskId, options),
      recover: () => this.#recover(),
      pendingBatches: () => listPendingBatches(backend, schemaId),
      failedBatches: () => backend.listBatches({ schemaId, statuses: ["failed"] }),
      getBatch: (id) => backend.getBatch(schemaId, id),
      listTasks: (batchId) =>
        backend.listTasks(batchId === undefined ? { schemaId } : { schemaId, batchId }),
      getTask: (id) => backend.getTask(schemaId, id),
    };
  }

  /**
   * Waits until the in-process queue has no ready or running task.
   * A no-op with an external queue.
   */
  async drain(): Promise<void> {
    await this.#ownQueue?.drain();
  }

  // === Lifecycle ===

  /**
   * Deletes every record, batch and task of this schema.
   */
  async clear(): Promise<void> {
    await this.#backend.clear(this.schemaId);
  }

  /**
   * Stops the in-process queue and closes the backend.
   *
   * Running tasks are cancelled and left `pending`; `purge.recover()`
   * picks them up on the next start.
   */
  async close(): Promise<void> {
    await this.#ownQueue?.close();
    await this.#backend.close();
  }

  // === Internal: Records ===

  #schemaFor(kind: string) {
    return this.#registry.getEntity(kind).type.schema;
  }

  async #create(
    kind: string,
    props: unknown,
    options: CreateRecordOptions = {},
  ): Promise<EntityRecord> {
    const validated = validateProps(this.#schemaFor(kind), props, {
      kind,
      operation: "create",
    });
    const row = await this.#backend.insertRecord({
      schemaId: this.schemaId,
      kind,
      id: options.id ?? this.#idGenerator(),
      props: validated,
    });
    return rowToRecord(row);
  }

  async #getById(kind: string, id: string): Promise<EntityRecord | undefined> {
    this.#registry.getEntity(kind);
    const row = await this.#backend.getRecord(this.schemaId, kind, id);
    return row === undefined ? undefined : rowToRecord(row);
  }

  async #update(kind: string, id: string, props: unknown): Promise<EntityRecord> {
    const schema = this.#schemaFor(kind);
    const existing = await this.#backend.getRecord(this.schemaId, kind, id);
    if (existing === undefined) {
      throw new RecordNotFoundError(kind, id);
    }

    const patch = typeof props === "object" && props !== null ? props : {};
    const validated = validateProps(
      schema,
      { ...parseRecordProps(existing), ...patch },
      { kind, operation: "update", id },
    );
    const row = await this.#backend.updateRecord({
      schemaId: this.schemaId,
      kind,
      id,
      props: validated,
    });
    if (row === undefined) {
      throw new RecordNotFoundError(kind, id);
    }
    return rowToRecord(row);
  }

  async #find(
    kind: string,
    options: FindOptions = {},
  ): Promise<readonly EntityRecord[]> {
    this.#registry.getEntity(kind);
    const rows = await this.#backend.findRecords({
      schemaId: this.schemaId,
      kind,
      ...(options.limit !== undefined && { limit: options.limit }),
      ...(options.offset !== undefined && { offset: options.offset }),
    });
    return rows.map((row) => rowToRecord(row));
  }

  // === Internal: Destroy Path ===

  async #destroy(kind: string, id: string): Promise<DestroyResult> {
    const registration = this.#registry.getEntity(kind);
    const relations = this.#registry.forParent(kind);
    const schemaId = this.schemaId;

    const destroyed = await this.#backend.transaction(async (tx) => {
      const row = await tx.getRecord(schemaId, kind, id);
      if (row === undefined) return undefined;
      // The delete takes the row lock; a concurrent destroy that got there
      // first leaves nothing to delete.
      if (!(await tx.deleteRecord({ schemaId, kind, id }))) return undefined;

      const record = rowToRecord(row);
      await registration.hooks?.beforeDestroy?.(record);

      const batches: OrphanBatchRow[] = [];
      for (const relation of relations) {
        const ids = await relation.handlers.nullify(tx, id);
        const batch = await markOrphans(tx, {
          schemaId,
          relation,
          parentId: id,
          ids,
          idGenerator: this.#idGenerator,
        });
        if (batch !== undefined) batches.push(batch);
      }

      return { record, batches };
    });

    if (destroyed === undefined) return NOT_DESTROYED;

    const pendingBatchIds = await this.#scheduleAll(destroyed.batches);
    await registration.hooks?.afterDestroy?.(destroyed.record);

    return {
      destroyed: true,
      batchIds: destroyed.batches.map((batch) => batch.id),
      pendingBatchIds,
    };
  }

  /**
   * Schedules batches created by a committed destroy. Returns the IDs of
   * the batches that could not be scheduled.
   */
  async #scheduleAll(batches: readonly OrphanBatchRow[]): Promise<string[]> {
    const logger = componentLogger(this.#logger, "store");
    const pending: string[] = [];

    for (const batch of batches) {
      try {
        await scheduleBatch(this.#purgeContext, batch);
      } catch (error) {
        // The batch row is durable; recover() schedules it again.
        logger.error(
          { err: error, batchId: batch.id, relation: batch.relation },
          "orphan batch scheduling failed",
        );
        pending.push(batch.id);
      }
    }
    return pending;
  }

  // === Internal: Purge Tasks ===

  get #purgeContext(): PurgeContext {
    return {
      schemaId: this.schemaId,
      backend: this.#backend,
      registry: this.#registry,
      config: this.#config,
      logger: this.#logger,
      queue: this.#queue,
      idGenerator: this.#idGenerator,
    };
  }

  async #runTask(taskId: string, options?: RunTaskOptions): Promise<TaskOutcome> {
    return runPurgeTask(this.#purgeContext, taskId, options);
  }

  async #recover(): Promise<RecoveryReport> {
    const ctx = this.#purgeContext;
    const logger = componentLogger(this.#logger, "scheduler");
    const scheduledBatches: string[] = [];
    const enqueued = new Set<string>();

    for (const batch of await listPendingBatches(this.#backend, this.schemaId)) {
      const result = await scheduleBatch(ctx, batch);
      scheduledBatches.push(batch.id);
      for (const taskId of result.enqueuedTaskIds) enqueued.add(taskId);
    }

    const openTasks = await this.#backend.listTasks({
      schemaId: this.schemaId,
      statuses: OPEN_TASK_STATUSES,
    });
    for (const task of openTasks) {
      if (enqueued.has(task.id)) continue;
      const reset = await this.#resetTask(task);
      if (reset === undefined) continue;
      await enqueueTask(ctx, reset);
      enqueued.add(task.id);
    }

    const settledBatches: string[] = [];
    const scheduled = await this.#backend.listBatches({
      schemaId: this.schemaId,
      statuses: ["scheduled"],
    });
    for (const batch of scheduled) {
      const outcome = await settleBatch(this.#backend, this.schemaId, batch.id);
      if (outcome === "completed" || outcome === "failed") {
        settledBatches.push(batch.id);
      }
    }

    const report: RecoveryReport = {
      scheduledBatches,
      requeuedTasks: [...enqueued],
      settledBatches,
    };
    logger.info(
      {
        scheduledBatches: scheduledBatches.length,
        requeuedTasks: enqueued.size,
        settledBatches: settledBatches.length,
      },
      "purge recovery finished",
    );
    return report;
  }

  /**
   * Moves an interrupted task back to `pending`. Returns undefined when the
   * task changed state in the meantime.
   */
  async #resetTask(task: PurgeTaskRow): Promise<PurgeTaskRow | undefined> {
    if (task.status === "pending") return task;

    assertTransition(task.id, task.status, "pending");
    return this.#backend.updateTask({
      schemaId: this.schemaId,
      id: task.id,
      status: "pending",
      expectedStatus: task.status,
      remainingIds: task.remainingIds,
      failures: task.failures,
      lastError: task.lastError,
      retryAt: undefined,
      completedAt: undefined,
    });
  }
}

// ============================================================
// Factory Function
// ============================================================

/**
 * Creates a new Store instance.
 *
 * @example
 * ```typescript
 * // Tasks run on an in-process queue
 * const store = createStore(blog, backend);
 *
 * // Tasks go to an external queue whose consumers call runTask
 * const store = createStore(blog, backend, {
 *   queue: { enqueue: (message, options) => broker.publish(message, options) },
 * });
 * ```
 */
export function createStore<S extends SchemaDef>(
  schema: S,
  backend: PurgeBackend,
  options?: StoreOptions,
): Store<S> {
  return new Store(schema, backend, options);
}
