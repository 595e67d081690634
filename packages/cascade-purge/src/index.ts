/**
 * cascade-purge: nullify-then-purge cascading deletes for typed record stores
 *
 * @example
 * ```typescript
 * import { defineEntity, defineRelation, defineSchema, createStore } from "cascade-purge";
 * import { createLocalSqliteBackend } from "cascade-purge/sqlite/local";
 * import { z } from "zod";
 *
 * const Author = defineEntity("Author", {
 *   schema: z.object({ name: z.string() }),
 * });
 *
 * const Post = defineEntity("Post", {
 *   schema: z.object({
 *     title: z.string(),
 *     authorId: z.string().nullable(),
 *   }),
 * });
 *
 * const blog = defineSchema({
 *   id: "blog",
 *   entities: {
 *     Author: { type: Author },
 *     Post: { type: Post },
 *   },
 *   relations: {
 *     posts: defineRelation(Author, Post, { foreignKey: "authorId", batchSize: 100 }),
 *   },
 * });
 *
 * const { backend } = createLocalSqliteBackend();
 * const store = createStore(blog, backend);
 *
 * // One UPDATE detaches every post; the posts are purged by queued tasks
 * await store.records.Author.destroy(authorId);
 * ```
 */

// ============================================================
// Core DSL
// ============================================================

export {
  defineEntity,
  type DefineEntityOptions,
  defineRelation,
  type DefineRelationOptions,
  defineSchema,
  type DestroyHooks,
  type EntityKindNames,
  type EntityProps,
  type EntityRecord,
  type EntityRegistration,
  type EntitySchema,
  type EntityType,
  type GetEntityType,
  isEntityType,
  isRelationDeclaration,
  isSchemaDef,
  type NullableKeys,
  type RecordMeta,
  type RelationDeclaration,
  type RelationNames,
  type SchemaDef,
  type SchemaDefaults,
} from "./core";

// ============================================================
// Backend Types
// ============================================================

export type {
  BatchStatus,
  OrphanBatchRow,
  PurgeBackend,
  PurgeTaskRow,
  RecordRow,
  SqlDialect,
  TaskFailure,
  TaskStatus,
  TransactionBackend,
} from "./backend/types";

// ============================================================
// Configuration
// ============================================================

export {
  LOG_LEVELS,
  type LogLevel,
  MAX_TIMER_DELAY_MS,
  parsePurgeConfig,
  type PurgeConfig,
  type PurgeConfigInput,
  purgeConfigFromEnv,
  purgeConfigSchema,
  resolvePurgeConfig,
  retryDelayMs,
} from "./config";

// ============================================================
// Logging
// ============================================================

export {
  componentLogger,
  createLogger,
  type Logger,
  type LoggerOptions,
  type PurgeComponent,
} from "./logging";

// ============================================================
// Errors
// ============================================================

export type {
  ErrorCategory,
  PurgeErrorOptions,
  ValidationErrorDetails,
  ValidationIssue,
} from "./errors";
export {
  ConfigurationError,
  ConstraintViolationError,
  DatabaseOperationError,
  getErrorSuggestion,
  InvalidTaskTransitionError,
  isConstraintError,
  isPurgeError,
  isRetryableError,
  KindNotFoundError,
  PermanentRecordError,
  PurgeError,
  RecordNotFoundError,
  RelationNotFoundError,
  toStoreError,
  TransientStoreError,
  ValidationError,
} from "./errors";

// Validation utilities
export type { ValidationContext } from "./errors/validation";
export { validateProps, wrapZodError } from "./errors/validation";

// ============================================================
// Relation Registry
// ============================================================

export {
  buildRelationRegistry,
  defaultRelationHandlers,
  FrozenMap,
  type RelationDefinition,
  type RelationEntry,
  type RelationHandlerFactory,
  type RelationHandlers,
  type RelationRegistry,
} from "./registry";

// ============================================================
// Purge Pipeline
// ============================================================

export {
  assertTransition,
  canTransition,
  chunkIdentifiers,
  isOpenStatus,
  isTerminalStatus,
  listPendingBatches,
  markOrphans,
  type MarkOrphansParams,
  nullifyChildren,
  type NullifyTarget,
  OPEN_TASK_STATUSES,
  type PurgeContext,
  runPurgeTask,
  type RunTaskOptions,
  scheduleBatch,
  type ScheduleResult,
  settleBatch,
  type SettleOutcome,
  type TaskOutcome,
  type TaskOutcomeKind,
} from "./purge";

// ============================================================
// Task Queue
// ============================================================

export {
  createInProcessQueue,
  type EnqueueOptions,
  type InProcessQueue,
  type InProcessQueueOptions,
  type InProcessQueueStats,
  type PurgeQueue,
  type PurgeTaskHandler,
  type PurgeTaskMessage,
} from "./queue";

// ============================================================
// Store
// ============================================================

export {
  type CreateRecordOptions,
  createStore,
  type DestroyResult,
  type FindOptions,
  type PurgeApi,
  type RecordCollection,
  type RecordCollections,
  type RecoveryReport,
  type Store,
  type StoreOptions,
} from "./store";

// ============================================================
// Utilities
// ============================================================

export {
  err,
  generateId,
  type IdGenerator,
  isErr,
  isOk,
  ok,
  purgeTaskId,
  type Result,
  unwrap,
} from "./utils";
