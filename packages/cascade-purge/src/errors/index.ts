/**
 * Purge Error Hierarchy
 *
 * All errors extend PurgeError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   await store.records.Author.destroy(authorId);
 * } catch (error) {
 *   if (isPurgeError(error)) {
 *     logger.error(error.toLogString());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `constraint`: Business rule or storage constraint violation. Recoverable by changing data.
 * - `system`: Infrastructure issue. May require investigation or retry.
 */
export type ErrorCategory = "user" | "constraint" | "system";

export type PurgeErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all purge subsystem errors.
 */
export class PurgeError extends Error {
  /** Machine-readable error code (e.g., "CONSTRAINT_VIOLATION") */
  readonly code: string;

  readonly category: ErrorCategory;

  readonly details: Readonly<Record<string, unknown>>;

  readonly suggestion?: string;

  constructor(message: string, code: string, options: PurgeErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "PurgeError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Configuration & Validation Errors (category: "user")
// ============================================================

/**
 * Thrown when a schema definition or store configuration is invalid.
 *
 * Raised while defining entities and relations, building the registry,
 * or resolving purge configuration.
 */
export class ConfigurationError extends PurgeError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review your schema definition and purge configuration.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

/**
 * Validation issue from Zod or custom validation.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid field (e.g., "address.city") */
  path: string;
  message: string;
  /** Zod error code if from Zod validation */
  code?: string;
}>;

export type ValidationErrorDetails = Readonly<{
  kind?: string;
  operation?: "create" | "update";
  id?: string;
  issues: readonly ValidationIssue[];
}>;

/**
 * Thrown when record props fail schema validation.
 *
 * @example
 * ```typescript
 * try {
 *   await store.records.Post.create({ title: 42 });
 * } catch (error) {
 *   if (error instanceof ValidationError) {
 *     console.log(error.details.issues);
 *   }
 * }
 * ```
 */
export class ValidationError extends PurgeError {
  declare readonly details: ValidationErrorDetails;

  constructor(
    message: string,
    details: ValidationErrorDetails,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    const fieldList =
      details.issues.length > 0 ?
        details.issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        `Check the following fields: ${fieldList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

// ============================================================
// Not Found Errors (category: "user")
// ============================================================

/**
 * Thrown when an entity kind is not registered in the schema.
 */
export class KindNotFoundError extends PurgeError {
  constructor(kind: string, options?: { cause?: unknown }) {
    super(`Entity kind not found: ${kind}`, "KIND_NOT_FOUND", {
      details: { kind },
      category: "user",
      suggestion: `Verify "${kind}" is declared under entities in defineSchema() and spelled correctly.`,
      cause: options?.cause,
    });
    this.name = "KindNotFoundError";
  }
}

/**
 * Thrown when a relation is looked up under a parent kind that does not declare it.
 */
export class RelationNotFoundError extends PurgeError {
  constructor(parentKind: string, relation: string, options?: { cause?: unknown }) {
    super(
      `Relation not found: ${parentKind}.${relation}`,
      "RELATION_NOT_FOUND",
      {
        details: { parentKind, relation },
        category: "user",
        suggestion: `Declare "${relation}" under relations in defineSchema() with parent "${parentKind}".`,
        cause: options?.cause,
      },
    );
    this.name = "RelationNotFoundError";
  }
}

/**
 * Thrown when a record is required but does not exist.
 */
export class RecordNotFoundError extends PurgeError {
  constructor(kind: string, id: string, options?: { cause?: unknown }) {
    super(`Record not found: ${kind}/${id}`, "RECORD_NOT_FOUND", {
      details: { kind, id },
      category: "user",
      suggestion: `Verify the record ID "${id}" exists and has not been destroyed.`,
      cause: options?.cause,
    });
    this.name = "RecordNotFoundError";
  }
}

// ============================================================
// Constraint Errors (category: "constraint")
// ============================================================

/**
 * Thrown when the store rejects a write because of a storage constraint
 * (NOT NULL, CHECK, UNIQUE, foreign key).
 *
 * Raised during nullification, this aborts the parent's destruction and
 * rolls back its transaction.
 */
export class ConstraintViolationError extends PurgeError {
  constructor(
    message: string,
    details: Readonly<{ operation: string; driverCode?: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "CONSTRAINT_VIOLATION", {
      details,
      category: "constraint",
      suggestion: `Check that the foreign-key column accepts NULL and that no other constraint depends on it.`,
      cause: options?.cause,
    });
    this.name = "ConstraintViolationError";
  }
}

/**
 * Thrown by lifecycle hooks to refuse the destruction of a record.
 *
 * The purge task records the failure and moves on to the next identifier;
 * the record is not retried.
 *
 * @example
 * ```typescript
 * beforeDestroy(record) {
 *   if (record.locked) {
 *     throw new PermanentRecordError("Post is locked", { kind: "Post", id: record.id });
 *   }
 * }
 * ```
 */
export class PermanentRecordError extends PurgeError {
  constructor(
    message: string,
    details: Readonly<{ kind: string; id: string }> & Record<string, unknown>,
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "PERMANENT_RECORD_ERROR", {
      details,
      category: "constraint",
      suggestion:
        options?.suggestion ??
        `Resolve the condition and destroy ${details.kind}/${details.id} manually.`,
      cause: options?.cause,
    });
    this.name = "PermanentRecordError";
  }
}

// ============================================================
// System Errors (category: "system")
// ============================================================

/**
 * Thrown when the store reports a condition that may clear on retry
 * (lock contention, serialization failure, dropped connection).
 */
export class TransientStoreError extends PurgeError {
  constructor(
    message: string,
    details: Readonly<{ operation: string; driverCode?: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "TRANSIENT_STORE_ERROR", {
      details,
      category: "system",
      suggestion: `The operation can be retried. Purge tasks retry it with backoff.`,
      cause: options?.cause,
    });
    this.name = "TransientStoreError";
  }
}

/**
 * Thrown when a database operation fails unexpectedly.
 */
export class DatabaseOperationError extends PurgeError {
  constructor(
    message: string,
    details: Readonly<{ operation: string; entity: string }>,
    options?: { cause?: unknown },
  ) {
    super(message, "DATABASE_OPERATION_FAILED", {
      details,
      category: "system",
      suggestion: `This is a system-level database error. Check the database connection and retry the operation. If the problem persists, investigate the underlying cause.`,
      cause: options?.cause,
    });
    this.name = "DatabaseOperationError";
  }
}

/**
 * Thrown when a purge task is moved between states that do not connect.
 */
export class InvalidTaskTransitionError extends PurgeError {
  constructor(
    taskId: string,
    from: string,
    to: string,
    options?: { cause?: unknown },
  ) {
    super(
      `Invalid purge task transition for ${taskId}: ${from} -> ${to}`,
      "INVALID_TASK_TRANSITION",
      {
        details: { taskId, from, to },
        category: "system",
        suggestion: `This is an internal error. Please report it with the task history.`,
        cause: options?.cause,
      },
    );
    this.name = "InvalidTaskTransitionError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for PurgeError.
 */
export function isPurgeError(error: unknown): error is PurgeError {
  return error instanceof PurgeError;
}

/**
 * Check if error is a constraint violation or a permanent record refusal.
 */
export function isConstraintError(error: unknown): boolean {
  return isPurgeError(error) && error.category === "constraint";
}

/**
 * Check if a purge task should retry the identifier that raised `error`.
 *
 * Only constraint-category errors are treated as permanent. User errors
 * raised mid-purge and errors from outside the library are retried until
 * the task's attempts run out.
 */
export function isRetryableError(error: unknown): boolean {
  return !isConstraintError(error);
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isPurgeError(error) ? error.suggestion : undefined;
}

// ============================================================
// Driver Error Translation
// ============================================================

const TRANSIENT_SQLITE_CODES = new Set(["SQLITE_BUSY", "SQLITE_LOCKED"]);

const TRANSIENT_NODE_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
]);

// 40001 serialization_failure, 40P01 deadlock_detected, 55P03 lock_not_available
const TRANSIENT_POSTGRES_CODES = new Set(["40001", "40P01", "55P03"]);

function getDriverCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  const code = error.code;
  return typeof code === "string" ? code : undefined;
}

function isConstraintCode(code: string): boolean {
  if (code.startsWith("SQLITE_CONSTRAINT")) return true;
  // Class 23: integrity constraint violation
  return /^23[0-9A-Z]{3}$/.test(code);
}

function isTransientCode(code: string): boolean {
  if (TRANSIENT_SQLITE_CODES.has(code)) return true;
  if (TRANSIENT_NODE_CODES.has(code)) return true;
  if (TRANSIENT_POSTGRES_CODES.has(code)) return true;
  // Class 08: connection exception; 57P0x: operator intervention / shutdown
  return /^08[0-9A-Z]{3}$/.test(code) || /^57P0[0-9]$/.test(code);
}

/**
 * Translates a driver error into the library's error hierarchy.
 *
 * PurgeErrors pass through unchanged. Constraint codes from SQLite and
 * PostgreSQL become ConstraintViolationError, connectivity and contention
 * codes become TransientStoreError, anything else DatabaseOperationError.
 */
export function toStoreError(error: unknown, operation: string): PurgeError {
  if (isPurgeError(error)) return error;

  const message = error instanceof Error ? error.message : String(error);
  const driverCode = getDriverCode(error);

  if (driverCode !== undefined && isConstraintCode(driverCode)) {
    return new ConstraintViolationError(
      `Constraint violation during ${operation}: ${message}`,
      { operation, driverCode },
      { cause: error },
    );
  }

  if (driverCode !== undefined && isTransientCode(driverCode)) {
    return new TransientStoreError(
      `Transient store failure during ${operation}: ${message}`,
      { operation, driverCode },
      { cause: error },
    );
  }

  return new DatabaseOperationError(
    `Database operation failed during ${operation}: ${message}`,
    { operation, entity: "store" },
    { cause: error },
  );
}
