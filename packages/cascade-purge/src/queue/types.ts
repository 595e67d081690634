/**
 * Task queue interface for purge tasks.
 *
 * Delivery is at least once: a consumer may see the same task twice, and
 * `runPurgeTask` treats a duplicate as a no-op.
 */

export type PurgeTaskMessage = Readonly<{
  schemaId: string;
  taskId: string;
}>;

export type EnqueueOptions = Readonly<{
  /** Deliver no earlier than this many milliseconds from now */
  delayMs?: number;
}>;

export type PurgeQueue = Readonly<{
  /** Resolves to the message ID */
  enqueue: (
    payload: PurgeTaskMessage,
    options?: EnqueueOptions,
  ) => Promise<string>;
}>;

/**
 * Consumer callback. The signal aborts when the queue closes.
 */
export type PurgeTaskHandler = (
  payload: PurgeTaskMessage,
  signal: AbortSignal,
) => Promise<unknown>;
