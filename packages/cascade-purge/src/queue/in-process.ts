import { MAX_TIMER_DELAY_MS } from "../config";
import { ConfigurationError } from "../errors";
import { componentLogger, createLogger, type Logger } from "../logging";
import { generateId, type IdGenerator } from "../utils";
import type {
  EnqueueOptions,
  PurgeQueue,
  PurgeTaskHandler,
  PurgeTaskMessage,
} from "./types";

export type InProcessQueueOptions = Readonly<{
  /** Maximum handlers running at once (default 1) */
  concurrency?: number;
  logger?: Logger;
  idGenerator?: IdGenerator;
}>;

export type InProcessQueueStats = Readonly<{
  ready: number;
  delayed: number;
  active: number;
}>;

type Delivery = Readonly<{
  id: string;
  payload: PurgeTaskMessage;
}>;

/**
 * A purge queue that delivers messages to a handler in the same process.
 *
 * Messages enqueued before `process()` is called are buffered. Delayed
 * messages wait on timers that do not keep the process alive, so a
 * process that exits loses them; `store.purge.recover()` re-enqueues
 * their tasks on the next start.
 */
export class InProcessQueue implements PurgeQueue {
  readonly #concurrency: number;
  readonly #logger: Logger;
  readonly #idGenerator: IdGenerator;
  readonly #ready: Delivery[] = [];
  readonly #timers = new Map<string, NodeJS.Timeout>();
  readonly #running = new Map<string, Promise<void>>();
  readonly #controller = new AbortController();
  #handler: PurgeTaskHandler | undefined;
  #idleWaiters: (() => void)[] = [];
  #closed = false;

  constructor(options: InProcessQueueOptions = {}) {
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(
        `Queue concurrency must be a positive integer, got ${concurrency}`,
        { concurrency },
      );
    }
    this.#concurrency = concurrency;
    this.#logger = componentLogger(options.logger ?? createLogger(), "queue");
    this.#idGenerator = options.idGenerator ?? generateId;
  }

  get closed(): boolean {
    return this.#closed;
  }

  enqueue = async (
    payload: PurgeTaskMessage,
    options: EnqueueOptions = {},
  ): Promise<string> => {
    if (this.#closed) {
      throw new ConfigurationError("Cannot enqueue on a closed queue", {
        taskId: payload.taskId,
      });
    }

    const delivery: Delivery = { id: this.#idGenerator(), payload };
    const delayMs = Math.min(options.delayMs ?? 0, MAX_TIMER_DELAY_MS);

    if (delayMs > 0) {
      const timer = setTimeout(() => {
        this.#timers.delete(delivery.id);
        this.#ready.push(delivery);
        this.#pump();
      }, delayMs);
      timer.unref();
      this.#timers.set(delivery.id, timer);
    } else {
      this.#ready.push(delivery);
      this.#pump();
    }

    return delivery.id;
  };

  /**
   * Starts delivering messages to `handler`.
   *
   * @throws ConfigurationError if a handler is already registered
   */
  process(handler: PurgeTaskHandler): void {
    if (this.#handler !== undefined) {
      throw new ConfigurationError("Queue already has a handler", {});
    }
    this.#handler = handler;
    this.#pump();
  }

  /**
   * Resolves once no message is ready or running. Delayed messages are not
   * waited for.
   */
  async drain(): Promise<void> {
    if (this.#isIdle()) return;
    await new Promise<void>((resolve) => {
      this.#idleWaiters.push(resolve);
    });
  }

  /**
   * Aborts running handlers, drops ready and delayed messages and waits for
   * the running handlers to return.
   */
  async close(): Promise<void> {
    if (this.#closed) return;
    this.#closed = true;

    for (const timer of this.#timers.values()) {
      clearTimeout(timer);
    }
    this.#timers.clear();
    this.#ready.length = 0;
    this.#controller.abort();

    await Promise.all(this.#running.values());
    this.#notifyIdle();
  }

  stats(): InProcessQueueStats {
    return {
      ready: this.#ready.length,
      delayed: this.#timers.size,
      active: this.#running.size,
    };
  }

  #isIdle(): boolean {
    return this.#closed || (this.#ready.length === 0 && this.#running.size === 0);
  }

  #notifyIdle(): void {
    if (!this.#isIdle()) return;
    const waiters = this.#idleWaiters;
    this.#idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  #pump(): void {
    const handler = this.#handler;
    if (handler === undefined) return;

    while (
      !this.#closed &&
      this.#running.size < this.#concurrency &&
      this.#ready.length > 0
    ) {
      const delivery = this.#ready.shift();
      if (delivery === undefined) break;
      const run = Promise.resolve()
        .then(() => this.#deliver(handler, delivery))
        .finally(() => {
          this.#running.delete(delivery.id);
          this.#pump();
          this.#notifyIdle();
        });
      this.#running.set(delivery.id, run);
    }
  }

  async #deliver(handler: PurgeTaskHandler, delivery: Delivery): Promise<void> {
    try {
      await handler(delivery.payload, this.#controller.signal);
    } catch (error) {
      // The task row still records the work; recover() redelivers it.
      this.#logger.error(
        { err: error, messageId: delivery.id, taskId: delivery.payload.taskId },
        "purge task handler failed",
      );
    }
  }
}

export function createInProcessQueue(
  options: InProcessQueueOptions = {},
): InProcessQueue {
  return new InProcessQueue(options);
}
