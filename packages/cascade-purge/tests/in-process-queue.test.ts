import { afterEach, describe, expect, it, vi } from "vitest";

import { ConfigurationError } from "../src/errors";
import { createInProcessQueue } from "../src/queue/in-process";
import type { PurgeTaskMessage } from "../src/queue/types";
import { sequentialIds, silentLogger } from "./test-utils";

function message(taskId: string): PurgeTaskMessage {
  return { schemaId: "blog", taskId };
}

function createQueue(concurrency = 1) {
  return createInProcessQueue({
    concurrency,
    logger: silentLogger(),
    idGenerator: sequentialIds("msg"),
  });
}

afterEach(() => {
  vi.useRealTimers();
});

describe("InProcessQueue", () => {
  it("buffers messages until a handler is registered", async () => {
    const queue = createQueue();
    const seen: string[] = [];

    await expect(queue.enqueue(message("t1"))).resolves.toBe("msg-1");
    await queue.enqueue(message("t2"));
    expect(queue.stats()).toEqual({ ready: 2, delayed: 0, active: 0 });

    queue.process((payload) => {
      seen.push(payload.taskId);
      return Promise.resolve();
    });
    await queue.drain();

    expect(seen).toEqual(["t1", "t2"]);
  });

  it("never runs more handlers than its concurrency", async () => {
    const queue = createQueue(2);
    let active = 0;
    let peak = 0;
    queue.process(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setImmediate(resolve));
      active--;
    });

    for (const taskId of ["t1", "t2", "t3", "t4", "t5"]) {
      await queue.enqueue(message(taskId));
    }
    await queue.drain();

    expect(peak).toBe(2);
    expect(queue.stats()).toEqual({ ready: 0, delayed: 0, active: 0 });
  });

  it("waits for messages enqueued by running handlers", async () => {
    const queue = createQueue();
    const seen: string[] = [];
    queue.process(async (payload) => {
      seen.push(payload.taskId);
      if (payload.taskId === "parent") {
        await queue.enqueue(message("child"));
      }
    });

    await queue.enqueue(message("parent"));
    await queue.drain();

    expect(seen).toEqual(["parent", "child"]);
  });

  it("delivers delayed messages once their delay has passed", async () => {
    vi.useFakeTimers();
    const queue = createQueue();
    const seen: string[] = [];
    queue.process((payload) => {
      seen.push(payload.taskId);
      return Promise.resolve();
    });

    await queue.enqueue(message("later"), { delayMs: 1000 });
    expect(queue.stats()).toEqual({ ready: 0, delayed: 1, active: 0 });
    await queue.drain();
    expect(seen).toEqual([]);

    vi.advanceTimersByTime(1000);
    await queue.drain();

    expect(seen).toEqual(["later"]);
  });

  it("holds back messages delayed past the longest timer delay", async () => {
    vi.useFakeTimers();
    const queue = createQueue();
    const seen: string[] = [];
    queue.process((payload) => {
      seen.push(payload.taskId);
      return Promise.resolve();
    });

    await queue.enqueue(message("much-later"), { delayMs: 3_000_000_000 });
    vi.advanceTimersByTime(100);
    await queue.drain();

    expect(seen).toEqual([]);
    expect(queue.stats()).toEqual({ ready: 0, delayed: 1, active: 0 });
  });

  it("keeps delivering after a handler fails", async () => {
    const queue = createQueue();
    const seen: string[] = [];
    queue.process((payload) => {
      seen.push(payload.taskId);
      return payload.taskId === "t1" ?
          Promise.reject(new Error("handler crashed"))
        : Promise.resolve();
    });

    await queue.enqueue(message("t1"));
    await queue.enqueue(message("t2"));
    await queue.drain();

    expect(seen).toEqual(["t1", "t2"]);
  });

  it("aborts running handlers and drops queued messages on close", async () => {
    const queue = createQueue();
    const seen: string[] = [];
    const aborted: boolean[] = [];
    queue.process(async (payload, signal) => {
      seen.push(payload.taskId);
      if (!signal.aborted) {
        await new Promise<void>((resolve) => {
          signal.addEventListener("abort", () => resolve());
        });
      }
      aborted.push(signal.aborted);
    });

    await queue.enqueue(message("t1"));
    await queue.enqueue(message("t2"));
    await queue.enqueue(message("t3"), { delayMs: 60_000 });
    await queue.close();

    expect(seen).toEqual(["t1"]);
    expect(aborted).toEqual([true]);
    expect(queue.closed).toBe(true);
    await expect(queue.enqueue(message("t4"))).rejects.toThrow(ConfigurationError);
  });

  it("accepts one handler", () => {
    const queue = createQueue();
    queue.process(() => Promise.resolve());

    expect(() => queue.process(() => Promise.resolve())).toThrow(
      "Queue already has a handler",
    );
  });

  it.each([0, 1.5])("rejects concurrency %s", (concurrency) => {
    expect(() => createQueue(concurrency)).toThrow(ConfigurationError);
  });
});
