import { describe, expect, it } from "vitest";

import type { TaskStatus } from "../src/backend/types";
import { InvalidTaskTransitionError } from "../src/errors";
import {
  assertTransition,
  canTransition,
  isOpenStatus,
  isTerminalStatus,
} from "../src/purge/task-state";

const ALLOWED: readonly (readonly [TaskStatus, TaskStatus])[] = [
  ["pending", "running"],
  ["running", "completed"],
  ["running", "failed_retryable"],
  ["running", "failed_terminal"],
  ["running", "pending"],
  ["failed_retryable", "pending"],
];

const STATUSES: readonly TaskStatus[] = [
  "pending",
  "running",
  "completed",
  "failed_retryable",
  "failed_terminal",
];

describe("purge task state machine", () => {
  it.each(ALLOWED)("allows %s -> %s", (from, to) => {
    expect(canTransition(from, to)).toBe(true);
    expect(() => assertTransition("b1:0", from, to)).not.toThrow();
  });

  it("rejects every other transition", () => {
    for (const from of STATUSES) {
      for (const to of STATUSES) {
        const allowed = ALLOWED.some(([a, b]) => a === from && b === to);
        expect(canTransition(from, to)).toBe(allowed);
      }
    }
  });

  it("throws InvalidTaskTransitionError naming the task", () => {
    expect(() => assertTransition("b1:0", "completed", "running")).toThrow(
      InvalidTaskTransitionError,
    );
    expect(() => assertTransition("b1:0", "pending", "completed")).toThrow(
      "Invalid purge task transition for b1:0: pending -> completed",
    );
  });

  it("classifies terminal and open statuses", () => {
    expect(STATUSES.filter((status) => isTerminalStatus(status))).toEqual([
      "completed",
      "failed_terminal",
    ]);
    expect(STATUSES.filter((status) => isOpenStatus(status))).toEqual([
      "pending",
      "running",
      "failed_retryable",
    ]);
  });
});
