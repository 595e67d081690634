import type { TaskStatus } from "../backend/types";
import { InvalidTaskTransitionError } from "../errors";

/**
 * Allowed purge task transitions.
 *
 * `running -> pending` covers cancellation and crash recovery;
 * `failed_retryable -> pending` is the retry path.
 */
const TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ["running"],
  running: ["completed", "failed_retryable", "failed_terminal", "pending"],
  failed_retryable: ["pending"],
  completed: [],
  failed_terminal: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * @throws InvalidTaskTransitionError when `to` is not reachable from `from`
 */
export function assertTransition(
  taskId: string,
  from: TaskStatus,
  to: TaskStatus,
): void {
  if (!canTransition(from, to)) {
    throw new InvalidTaskTransitionError(taskId, from, to);
  }
}

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === "completed" || status === "failed_terminal";
}

/** Statuses that still have work to do. */
export const OPEN_TASK_STATUSES: readonly TaskStatus[] = [
  "pending",
  "running",
  "failed_retryable",
];

export function isOpenStatus(status: TaskStatus): boolean {
  return !isTerminalStatus(status);
}
