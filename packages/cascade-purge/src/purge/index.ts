export type { PurgeContext } from "./context";
export {
  runPurgeTask,
  type RunTaskOptions,
  type TaskOutcome,
  type TaskOutcomeKind,
} from "./destroyer";
export { nullifyChildren, type NullifyTarget } from "./nullify";
export {
  listPendingBatches,
  markOrphans,
  type MarkOrphansParams,
} from "./orphan-marker";
export {
  chunkIdentifiers,
  scheduleBatch,
  type ScheduleResult,
  settleBatch,
  type SettleOutcome,
} from "./scheduler";
export {
  assertTransition,
  canTransition,
  isOpenStatus,
  isTerminalStatus,
  OPEN_TASK_STATUSES,
} from "./task-state";
