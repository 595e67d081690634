export {
  createInProcessQueue,
  type InProcessQueue,
  type InProcessQueueOptions,
  type InProcessQueueStats,
} from "./in-process";
export type {
  EnqueueOptions,
  PurgeQueue,
  PurgeTaskHandler,
  PurgeTaskMessage,
} from "./types";
