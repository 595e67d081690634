// Types
export type {
  CreateRecordOptions,
  DestroyResult,
  FindOptions,
  PurgeApi,
  RecordCollection,
  RecordCollections,
  RecordOperations,
  RecoveryReport,
  StoreOptions,
} from "./types";

// Store
export type { Store } from "./store";
export { createStore } from "./store";
