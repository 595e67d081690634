import type { PurgeBackend } from "../backend/types";
import type { PurgeConfig } from "../config";
import type { Logger } from "../logging";
import type { PurgeQueue } from "../queue/types";
import type { RelationRegistry } from "../registry";
import type { IdGenerator } from "../utils";

/**
 * Everything the scheduler and destroyer need from a store.
 */
export type PurgeContext = Readonly<{
  schemaId: string;
  backend: PurgeBackend;
  registry: RelationRegistry;
  config: PurgeConfig;
  logger: Logger;
  queue: PurgeQueue;
  idGenerator: IdGenerator;
}>;
