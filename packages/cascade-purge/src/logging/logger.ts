import pino, { type Logger } from "pino";

import type { LogLevel } from "../config";

export type { Logger } from "pino";

export type LoggerOptions = Readonly<{
  level?: LogLevel;
  name?: string;
}>;

export type PurgeComponent = "destroyer" | "queue" | "scheduler" | "store";

/**
 * Creates the structured logger used by a store and its purge components.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "cascade-purge",
    level: options.level ?? "warn",
  });
}

export function componentLogger(
  logger: Logger,
  component: PurgeComponent,
): Logger {
  return logger.child({ component });
}
