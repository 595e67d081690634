/**
 * Purge configuration.
 *
 * Defaults apply to every key, so `resolvePurgeConfig()` with no input
 * returns a complete configuration.
 */
import { z } from "zod";

import { ConfigurationError } from "../errors";
import { err, ok, type Result, unwrap } from "../utils";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Longest delay a Node.js timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const purgeConfigSchema = z.object({
  /** Maximum identifiers per purge task. */
  batchSize: z.coerce.number().int().min(1).max(10_000).default(250),
  /** Attempts per task before retryable failures become terminal. */
  maxAttempts: z.coerce.number().int().min(1).max(100).default(5),
  retryBackoffMs: z.coerce.number().int().min(0).max(MAX_TIMER_DELAY_MS).default(1000),
  retryBackoffFactor: z.coerce.number().min(1).default(4),
  maxRetryDelayMs: z.coerce
    .number()
    .int()
    .min(0)
    .max(MAX_TIMER_DELAY_MS)
    .default(900_000),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
});

export type PurgeConfig = Readonly<z.infer<typeof purgeConfigSchema>>;

export type PurgeConfigInput = z.input<typeof purgeConfigSchema>;

/**
 * Validates purge configuration, returning a Result instead of throwing.
 */
export function parsePurgeConfig(
  input: unknown = {},
): Result<PurgeConfig, ConfigurationError> {
  const result = purgeConfigSchema.safeParse(input);
  if (result.success) {
    return ok(Object.freeze(result.data));
  }

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));

  return err(
    new ConfigurationError(
      `Invalid purge configuration: ${issues
        .map((issue) => `${issue.path || "(root)"}: ${issue.message}`)
        .join("; ")}`,
      { issues },
      { cause: result.error },
    ),
  );
}

/**
 * Validates purge configuration.
 *
 * @throws ConfigurationError listing every invalid key
 */
export function resolvePurgeConfig(input: PurgeConfigInput = {}): PurgeConfig {
  return unwrap(parsePurgeConfig(input));
}

/**
 * Reads purge configuration from `PURGE_*` environment variables.
 * Unset variables fall back to defaults.
 */
export function purgeConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
): PurgeConfig {
  return unwrap(
    parsePurgeConfig({
      batchSize: env.PURGE_BATCH_SIZE,
      maxAttempts: env.PURGE_MAX_ATTEMPTS,
      retryBackoffMs: env.PURGE_RETRY_BACKOFF_MS,
      retryBackoffFactor: env.PURGE_RETRY_BACKOFF_FACTOR,
      maxRetryDelayMs: env.PURGE_MAX_RETRY_DELAY_MS,
      logLevel: env.PURGE_LOG_LEVEL,
    }),
  );
}

/**
 * Delay before retry number `attempts` of a task, in milliseconds.
 */
export function retryDelayMs(config: PurgeConfig, attempts: number): number {
  const exponent = Math.max(0, attempts - 1);
  const delay = config.retryBackoffMs * config.retryBackoffFactor ** exponent;
  return Math.min(delay, config.maxRetryDelayMs);
}
