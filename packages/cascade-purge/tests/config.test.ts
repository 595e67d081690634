/**
 * Tests for purge configuration.
 */
import { describe, expect, it } from "vitest";

import {
  MAX_TIMER_DELAY_MS,
  parsePurgeConfig,
  purgeConfigFromEnv,
  resolvePurgeConfig,
  retryDelayMs,
} from "../src/config";
import { ConfigurationError } from "../src/errors";

describe("resolvePurgeConfig()", () => {
  it("fills every key with its default", () => {
    expect(resolvePurgeConfig()).toEqual({
      batchSize: 250,
      maxAttempts: 5,
      retryBackoffMs: 1000,
      retryBackoffFactor: 4,
      maxRetryDelayMs: 900_000,
      logLevel: "warn",
    });
  });

  it("keeps given values", () => {
    const config = resolvePurgeConfig({ batchSize: 10, logLevel: "debug" });
    expect(config.batchSize).toBe(10);
    expect(config.logLevel).toBe("debug");
    expect(config.maxAttempts).toBe(5);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(resolvePurgeConfig())).toBe(true);
  });

  it("throws ConfigurationError for out-of-range values", () => {
    expect(() => resolvePurgeConfig({ batchSize: 0 })).toThrow(ConfigurationError);
    expect(() => resolvePurgeConfig({ batchSize: 10_001 })).toThrow(ConfigurationError);
    expect(() => resolvePurgeConfig({ maxAttempts: 1.5 })).toThrow(ConfigurationError);
  });

  it("rejects delays longer than a timer can wait", () => {
    expect(resolvePurgeConfig({ maxRetryDelayMs: MAX_TIMER_DELAY_MS }).maxRetryDelayMs).toBe(
      MAX_TIMER_DELAY_MS,
    );
    expect(() => resolvePurgeConfig({ retryBackoffMs: 3_000_000_000 })).toThrow(
      ConfigurationError,
    );
    expect(() => resolvePurgeConfig({ maxRetryDelayMs: 3_000_000_000 })).toThrow(
      ConfigurationError,
    );
  });
});

describe("parsePurgeConfig()", () => {
  it("returns every issue in one error", () => {
    const result = parsePurgeConfig({ batchSize: -1, logLevel: "loud" });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ConfigurationError);
    expect(result.error.message).toMatch(/^Invalid purge configuration: /);
    expect(result.error.details.issues).toEqual([
      { path: "batchSize", message: expect.any(String) },
      { path: "logLevel", message: expect.any(String) },
    ]);
  });
});

describe("purgeConfigFromEnv()", () => {
  it("coerces PURGE_* variables", () => {
    const config = purgeConfigFromEnv({
      PURGE_BATCH_SIZE: "50",
      PURGE_MAX_ATTEMPTS: "3",
      PURGE_RETRY_BACKOFF_MS: "0",
      PURGE_LOG_LEVEL: "info",
    });

    expect(config.batchSize).toBe(50);
    expect(config.maxAttempts).toBe(3);
    expect(config.retryBackoffMs).toBe(0);
    expect(config.retryBackoffFactor).toBe(4);
    expect(config.logLevel).toBe("info");
  });

  it("uses defaults for unset variables", () => {
    expect(purgeConfigFromEnv({})).toEqual(resolvePurgeConfig());
  });

  it("rejects non-numeric values", () => {
    expect(() => purgeConfigFromEnv({ PURGE_BATCH_SIZE: "lots" })).toThrow(
      ConfigurationError,
    );
  });
});

describe("retryDelayMs()", () => {
  const config = resolvePurgeConfig({
    retryBackoffMs: 1000,
    retryBackoffFactor: 4,
    maxRetryDelayMs: 60_000,
  });

  it("grows exponentially with attempts", () => {
    expect(retryDelayMs(config, 1)).toBe(1000);
    expect(retryDelayMs(config, 2)).toBe(4000);
    expect(retryDelayMs(config, 3)).toBe(16_000);
  });

  it("is capped at maxRetryDelayMs", () => {
    expect(retryDelayMs(config, 4)).toBe(60_000);
    expect(retryDelayMs(config, 10)).toBe(60_000);
  });

  it("treats attempt 0 like the first attempt", () => {
    expect(retryDelayMs(config, 0)).toBe(1000);
  });
});
