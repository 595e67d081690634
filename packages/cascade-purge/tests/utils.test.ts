/**
 * Unit tests for Result, date and ID utilities.
 */
import { describe, expect, it } from "vitest";

import { parsePurgeConfig } from "../src/config";
import { ConfigurationError } from "../src/errors";
import {
  err,
  isErr,
  isOk,
  isoAfter,
  msUntil,
  ok,
  purgeTaskId,
  unwrap,
} from "../src/utils";

describe("result utilities", () => {
  it("narrows a successful result with isOk", () => {
    const result = parsePurgeConfig({ batchSize: 40 });

    expect(isOk(result)).toBe(true);
    expect(isErr(result)).toBe(false);
    if (isOk(result)) {
      expect(result.data.batchSize).toBe(40);
    }
  });

  it("narrows a failed result with isErr", () => {
    const result = parsePurgeConfig({ maxAttempts: 0 });

    expect(isErr(result)).toBe(true);
    expect(isOk(result)).toBe(false);
    if (isErr(result)) {
      expect(result.error).toBeInstanceOf(ConfigurationError);
    }
  });

  it("unwraps data and throws the error", () => {
    expect(unwrap(ok(["c1", "c2"]))).toEqual(["c1", "c2"]);
    expect(() => unwrap(err(new Error("broker unavailable")))).toThrow(
      "broker unavailable",
    );
  });
});

describe("date utilities", () => {
  const from = new Date("2026-03-01T12:00:00.000Z");

  it("adds a delay to a timestamp", () => {
    expect(isoAfter(1500, from)).toBe("2026-03-01T12:00:01.500Z");
  });

  it("measures the time left until a timestamp", () => {
    expect(msUntil("2026-03-01T12:00:05.000Z", from)).toBe(5000);
    expect(msUntil("2026-03-01T11:59:00.000Z", from)).toBe(0);
    expect(msUntil(undefined, from)).toBe(0);
  });
});

describe("purgeTaskId()", () => {
  it("joins the batch ID and chunk index", () => {
    expect(purgeTaskId("batch-1", 0)).toBe("batch-1:0");
    expect(purgeTaskId("batch-1", 12)).toBe("batch-1:12");
  });
});
