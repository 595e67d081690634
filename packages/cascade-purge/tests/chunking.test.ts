import { describe, expect, it } from "vitest";

import { ConfigurationError } from "../src/errors";
import { chunkIdentifiers } from "../src/purge/scheduler";

describe("chunkIdentifiers()", () => {
  it("splits five ids into chunks of two, two and one", () => {
    const chunks = chunkIdentifiers(["a", "b", "c", "d", "e"], 2);
    expect(chunks).toEqual([["a", "b"], ["c", "d"], ["e"]]);
    expect(chunks.map((chunk) => chunk.length)).toEqual([2, 2, 1]);
  });

  it("returns one chunk when the size covers every id", () => {
    expect(chunkIdentifiers(["a", "b"], 250)).toEqual([["a", "b"]]);
  });

  it("returns no chunks for no ids", () => {
    expect(chunkIdentifiers([], 3)).toEqual([]);
  });

  it("preserves order", () => {
    expect(chunkIdentifiers(["z", "a", "m"], 1)).toEqual([["z"], ["a"], ["m"]]);
  });

  it.each([0, -1, 1.5, Number.NaN])("rejects size %s", (size) => {
    expect(() => chunkIdentifiers(["a"], size)).toThrow(ConfigurationError);
  });
});
