import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { chunkIdentifiers } from "../../src/purge/scheduler";

const idsArb = fc.uniqueArray(fc.string({ minLength: 1, maxLength: 12 }), {
  maxLength: 200,
});
const sizeArb = fc.integer({ min: 1, max: 50 });

describe("chunkIdentifiers properties", () => {
  it("covers every id exactly once, in order", () => {
    fc.assert(
      fc.property(idsArb, sizeArb, (ids, size) => {
        const chunks = chunkIdentifiers(ids, size);
        expect(chunks.flat()).toEqual(ids);
      }),
    );
  });

  it("never produces an empty or oversized chunk", () => {
    fc.assert(
      fc.property(idsArb, sizeArb, (ids, size) => {
        for (const chunk of chunkIdentifiers(ids, size)) {
          expect(chunk.length).toBeGreaterThan(0);
          expect(chunk.length).toBeLessThanOrEqual(size);
        }
      }),
    );
  });

  it("produces ceil(n / size) chunks with only the last one short", () => {
    fc.assert(
      fc.property(idsArb, sizeArb, (ids, size) => {
        const chunks = chunkIdentifiers(ids, size);
        expect(chunks).toHaveLength(Math.ceil(ids.length / size));
        for (const chunk of chunks.slice(0, -1)) {
          expect(chunk).toHaveLength(size);
        }
      }),
    );
  });

  it("is deterministic", () => {
    fc.assert(
      fc.property(idsArb, sizeArb, (ids, size) => {
        expect(chunkIdentifiers(ids, size)).toEqual(chunkIdentifiers(ids, size));
      }),
    );
  });
});
