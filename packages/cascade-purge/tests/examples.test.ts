import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest";

import { main as basicUsage } from "../examples/01-basic-usage";
import { main as retriesAndRecovery } from "../examples/02-retries-and-recovery";

const EXAMPLES = [
  { name: "01-basic-usage", main: basicUsage },
  { name: "02-retries-and-recovery", main: retriesAndRecovery },
] as const;

describe("examples", () => {
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(vi.fn());
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(vi.fn());
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  for (const { name, main } of EXAMPLES) {
    it(`${name} runs without error`, async () => {
      await expect(main()).resolves.toBeUndefined();
    });
  }

  it("01-basic-usage purges every post and comment", async () => {
    await basicUsage();

    expect(consoleLogSpy).toHaveBeenCalledWith("Posts left: 0");
    expect(consoleLogSpy).toHaveBeenCalledWith("Comments left: 0");
  });

  it("02-retries-and-recovery keeps the unpaid invoice", async () => {
    await retriesAndRecovery();

    expect(consoleLogSpy).toHaveBeenCalledWith("Invoices kept: 1");
    expect(consoleLogSpy).toHaveBeenCalledWith("Invoices left: 0");
  });
});
