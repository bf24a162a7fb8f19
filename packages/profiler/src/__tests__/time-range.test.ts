import { describe, it, expect } from "vitest";
import { CLI_ERROR_CODES } from "@qprof/cli-core";
import { calculateRange, parseSpan } from "../time-range";

const NOW = 1_700_000_000_123;
const NOW_S = 1_700_000_000_000;

function rangeError(spec: string): unknown {
  try {
    calculateRange(spec, NOW);
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("parseSpan", () => {
  it("converts each unit", () => {
    expect(["30s", "5m", "2h", "1d", "1w"].map(parseSpan)).toEqual([
      30_000, 300_000, 7_200_000, 86_400_000, 604_800_000,
    ]);
  });

  it("ignores a leading minus", () => {
    expect(parseSpan("-15m")).toBe(900_000);
  });
});

describe("calculateRange", () => {
  it("defaults to the last hour ending now, truncated to seconds", () => {
    expect(calculateRange(undefined, NOW)).toEqual({
      from: NOW_S - 3_600_000,
      to: NOW_S,
      timeZone: "UTC",
      byReceiptTime: false,
    });
  });

  it("shifts the window back by an offset", () => {
    const range = calculateRange("-1d:2h", NOW);
    expect(range.to).toBe(NOW_S - 86_400_000);
    expect(range.from).toBe(NOW_S - 86_400_000 - 7_200_000);
  });

  it("rejects malformed ranges", () => {
    for (const spec of ["", "1y", "h", "1h:2h:3h", "1h:"]) {
      expect(rangeError(spec)).toMatchObject({ code: CLI_ERROR_CODES.E_INVALID_RANGE });
    }
  });
});
