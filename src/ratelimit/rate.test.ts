import { describe, expect, it } from "vitest";
import { InvalidRateError } from "./errors.js";
import { createRate, parseRate } from "./rate.js";

describe("parseRate", () => {
  it.each([
    ["100-M", 100, 60_000],
    ["10-H", 10, 3_600_000],
    ["5-S", 5, 1_000],
    ["1000-D", 1000, 86_400_000],
  ])("parses %s", (formatted, limit, periodMs) => {
    expect(parseRate(formatted)).toEqual({ limit, periodMs, formatted });
  });

  it("accepts lowercase units and surrounding whitespace, normalizing the label", () => {
    expect(parseRate(" 60-m ")).toEqual({ limit: 60, periodMs: 60_000, formatted: "60-M" });
  });

  it.each(["", "100", "M-100", "100-Y", "100-MM", "-5-M", "1.5-M"])("rejects %j", (formatted) => {
    expect(() => parseRate(formatted)).toThrow(InvalidRateError);
  });

  it("rejects a zero limit", () => {
    expect(() => parseRate("0-M")).toThrow('Invalid rate "0-M": limit must be a positive integer');
  });

  it("returns a frozen rate", () => {
    expect(Object.isFrozen(parseRate("1-H"))).toBe(true);
  });
});

describe("createRate", () => {
  it("labels unformatted rates by their raw values", () => {
    expect(createRate(3, 2_500).formatted).toBe("3/2500ms");
  });

  it("rejects non-positive periods", () => {
    expect(() => createRate(3, 0)).toThrow("period must be a positive number of milliseconds");
  });
});
