import { describe, expect, it } from "vitest";

import { formatDuration, secondsFromMs } from "./time.js";

describe("secondsFromMs", () => {
  it("rounds to milliseconds", () => {
    expect(secondsFromMs(1234)).toBe(1.234);
    expect(secondsFromMs(Number.NaN)).toBe(0);
  });
});

describe("formatDuration", () => {
  it("formats seconds and minutes", () => {
    expect(formatDuration(4_400)).toBe("4s");
    expect(formatDuration(125_000)).toBe("2m05s");
  });

  it("clamps invalid durations", () => {
    expect(formatDuration(-5)).toBe("0s");
  });
});
