import { describe, expect, it } from "vitest";

import {
  DurationParseError,
  formatElapsed,
  formatMillisecondsToDuration,
  MAX_DURATION_MS,
  parseDurationToMilliseconds,
} from "../duration";

describe("parseDurationToMilliseconds", () => {
  it("parses milliseconds", () => {
    expect(parseDurationToMilliseconds("500ms")).toBe(500);
  });

  it("parses seconds", () => {
    expect(parseDurationToMilliseconds("3s")).toBe(3_000);
  });

  it("parses minutes and hours", () => {
    expect(parseDurationToMilliseconds("2m")).toBe(120_000);
    expect(parseDurationToMilliseconds("1h")).toBe(3_600_000);
  });

  it("treats a bare integer as seconds only when asked to", () => {
    expect(parseDurationToMilliseconds("10", { allowBareSeconds: true })).toBe(10_000);
    expect(() => parseDurationToMilliseconds("10")).toThrow(DurationParseError);
  });

  it("throws for invalid input", () => {
    expect(() => parseDurationToMilliseconds("10seconds")).toThrow(
      'Invalid duration string: "10seconds"',
    );
  });

  it("rejects durations a single timer cannot hold", () => {
    expect(parseDurationToMilliseconds("596h")).toBe(2_145_600_000);
    expect(() => parseDurationToMilliseconds("600h")).toThrow(
      `Duration exceeds ${MAX_DURATION_MS}ms: "600h"`,
    );
    expect(() => parseDurationToMilliseconds("2147484s", { allowBareSeconds: true })).toThrow(
      DurationParseError,
    );
  });
});

describe("formatMillisecondsToDuration", () => {
  it("formats minutes when divisible", () => {
    expect(formatMillisecondsToDuration(120_000)).toBe("2m");
  });

  it("formats seconds when divisible", () => {
    expect(formatMillisecondsToDuration(9_000)).toBe("9s");
  });

  it("falls back to milliseconds", () => {
    expect(formatMillisecondsToDuration(750)).toBe("750ms");
  });

  it("throws on invalid milliseconds", () => {
    expect(() => formatMillisecondsToDuration(-1)).toThrow(TypeError);
  });
});

describe("formatElapsed", () => {
  it("prints seconds below a minute", () => {
    expect(formatElapsed(7_900)).toBe("7s");
  });

  it("pads seconds once minutes appear", () => {
    expect(formatElapsed(185_000)).toBe("3m05s");
  });

  it("pads minutes and seconds once hours appear", () => {
    expect(formatElapsed(3_729_000)).toBe("1h02m09s");
  });

  it("clamps negative values to zero", () => {
    expect(formatElapsed(-5)).toBe("0s");
  });
});
