import { describe, expect, it } from "vitest";
import { formatRemaining, parseDurationMs } from "./duration";

describe("parseDurationMs", () => {
  it("accepts plain milliseconds", () => {
    expect(parseDurationMs(1500)).toBe(1500);
    expect(parseDurationMs("250")).toBe(250);
    expect(parseDurationMs(12.9)).toBe(12);
  });

  it("accepts unit suffixes and compound durations", () => {
    expect(parseDurationMs("5s")).toBe(5_000);
    expect(parseDurationMs("2M")).toBe(120_000);
    expect(parseDurationMs("1h30m")).toBe(5_400_000);
    expect(parseDurationMs("1d")).toBe(86_400_000);
    expect(parseDurationMs("750ms")).toBe(750);
  });

  it("rejects anything else", () => {
    expect(parseDurationMs("")).toBeNull();
    expect(parseDurationMs("five seconds")).toBeNull();
    expect(parseDurationMs("5 s")).toBeNull();
    expect(parseDurationMs(-1)).toBeNull();
    expect(parseDurationMs(Number.NaN)).toBeNull();
  });
});

describe("formatRemaining", () => {
  it("rounds up to whole seconds", () => {
    expect(formatRemaining(1)).toBe("1s");
    expect(formatRemaining(4_200)).toBe("5s");
    expect(formatRemaining(0)).toBe("0s");
  });

  it("spells out hours and minutes", () => {
    expect(formatRemaining(3_723_000)).toBe("1h 2m 3s");
    expect(formatRemaining(120_000)).toBe("2m");
  });
});
