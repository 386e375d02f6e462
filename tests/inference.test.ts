import { describe, it, expect } from "vitest";
import { clopperPearson, oddsRatioCI } from "../src/analytics/inference.js";

describe("Clopper-Pearson interval", () => {
  it("3 of 10 at 95%", () => {
    const ci = clopperPearson(3, 10);
    expect(ci.low).toBeCloseTo(6.674, 2);
    expect(ci.high).toBeCloseTo(65.245, 2);
  });

  it("7 of 10 mirrors 3 of 10", () => {
    const ci = clopperPearson(7, 10);
    expect(ci.low).toBeCloseTo(34.755, 2);
    expect(ci.high).toBeCloseTo(93.326, 2);
  });

  it("pins the bound at 0 when there are no successes", () => {
    const ci = clopperPearson(0, 10);
    expect(ci.low).toBe(0);
    // 1 - 0.025^(1/10)
    expect(ci.high).toBeCloseTo(30.85, 1);
  });

  it("pins the bound at 100 when every trial succeeds", () => {
    const ci = clopperPearson(10, 10);
    expect(ci.low).toBeCloseTo(69.15, 1);
    expect(ci.high).toBe(100);
  });

  it("is undefined with no trials", () => {
    expect(clopperPearson(0, 0)).toEqual({ low: null, high: null });
  });

  it("narrows at a lower confidence level", () => {
    const wide = clopperPearson(3, 10, 0.95);
    const narrow = clopperPearson(3, 10, 0.8);
    expect(narrow.low ?? 0).toBeGreaterThan(wide.low ?? 0);
    expect(narrow.high ?? 100).toBeLessThan(wide.high ?? 100);
  });

  it("rejects impossible counts and levels", () => {
    expect(() => clopperPearson(11, 10)).toThrow(RangeError);
    expect(() => clopperPearson(-1, 10)).toThrow(RangeError);
    expect(() => clopperPearson(1.5, 10)).toThrow(RangeError);
    expect(() => clopperPearson(3, 10, 1)).toThrow(RangeError);
  });
});

describe("Odds ratio with Wald interval", () => {
  it("7/10 vs 3/10", () => {
    const result = oddsRatioCI(7, 10, 3, 10);
    expect(result.or).toBeCloseTo(49 / 9, 10);
    expect(result.low).toBeCloseTo(0.804, 2);
    expect(result.high).toBeCloseTo(36.87, 1);
  });

  it("is symmetric on the log scale", () => {
    const result = oddsRatioCI(7, 10, 3, 10);
    const logOr = Math.log(result.or ?? 1);
    expect(Math.log(result.high ?? 1) - logOr).toBeCloseTo(logOr - Math.log(result.low ?? 1), 10);
  });

  it("is undefined when any cell is zero", () => {
    expect(oddsRatioCI(0, 10, 3, 10)).toEqual({ or: null, low: null, high: null });
    expect(oddsRatioCI(10, 10, 3, 10)).toEqual({ or: null, low: null, high: null });
    expect(oddsRatioCI(4, 10, 0, 0)).toEqual({ or: null, low: null, high: null });
  });

  it("rejects responders above the group total", () => {
    expect(() => oddsRatioCI(11, 10, 3, 10)).toThrow(RangeError);
  });
});
