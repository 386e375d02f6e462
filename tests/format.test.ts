import { describe, it, expect } from "vitest";
import { fillPattern, footnoteMark, formatValue } from "../src/table/format.js";

describe("formatValue", () => {
  it("prints unformatted values as-is", () => {
    expect(formatValue(5.4444, undefined)).toBe("5.4444");
  });

  it("rounds integers, optionally with grouping", () => {
    expect(formatValue(9.6, { type: "integer" })).toBe("10");
    expect(formatValue(1234.5, { type: "integer", grouping: true })).toBe("1,235");
  });

  it("fixes decimals", () => {
    expect(formatValue(5.4444, { type: "fixed", decimals: 2 })).toBe("5.44");
    expect(formatValue(42, { type: "fixed", decimals: 1 })).toBe("42.0");
  });

  it("rounds halves away from zero for negative values", () => {
    expect(formatValue(-2.5, { type: "integer" })).toBe("-3");
    expect(formatValue(-1234.5, { type: "integer", grouping: true })).toBe("-1,235");
    expect(formatValue(-0.25, { type: "fixed", decimals: 1 })).toBe("-0.3");
  });

  it("drops the sign when a negative value rounds to zero", () => {
    expect(formatValue(-0.4, { type: "integer" })).toBe("0");
    expect(formatValue(-0.04, { type: "fixed", decimals: 1 })).toBe("0.0");
    expect(formatValue(-0.0004, { type: "percent", decimals: 1 })).toBe("0.0%");
  });

  it("scales proportions to percent", () => {
    expect(formatValue(0.3, { type: "percent", decimals: 1 })).toBe("30.0%");
    expect(formatValue(1, { type: "percent", decimals: 0 })).toBe("100%");
  });
});

describe("footnoteMark", () => {
  it("numbers from 1", () => {
    expect([0, 1, 9].map((i) => footnoteMark(i, "numeric"))).toEqual(["1", "2", "10"]);
  });

  it("continues letters past z", () => {
    expect([0, 1, 25, 26, 27, 51, 52].map((i) => footnoteMark(i, "alphabetic"))).toEqual([
      "a",
      "b",
      "z",
      "aa",
      "ab",
      "az",
      "ba",
    ]);
  });
});

describe("fillPattern", () => {
  it("substitutes placeholders by position", () => {
    expect(fillPattern("{1} ({2})", ["3", "30.0%"])).toBe("3 (30.0%)");
    expect(fillPattern("{2} of {1}", ["7", "70.0%"])).toBe("70.0% of 7");
  });

  it("keeps placeholders without a value", () => {
    expect(fillPattern("{1}/{3}", ["3", "10"])).toBe("3/{3}");
  });
});
