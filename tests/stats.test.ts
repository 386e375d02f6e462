import { describe, it, expect } from "vitest";
import {
  countByGroup,
  groupOf,
  isMissing,
  maximum,
  mean,
  median,
  minimum,
  observedGroups,
  round,
  sampleStdDev,
  toNumber,
} from "../src/analytics/stats.js";
import type { SubjectRecord } from "../src/shared/types.js";

function subject(id: string, values: SubjectRecord["values"]): SubjectRecord {
  return { subjectId: id, values };
}

describe("Descriptive statistics", () => {
  it("mean of empty array is null", () => {
    expect(mean([])).toBeNull();
  });

  it("mean calculates correctly", () => {
    expect(mean([1, 2, 3, 4, 5])).toBe(3);
  });

  it("sample SD uses the n - 1 denominator", () => {
    // deviations ±5 → 50 / 1
    const sd = sampleStdDev([30, 40]);
    expect(sd).not.toBeNull();
    expect(round(sd ?? 0, 4)).toBe(7.0711);
  });

  it("sample SD is undefined below two observations", () => {
    expect(sampleStdDev([5])).toBeNull();
    expect(sampleStdDev([])).toBeNull();
  });

  it("median handles odd and even lengths", () => {
    expect(median([3, 1, 2])).toBe(2);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(median([])).toBeNull();
  });

  it("min and max", () => {
    expect(minimum([4, -1, 9])).toBe(-1);
    expect(maximum([4, -1, 9])).toBe(9);
    expect(minimum([])).toBeNull();
    expect(maximum([])).toBeNull();
  });
});

describe("Value handling", () => {
  it("treats blanks, NaN, null and undefined as missing", () => {
    expect(isMissing(null)).toBe(true);
    expect(isMissing(undefined)).toBe(true);
    expect(isMissing("")).toBe(true);
    expect(isMissing("   ")).toBe(true);
    expect(isMissing(Number.NaN)).toBe(true);
  });

  it("keeps zero, false and text", () => {
    expect(isMissing(0)).toBe(false);
    expect(isMissing(false)).toBe(false);
    expect(isMissing("x")).toBe(false);
  });

  it("toNumber coerces numeric strings and rejects text", () => {
    expect(toNumber("12.5")).toBe(12.5);
    expect(toNumber("abc")).toBeNull();
    expect(toNumber(true)).toBe(1);
    expect(toNumber("")).toBeNull();
  });
});

describe("Grouping", () => {
  const records = [
    subject("1", { ARM: "A" }),
    subject("2", { ARM: "C" }),
    subject("3", { ARM: "B" }),
    subject("4", { ARM: "A" }),
    subject("5", { ARM: "" }),
  ];

  it("groupOf returns null for a missing group", () => {
    expect(groupOf(records[0], "ARM")).toBe("A");
    expect(groupOf(records[4], "ARM")).toBeNull();
  });

  it("declared groups lead, then first appearance", () => {
    expect(observedGroups(records, "ARM", ["B", "Z"])).toEqual(["B", "Z", "A", "C"]);
    expect(observedGroups(records, "ARM")).toEqual(["A", "C", "B"]);
  });

  it("counts records per group, ignoring records without one", () => {
    const counts = countByGroup(records, "ARM");
    expect([...counts.entries()]).toEqual([
      ["A", 2],
      ["C", 1],
      ["B", 1],
    ]);
  });
});
