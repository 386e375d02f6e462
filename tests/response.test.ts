import { describe, it, expect } from "vitest";
import { responseToSummaryRows, summarizeResponse } from "../src/analytics/response.js";
import { InvalidTransformationError } from "../src/shared/errors.js";
import type { SubjectRecord } from "../src/shared/types.js";

/** The first `responders` subjects of each block respond. */
function arm(group: string, sexes: Array<{ sex: string; count: number; responders: number }>): SubjectRecord[] {
  const out: SubjectRecord[] = [];
  for (const block of sexes) {
    for (let i = 0; i < block.count; i++) {
      out.push({
        subjectId: `${group}-${block.sex}-${i}`,
        values: { ARM: group, SEX: block.sex, RESP: i < block.responders ? "Y" : "N" },
      });
    }
  }
  return out;
}

// Placebo: F 2/5, M 1/5. Drug: F 5/5, M 2/5.
const records = [
  ...arm("Placebo", [
    { sex: "F", count: 5, responders: 2 },
    { sex: "M", count: 5, responders: 1 },
  ]),
  ...arm("Drug", [
    { sex: "F", count: 5, responders: 5 },
    { sex: "M", count: 5, responders: 2 },
  ]),
];

describe("summarizeResponse", () => {
  it("summarizes overall when no subgroup variable is given", () => {
    const [overall, ...rest] = summarizeResponse(records, "ARM", "RESP", {
      treatment: "Drug",
      reference: "Placebo",
    });
    expect(rest).toHaveLength(0);
    expect(overall.subgroup).toBe("Overall");
    expect(Object.keys(overall.groups)).toEqual(["Placebo", "Drug"]);
    expect(overall.groups.Placebo.events).toBe(3);
    expect(overall.groups.Placebo.total).toBe(10);
    expect(overall.groups.Placebo.pct).toBeCloseTo(30, 10);
    expect(overall.groups.Drug.events).toBe(7);
    expect(overall.groups.Drug.ciLow).toBeCloseTo(34.755, 2);
    expect(overall.oddsRatio.or).toBeCloseTo(49 / 9, 10);
  });

  it("stratifies by subgroup in first-appearance order", () => {
    const summaries = summarizeResponse(records, "ARM", "RESP", {
      treatment: "Drug",
      reference: "Placebo",
      subgroupVar: "SEX",
    });
    expect(summaries.map((s) => s.subgroup)).toEqual(["F", "M"]);

    const [female, male] = summaries;
    // Drug F has no non-responders: a zero cell.
    expect(female.oddsRatio).toEqual({ or: null, low: null, high: null });
    expect(male.oddsRatio.or).toBeCloseTo((2 / 3) / (1 / 4), 10);
  });

  it("counts only the configured event value", () => {
    const [overall] = summarizeResponse(records, "ARM", "RESP", {
      treatment: "Drug",
      reference: "Placebo",
      eventValue: "N",
    });
    expect(overall.groups.Placebo.events).toBe(7);
    expect(overall.groups.Drug.events).toBe(3);
  });

  it("keeps a declared group with no subjects as undefined", () => {
    const [overall] = summarizeResponse(records, "ARM", "RESP", {
      treatment: "Drug",
      reference: "Placebo",
      groups: ["Placebo", "Drug", "Open"],
    });
    expect(overall.groups.Open).toEqual({ events: 0, total: 0, pct: null, ciLow: null, ciHigh: null });
  });
});

describe("responseToSummaryRows", () => {
  it("projects groups and the comparison into summary rows", () => {
    const summaries = summarizeResponse(records, "ARM", "RESP", {
      treatment: "Drug",
      reference: "Placebo",
      subgroupVar: "SEX",
    });
    const rows = responseToSummaryRows(summaries, { variable: "RESP", category: "Responders" });

    expect(rows.map((r) => r.label)).toEqual(["F", "M"]);
    expect(rows[0].kind).toBe("response");
    expect(rows[0].category).toBe("Responders");
    expect(rows[0].values.Placebo.n).toBe(2);
    expect(rows[0].values.Placebo.total).toBe(5);
    expect(rows[0].values.Placebo.pct).toBeCloseTo(40, 10);
    expect(rows[0].values.comparison).toEqual({ or: null, orLow: null, orHigh: null });
    expect(Object.keys(rows[1].values)).toEqual(["Placebo", "Drug", "comparison"]);
  });

  it("refuses a comparison key that is also a group", () => {
    const summaries = summarizeResponse(records, "ARM", "RESP", { treatment: "Drug", reference: "Placebo" });
    expect(() =>
      responseToSummaryRows(summaries, { variable: "RESP", category: "Responders", comparisonKey: "Placebo" }),
    ).toThrow(InvalidTransformationError);
  });
});
