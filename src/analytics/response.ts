/**
 * Response summaries: event rates per group and subgroup with exact
 * intervals, and the treatment-vs-reference odds ratio.
 */

import type {
  GroupResponse,
  GroupStatistics,
  ResponseSummary,
  SubjectRecord,
  SummaryRow,
  Value,
} from "../shared/types.js";
import { InvalidTransformationError } from "../shared/errors.js";
import { clopperPearson, oddsRatioCI } from "./inference.js";
import { groupOf, isMissing, observedGroups } from "./stats.js";

export interface ResponseOptions {
  /** Group whose odds form the numerator of the odds ratio. */
  treatment: string;
  /** Reference group (denominator odds). */
  reference: string;
  /** Stratifying variable; omitted means a single overall row. */
  subgroupVar?: string;
  /** Value of the response variable that counts as an event. Defaults to "Y". */
  eventValue?: Value;
  confidence?: number;
  /** Group order. Defaults to reference, treatment, then any other group seen. */
  groups?: string[];
  /** Subgroup label used when no subgroup variable is given. */
  overallLabel?: string;
}

export const OVERALL_SUBGROUP = "Overall";

function isEvent(value: Value | undefined, eventValue: Value): boolean {
  if (isMissing(value) || value === undefined) return false;
  return String(value) === String(eventValue);
}

function summarizeGroup(
  records: SubjectRecord[],
  responseVar: string,
  eventValue: Value,
  confidence: number,
): GroupResponse {
  const total = records.length;
  const events = records.filter((r) => isEvent(r.values[responseVar], eventValue)).length;
  const ci = clopperPearson(events, total, confidence);
  return {
    events,
    total,
    pct: total > 0 ? (events / total) * 100 : null,
    ciLow: ci.low,
    ciHigh: ci.high,
  };
}

/**
 * One ResponseSummary per subgroup value, in first-appearance order.
 * Records without a group (or without a subgroup value, when stratifying)
 * are left out.
 */
export function summarizeResponse(
  records: SubjectRecord[],
  groupVar: string,
  responseVar: string,
  options: ResponseOptions,
): ResponseSummary[] {
  const eventValue = options.eventValue ?? "Y";
  const confidence = options.confidence ?? 0.95;
  const declared = [...(options.groups ?? [])];
  for (const g of [options.reference, options.treatment]) {
    if (!declared.includes(g)) declared.push(g);
  }
  const groups = observedGroups(records, groupVar, declared);

  const strata = new Map<string, SubjectRecord[]>();
  const subgroupVar = options.subgroupVar;
  if (subgroupVar === undefined) {
    strata.set(options.overallLabel ?? OVERALL_SUBGROUP, records);
  } else {
    for (const r of records) {
      const raw = r.values[subgroupVar];
      if (isMissing(raw)) continue;
      const key = String(raw);
      const bucket = strata.get(key) ?? [];
      bucket.push(r);
      strata.set(key, bucket);
    }
  }

  return [...strata.entries()].map(([subgroup, members]) => {
    const byGroup: Record<string, GroupResponse> = {};
    for (const g of groups) {
      const inGroup = members.filter((r) => groupOf(r, groupVar) === g);
      byGroup[g] = summarizeGroup(inGroup, responseVar, eventValue, confidence);
    }

    const t = byGroup[options.treatment];
    const ref = byGroup[options.reference];
    const oddsRatio = oddsRatioCI(t.events, t.total, ref.events, ref.total, confidence);

    return { subgroup, groups: byGroup, oddsRatio };
  });
}

export interface ResponseRowOptions {
  /** Name recorded as the rows' variable. */
  variable: string;
  /** Row-group label. */
  category: string;
  /** Group key under which the odds ratio statistics are stored. Must not name a group. */
  comparisonKey?: string;
}

/**
 * Project response summaries into summary rows: per group `n` (events),
 * `total`, `pct`, `ciLow`, `ciHigh`; under the comparison key `or`,
 * `orLow`, `orHigh`.
 */
export function responseToSummaryRows(
  summaries: ResponseSummary[],
  options: ResponseRowOptions,
): SummaryRow[] {
  const comparisonKey = options.comparisonKey ?? "comparison";
  if (summaries.some((s) => comparisonKey in s.groups)) {
    throw new InvalidTransformationError(
      `Comparison key "${comparisonKey}" is also a group name; choose another key`,
    );
  }

  return summaries.map((s) => {
    const values: Record<string, GroupStatistics> = {};
    for (const [g, r] of Object.entries(s.groups)) {
      values[g] = { n: r.events, total: r.total, pct: r.pct, ciLow: r.ciLow, ciHigh: r.ciHigh };
    }
    values[comparisonKey] = {
      or: s.oddsRatio.or,
      orLow: s.oddsRatio.low,
      orHigh: s.oddsRatio.high,
    };
    return {
      variable: options.variable,
      kind: "response",
      category: options.category,
      label: s.subgroup,
      values,
    };
  });
}
