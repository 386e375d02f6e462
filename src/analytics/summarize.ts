import type {
  CategoricalVariable,
  ContinuousVariable,
  GroupStatistics,
  SubjectRecord,
  SummaryRow,
} from "../shared/types.js";
import {
  countByGroup,
  groupOf,
  isMissing,
  maximum,
  mean,
  median,
  minimum,
  observedGroups,
  sampleStdDev,
  toNumber,
} from "./stats.js";

/** Category used for records whose value is missing. */
export const MISSING_CATEGORY = "Missing";

/** Fixed labels of the four rows a continuous variable produces. */
export const CONTINUOUS_LABELS = {
  n: "n",
  meanSd: "Mean (SD)",
  median: "Median",
  range: "Min - Max",
} as const;

export interface SummarizeOptions {
  /** Groups to report, in order. Groups seen in the data but not listed are appended. */
  groups?: string[];
}

// ── Categorical ─────────────────────────────────────────────────────

/**
 * Count and percentage per (category, group).
 *
 * Categories follow the variable's declared levels, then first appearance in
 * the input; missing values form a trailing "Missing" category so that the
 * counts under one variable always add up to the group's N.
 */
export function summarizeCategorical(
  records: SubjectRecord[],
  groupVar: string,
  variable: CategoricalVariable,
  options: SummarizeOptions = {},
): SummaryRow[] {
  const groups = observedGroups(records, groupVar, options.groups);
  const totals = countByGroup(records, groupVar);

  const categories = [...(variable.levels ?? [])];
  const known = new Set(categories);
  const counts = new Map<string, Map<string, number>>();
  let sawMissing = false;

  for (const r of records) {
    const g = groupOf(r, groupVar);
    if (g === null) continue;

    const raw = r.values[variable.name];
    let category: string;
    if (isMissing(raw)) {
      category = MISSING_CATEGORY;
      sawMissing = true;
    } else {
      category = String(raw);
      if (!known.has(category)) {
        known.add(category);
        categories.push(category);
      }
    }

    const perGroup = counts.get(category) ?? new Map<string, number>();
    perGroup.set(g, (perGroup.get(g) ?? 0) + 1);
    counts.set(category, perGroup);
  }

  if (sawMissing && !known.has(MISSING_CATEGORY)) categories.push(MISSING_CATEGORY);

  return categories.map((category) => {
    const values: Record<string, GroupStatistics> = {};
    for (const g of groups) {
      const n = counts.get(category)?.get(g) ?? 0;
      const total = totals.get(g) ?? 0;
      values[g] = { n, pct: total > 0 ? n / total : null };
    }
    return {
      variable: variable.name,
      kind: "categorical",
      category: variable.name,
      label: category,
      values,
    };
  });
}

// ── Continuous ──────────────────────────────────────────────────────

/**
 * n, mean, sample SD, median and range per group, ignoring missing values.
 * Always returns the four rows in {@link CONTINUOUS_LABELS} order.
 */
export function summarizeContinuous(
  records: SubjectRecord[],
  groupVar: string,
  variable: ContinuousVariable,
  options: SummarizeOptions = {},
): SummaryRow[] {
  const groups = observedGroups(records, groupVar, options.groups);
  const observations = new Map<string, number[]>();
  for (const g of groups) observations.set(g, []);

  for (const r of records) {
    const g = groupOf(r, groupVar);
    if (g === null) continue;
    const v = toNumber(r.values[variable.name]);
    if (v === null) continue;
    observations.get(g)?.push(v);
  }

  const nRow: Record<string, GroupStatistics> = {};
  const meanRow: Record<string, GroupStatistics> = {};
  const medianRow: Record<string, GroupStatistics> = {};
  const rangeRow: Record<string, GroupStatistics> = {};

  for (const g of groups) {
    const xs = observations.get(g) ?? [];
    nRow[g] = { n: xs.length };
    meanRow[g] = { mean: mean(xs), sd: sampleStdDev(xs) };
    medianRow[g] = { median: median(xs) };
    rangeRow[g] = { min: minimum(xs), max: maximum(xs) };
  }

  const row = (label: string, values: Record<string, GroupStatistics>): SummaryRow => ({
    variable: variable.name,
    kind: "continuous",
    category: variable.name,
    label,
    values,
  });

  return [
    row(CONTINUOUS_LABELS.n, nRow),
    row(CONTINUOUS_LABELS.meanSd, meanRow),
    row(CONTINUOUS_LABELS.median, medianRow),
    row(CONTINUOUS_LABELS.range, rangeRow),
  ];
}
