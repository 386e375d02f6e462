/** A single cell value carried by a subject record. */
export type Value = string | number | boolean | null;

/** Variable types the aggregator knows how to summarize. */
export type VariableType = "categorical" | "continuous";

/** Kind of summary a row was produced by. */
export type SummaryKind = VariableType | "response";

/** One trial subject. The grouping factor (e.g. treatment arm) is one of its values. */
export interface SubjectRecord {
  subjectId: string;
  values: Record<string, Value>;
}

/**
 * Variable metadata as it arrives from a study definition.
 * `type` is optional here; the aggregator refuses variables without one.
 */
export interface VariableMetadata {
  name: string;
  label: string;
  unit?: string;
  type?: string;
  /** Display order of categories for categorical variables. */
  levels?: string[];
  /** Decimal places of the raw data for continuous variables. */
  precision?: number;
}

export interface CategoricalVariable {
  type: "categorical";
  name: string;
  label: string;
  levels?: string[];
}

export interface ContinuousVariable {
  type: "continuous";
  name: string;
  label: string;
  unit?: string;
  precision?: number;
}

/** Tagged variant dispatched on at the aggregator boundary. */
export type VariableDescriptor = CategoricalVariable | ContinuousVariable;

/** Statistic keys a summary row can carry per group. */
export type StatKey =
  | "n"
  | "total"
  | "pct"
  | "mean"
  | "sd"
  | "median"
  | "min"
  | "max"
  | "ciLow"
  | "ciHigh"
  | "or"
  | "orLow"
  | "orHigh";

/** Canonical statistic order, used when columns are derived from rows. */
export const STAT_KEYS: readonly StatKey[] = [
  "n",
  "total",
  "pct",
  "mean",
  "sd",
  "median",
  "min",
  "max",
  "ciLow",
  "ciHigh",
  "or",
  "orLow",
  "orHigh",
];

/**
 * `null` marks an undefined statistic (zero denominator, no observations).
 * It is data, never an error, and renders as the table's missing text.
 */
export type StatValue = number | null;

export type GroupStatistics = Partial<Record<StatKey, StatValue>>;

export interface SummaryRow {
  variable: string;
  kind: SummaryKind;
  /** Row-group tag: the variable's label (with unit for continuous variables). */
  category: string;
  /** Display label: the category value or statistic name. */
  label: string;
  /** Statistics keyed by group value. Only the statistics relevant to the row are present. */
  values: Record<string, GroupStatistics>;
}

/** Event counts and exact interval for one group within one subgroup. */
export interface GroupResponse {
  events: number;
  total: number;
  /** Percent scale (0–100). */
  pct: StatValue;
  ciLow: StatValue;
  ciHigh: StatValue;
}

export interface OddsRatioResult {
  or: StatValue;
  low: StatValue;
  high: StatValue;
}

export interface ResponseSummary {
  subgroup: string;
  groups: Record<string, GroupResponse>;
  /** Treatment vs reference odds ratio with its Wald interval. */
  oddsRatio: OddsRatioResult;
}

export interface ConfidenceInterval {
  low: StatValue;
  high: StatValue;
}
