import type { SubjectRecord, Value } from "../shared/types.js";

/**
 * Calculate arithmetic mean of an array of numbers.
 * Returns null for an empty array.
 */
export function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  const sum = values.reduce((a, b) => a + b, 0);
  return sum / values.length;
}

/**
 * Calculate sample standard deviation (n − 1 denominator).
 * Undefined for fewer than two observations.
 */
export function sampleStdDev(values: number[]): number | null {
  if (values.length < 2) return null;
  const avg = values.reduce((a, b) => a + b, 0) / values.length;
  const squaredDiffs = values.map((v) => (v - avg) ** 2);
  return Math.sqrt(squaredDiffs.reduce((a, b) => a + b, 0) / (values.length - 1));
}

export function median(values: number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function minimum(values: number[]): number | null {
  return values.length === 0 ? null : Math.min(...values);
}

export function maximum(values: number[]): number | null {
  return values.length === 0 ? null : Math.max(...values);
}

/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/** Empty strings, NaN, null and undefined count as missing. */
export function isMissing(value: Value | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value.trim() === "";
  if (typeof value === "number") return Number.isNaN(value);
  return false;
}

/** Coerce a record value to a number, or null when it is missing or not numeric. */
export function toNumber(value: Value | undefined): number | null {
  if (isMissing(value)) return null;
  if (typeof value === "number") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** The record's group value as a string, or null when the grouping value is missing. */
export function groupOf(record: SubjectRecord, groupVar: string): string | null {
  const value = record.values[groupVar];
  return isMissing(value) ? null : String(value);
}

/**
 * Group values in first-appearance order, optionally led by a declared order.
 * Declared groups are kept even when no record carries them.
 */
export function observedGroups(
  records: SubjectRecord[],
  groupVar: string,
  declared?: string[],
): string[] {
  const groups = [...(declared ?? [])];
  const seen = new Set(groups);
  for (const r of records) {
    const g = groupOf(r, groupVar);
    if (g !== null && !seen.has(g)) {
      seen.add(g);
      groups.push(g);
    }
  }
  return groups;
}

/** Total record count per group (the group's N). Records without a group are not counted. */
export function countByGroup(records: SubjectRecord[], groupVar: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const r of records) {
    const g = groupOf(r, groupVar);
    if (g === null) continue;
    counts.set(g, (counts.get(g) ?? 0) + 1);
  }
  return counts;
}
