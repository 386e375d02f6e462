/**
 * Report Table Registry
 *
 * Every report table builder, in table-ID order. A builder returns null when
 * the study carries nothing for its table (no response definition for T02).
 */

import { buildDemographicsTable, T01_TITLE } from "./builders/t01_demographics.js";
import { buildResponseTable, T02_TITLE } from "./builders/t02_response_odds_ratio.js";
import type { ReportContext, ReportTable } from "./context.js";

// ── Registry types ──────────────────────────────────────────────────

export interface ReportBuilder {
  tableId: string;
  title: string;
  build: (ctx: ReportContext) => ReportTable | null;
}

// ── Builder registry ────────────────────────────────────────────────

export const REPORT_BUILDERS: ReportBuilder[] = [
  { tableId: "T01", title: T01_TITLE, build: buildDemographicsTable },
  { tableId: "T02", title: T02_TITLE, build: buildResponseTable },
];

// ── Convenience function ────────────────────────────────────────────

/** Run every builder against the context, skipping tables that do not apply. */
export function buildAllReportTables(ctx: ReportContext): ReportTable[] {
  return REPORT_BUILDERS.map((b) => b.build(ctx)).filter((t): t is ReportTable => t !== null);
}

/** Look up a builder by table ID. */
export function findReportBuilder(tableId: string): ReportBuilder | undefined {
  return REPORT_BUILDERS.find((b) => b.tableId === tableId.toUpperCase());
}
