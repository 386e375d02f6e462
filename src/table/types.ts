/**
 * Table Model Types
 *
 * The abstract table structure that transformations edit and the renderer
 * reads, plus the Grid contract handed to downstream writers.
 */

import type { StatKey, StatValue, SummaryKind } from "../shared/types.js";

// ── Formatting ──────────────────────────────────────────────────────

export type FormatRule =
  | { type: "integer"; grouping?: boolean }
  | { type: "fixed"; decimals: number }
  /** Fraction rendered as value × 100 with a trailing "%". */
  | { type: "percent"; decimals: number };

export type Alignment = "left" | "center" | "right";

export type FootnoteMarkStyle = "numeric" | "alphabetic";

// ── Structure ───────────────────────────────────────────────────────

export interface TableColumn {
  id: string;
  label: string;
  /** Statistic and group a bound column carries; absent on merge outputs. */
  statistic?: StatKey;
  group?: string;
  /** True for columns produced by mergeColumns. */
  merged: boolean;
  /** Merge sources are hidden from the grid but stay addressable. */
  hidden: boolean;
  width: string | null;
  align: Alignment;
}

export interface TableRow {
  id: string;
  label: string;
  variable: string;
  kind: SummaryKind;
  category: string;
  indent: number;
  rowGroup: string | null;
}

export interface Spanner {
  label: string;
  /** 1 sits directly above the column labels; higher levels stack upwards. */
  level: number;
  columnIds: string[];
}

export interface MergeRule {
  into: string;
  sourceIds: string[];
  pattern: string;
  /** null targets every row. */
  rowIds: string[] | null;
}

export interface FormatDirective {
  columnIds: string[];
  rowIds: string[] | null;
  rule: FormatRule;
}

export type FootnoteLocation =
  | { type: "title" }
  | { type: "columns"; columnIds: string[] }
  | { type: "stub"; rowId: string }
  | { type: "cell"; rowId: string; columnId: string };

export interface Footnote {
  location: FootnoteLocation;
  text: string;
}

/** Plain-data state of a TableModel; everything in it is JSON-serializable. */
export interface TableState {
  tableId: string;
  title: string | null;
  subtitle: string | null;
  stubLabel: string;
  columns: TableColumn[];
  rows: TableRow[];
  /** Row-group labels in declaration order. */
  rowGroups: string[];
  spanners: Spanner[];
  mergeRules: MergeRule[];
  formats: FormatDirective[];
  footnotes: Footnote[];
  missingText: string;
  markStyle: FootnoteMarkStyle;
  /** Underlying values keyed by row id, then column id. */
  cells: Record<string, Record<string, StatValue>>;
}

// ── Grid ────────────────────────────────────────────────────────────

export interface GridHeaderCell {
  label: string;
  span: number;
  columnIds: string[];
}

export interface GridHeaderRow {
  /** Spanner level, or 0 for the column-label row. */
  level: number;
  cells: GridHeaderCell[];
}

export interface GridColumn {
  id: string;
  label: string;
  width: string | null;
  align: Alignment;
}

export type GridBodyRow =
  | { type: "group"; label: string }
  | { type: "data"; rowId: string; stub: string; indent: number; cells: string[] };

export interface GridMark {
  section: "title" | "header" | "stub" | "body";
  /** Index into headerRows (header) or body (stub, body); 0 for the title. */
  row: number;
  /** Index into columns for header/body marks; 0 otherwise. */
  column: number;
  mark: string;
}

export interface Grid {
  tableId: string;
  title: string | null;
  subtitle: string | null;
  stubLabel: string;
  /** Spanner rows from the highest level down, then the column-label row. */
  headerRows: GridHeaderRow[];
  columns: GridColumn[];
  body: GridBodyRow[];
  footnotes: Array<{ mark: string; text: string }>;
  marks: GridMark[];
}
