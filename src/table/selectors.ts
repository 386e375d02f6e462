/**
 * Column selectors and row filters.
 *
 * A selector is resolved to an explicit id list once, when the
 * transformation that received it runs; rules never hold a selector.
 */

import { UnknownReferenceError } from "../shared/errors.js";
import type { StatKey, SummaryKind } from "../shared/types.js";
import type { TableColumn, TableRow } from "./types.js";

export type ColumnSelector =
  | { by: "ids"; ids: string[] }
  | { by: "prefix"; prefix: string }
  | { by: "statistic"; statistics: StatKey[] }
  | { by: "group"; groups: string[] }
  | { by: "where"; test: (column: TableColumn) => boolean }
  | { by: "all" };

export type RowFilter =
  | { by: "ids"; ids: string[] }
  | { by: "labels"; labels: string[] }
  | { by: "kind"; kinds: SummaryKind[] }
  | { by: "category"; categories: string[] }
  | { by: "where"; test: (row: TableRow) => boolean }
  | { by: "all" };

/** A bare id list is shorthand for `{ by: "ids" }`. */
export type ColumnRef = ColumnSelector | string[];
export type RowRef = RowFilter | string[];

export const cols = {
  ids: (...ids: string[]): ColumnSelector => ({ by: "ids", ids }),
  prefix: (prefix: string): ColumnSelector => ({ by: "prefix", prefix }),
  statistic: (...statistics: StatKey[]): ColumnSelector => ({ by: "statistic", statistics }),
  group: (...groups: string[]): ColumnSelector => ({ by: "group", groups }),
  where: (test: (column: TableColumn) => boolean): ColumnSelector => ({ by: "where", test }),
  all: (): ColumnSelector => ({ by: "all" }),
};

export const rows = {
  ids: (...ids: string[]): RowFilter => ({ by: "ids", ids }),
  labels: (...labels: string[]): RowFilter => ({ by: "labels", labels }),
  kind: (...kinds: SummaryKind[]): RowFilter => ({ by: "kind", kinds }),
  category: (...categories: string[]): RowFilter => ({ by: "category", categories }),
  where: (test: (row: TableRow) => boolean): RowFilter => ({ by: "where", test }),
  all: (): RowFilter => ({ by: "all" }),
};

function checkIds(target: "row" | "column", ids: string[], known: Set<string>): string[] {
  const unknown = ids.filter((id) => !known.has(id));
  if (unknown.length > 0) throw new UnknownReferenceError(target, unknown);
  return [...new Set(ids)];
}

/**
 * Resolve a column reference to ids in table column order.
 * Explicit ids must all exist; pattern selectors may match nothing.
 */
export function resolveColumns(ref: ColumnRef, columns: TableColumn[]): string[] {
  const selector: ColumnSelector = Array.isArray(ref) ? { by: "ids", ids: ref } : ref;

  switch (selector.by) {
    case "ids":
      return checkIds("column", selector.ids, new Set(columns.map((c) => c.id)));
    case "prefix":
      return columns.filter((c) => c.id.startsWith(selector.prefix)).map((c) => c.id);
    case "statistic":
      return columns
        .filter((c) => c.statistic !== undefined && selector.statistics.includes(c.statistic))
        .map((c) => c.id);
    case "group":
      return columns
        .filter((c) => c.group !== undefined && selector.groups.includes(c.group))
        .map((c) => c.id);
    case "where":
      return columns.filter((c) => selector.test(c)).map((c) => c.id);
    case "all":
      return columns.map((c) => c.id);
  }
}

/**
 * Resolve a row reference to ids, or null when it targets every row.
 */
export function resolveRows(ref: RowRef | undefined, tableRows: TableRow[]): string[] | null {
  if (ref === undefined) return null;
  const filter: RowFilter = Array.isArray(ref) ? { by: "ids", ids: ref } : ref;

  switch (filter.by) {
    case "ids":
      return checkIds("row", filter.ids, new Set(tableRows.map((r) => r.id)));
    case "labels":
      return tableRows.filter((r) => filter.labels.includes(r.label)).map((r) => r.id);
    case "kind":
      return tableRows.filter((r) => filter.kinds.includes(r.kind)).map((r) => r.id);
    case "category":
      return tableRows.filter((r) => filter.categories.includes(r.category)).map((r) => r.id);
    case "where":
      return tableRows.filter((r) => filter.test(r)).map((r) => r.id);
    case "all":
      return null;
  }
}
