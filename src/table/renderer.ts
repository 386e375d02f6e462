/**
 * Renderer — TableModel → Grid.
 *
 * Per visible cell: look up the underlying value, apply the last matching
 * format rule, substitute the missing text for undefined values, then fill
 * the merge pattern that owns the cell. Header rows come from spanners,
 * group header rows from row groups, and footnote marks are numbered in
 * declaration order. Rendering reads a copy of the model state, so repeated
 * renders of one model produce identical grids.
 */

import { contentHash } from "../shared/hash.js";
import { fillPattern, footnoteMark, formatValue } from "./format.js";
import type { TableModel } from "./model.js";
import type {
  FormatRule,
  Grid,
  GridBodyRow,
  GridHeaderCell,
  GridHeaderRow,
  GridMark,
  MergeRule,
  TableColumn,
  TableRow,
  TableState,
} from "./types.js";

function appliesTo(rowIds: string[] | null, rowId: string): boolean {
  return rowIds === null || rowIds.includes(rowId);
}

// ── Cell values ─────────────────────────────────────────────────────

class CellResolver {
  private readonly rulesByOutput = new Map<string, MergeRule[]>();

  constructor(private readonly state: TableState) {
    for (const rule of state.mergeRules) {
      const list = this.rulesByOutput.get(rule.into) ?? [];
      list.push(rule);
      this.rulesByOutput.set(rule.into, list);
    }
  }

  private formatFor(columnId: string, rowId: string): FormatRule | undefined {
    for (let i = this.state.formats.length - 1; i >= 0; i--) {
      const f = this.state.formats[i];
      if (f.columnIds.includes(columnId) && appliesTo(f.rowIds, rowId)) return f.rule;
    }
    return undefined;
  }

  private rawValue(columnId: string, rowId: string): number | null {
    return this.state.cells[rowId]?.[columnId] ?? null;
  }

  /** Formatted value of a data column, with the missing text for undefined values. */
  formatted(columnId: string, rowId: string): string {
    const value = this.rawValue(columnId, rowId);
    if (value === null) return this.state.missingText;
    return formatValue(value, this.formatFor(columnId, rowId));
  }

  cell(column: TableColumn, rowId: string): string {
    if (!column.merged) return this.formatted(column.id, rowId);

    const rules = this.rulesByOutput.get(column.id) ?? [];
    for (let i = rules.length - 1; i >= 0; i--) {
      const rule = rules[i];
      if (!appliesTo(rule.rowIds, rowId)) continue;
      return fillPattern(
        rule.pattern,
        rule.sourceIds.map((id) => this.formatted(id, rowId)),
      );
    }

    // No rule selects this row: show the first defined value of the output's group.
    if (column.group !== undefined) {
      for (const c of this.state.columns) {
        if (c.merged || c.group !== column.group) continue;
        if (this.rawValue(c.id, rowId) !== null) return this.formatted(c.id, rowId);
      }
    }
    return this.state.missingText;
  }

  /** Merge outputs that read from a column, in declaration order. */
  consumersOf(columnId: string): string[] {
    const outputs: string[] = [];
    for (const rule of this.state.mergeRules) {
      if (rule.sourceIds.includes(columnId) && !outputs.includes(rule.into)) outputs.push(rule.into);
    }
    return outputs;
  }
}

// ── Layout ──────────────────────────────────────────────────────────

type BodyEntry = { type: "group"; label: string } | { type: "data"; row: TableRow };

/** Ungrouped rows first, then each row group in declaration order. */
function orderBody(state: TableState): BodyEntry[] {
  const out: BodyEntry[] = [];
  for (const row of state.rows) {
    if (row.rowGroup === null) out.push({ type: "data", row });
  }
  for (const label of state.rowGroups) {
    const members = state.rows.filter((r) => r.rowGroup === label);
    if (members.length === 0) continue;
    out.push({ type: "group", label });
    for (const row of members) out.push({ type: "data", row });
  }
  return out;
}

function buildHeaderRows(state: TableState, visible: TableColumn[]): GridHeaderRow[] {
  const levels = [...new Set(state.spanners.map((s) => s.level))].sort((a, b) => b - a);
  const headerRows: GridHeaderRow[] = [];

  for (const level of levels) {
    const atLevel = state.spanners.filter((s) => s.level === level);

    // A merge output inherits the spanner of its sources when it has none of its own.
    const spannerIndex = (column: TableColumn): number => {
      const direct = atLevel.findIndex((s) => s.columnIds.includes(column.id));
      if (direct >= 0 || !column.merged) return direct;
      const sourceIds = state.mergeRules
        .filter((r) => r.into === column.id)
        .flatMap((r) => r.sourceIds);
      return atLevel.findIndex((s) => s.columnIds.some((id) => sourceIds.includes(id)));
    };

    const cells: GridHeaderCell[] = [];
    let previous = -1;
    for (const column of visible) {
      const idx = spannerIndex(column);
      const last = cells[cells.length - 1];
      if (idx >= 0 && idx === previous && last) {
        last.span += 1;
        last.columnIds.push(column.id);
      } else {
        cells.push({ label: idx >= 0 ? atLevel[idx].label : "", span: 1, columnIds: [column.id] });
      }
      previous = idx;
    }
    headerRows.push({ level, cells });
  }

  headerRows.push({
    level: 0,
    cells: visible.map((c) => ({ label: c.label, span: 1, columnIds: [c.id] })),
  });

  return headerRows;
}

// ── Public API ──────────────────────────────────────────────────────

export function render(model: TableModel): Grid {
  const state = model.toState();
  const resolver = new CellResolver(state);
  const visible = state.columns.filter((c) => !c.hidden);
  const visibleIndex = new Map(visible.map((c, i) => [c.id, i]));

  const ordered = orderBody(state);
  const body = ordered.map((entry): GridBodyRow =>
    entry.type === "group"
      ? { type: "group", label: entry.label }
      : {
          type: "data",
          rowId: entry.row.id,
          stub: entry.row.label,
          indent: entry.row.indent,
          cells: visible.map((c) => resolver.cell(c, entry.row.id)),
        },
  );
  const bodyIndex = new Map<string, number>();
  ordered.forEach((entry, i) => {
    if (entry.type === "data") bodyIndex.set(entry.row.id, i);
  });

  const headerRows = buildHeaderRows(state, visible);
  const labelRow = headerRows.length - 1;

  // Hidden merge sources carry their marks over to the first output that reads them.
  const locateColumn = (id: string): number | undefined => {
    const direct = visibleIndex.get(id);
    if (direct !== undefined) return direct;
    for (const output of resolver.consumersOf(id)) {
      const idx = visibleIndex.get(output);
      if (idx !== undefined) return idx;
    }
    return undefined;
  };

  const marks: GridMark[] = [];
  const footnotes = state.footnotes.map((f, i) => {
    const mark = footnoteMark(i, state.markStyle);
    const loc = f.location;
    const placed = new Set<string>();
    const place = (m: GridMark): void => {
      const key = `${m.section}:${m.row}:${m.column}`;
      if (placed.has(key)) return;
      placed.add(key);
      marks.push(m);
    };

    switch (loc.type) {
      case "title":
        place({ section: "title", row: 0, column: 0, mark });
        break;
      case "columns":
        for (const id of loc.columnIds) {
          const column = locateColumn(id);
          if (column !== undefined) place({ section: "header", row: labelRow, column, mark });
        }
        break;
      case "stub": {
        const row = bodyIndex.get(loc.rowId);
        if (row !== undefined) place({ section: "stub", row, column: 0, mark });
        break;
      }
      case "cell": {
        const row = bodyIndex.get(loc.rowId);
        const column = locateColumn(loc.columnId);
        if (row !== undefined && column !== undefined) place({ section: "body", row, column, mark });
        break;
      }
    }
    return { mark, text: f.text };
  });

  return {
    tableId: state.tableId,
    title: state.title,
    subtitle: state.subtitle,
    stubLabel: state.stubLabel,
    headerRows,
    columns: visible.map((c) => ({ id: c.id, label: c.label, width: c.width, align: c.align })),
    body,
    footnotes,
    marks,
  };
}

/** SHA-256 of the grid's canonical JSON; equal grids share a fingerprint. */
export function gridFingerprint(grid: Grid): string {
  return contentHash(grid);
}
