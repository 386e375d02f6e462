/**
 * TableModel — the abstract summary table.
 *
 * Built once from summary rows with {@link TableModel.bind}, then edited by a
 * sequence of transformations applied eagerly in call order. Each call either
 * succeeds completely or throws before touching the state, and each success is
 * appended to the model's transform log. `snapshot()` gives an independent
 * copy for comparing states.
 *
 * A model has a single owner; transformations are not safe to interleave.
 */

import {
  InvalidMergePatternError,
  InvalidTransformationError,
  UnknownReferenceError,
} from "../shared/errors.js";
import { contentHash } from "../shared/hash.js";
import { STAT_KEYS } from "../shared/types.js";
import type { StatKey, StatValue, SummaryRow } from "../shared/types.js";
import { TransformLog } from "../trace/transform_log.js";
import type { TransformEntry, TransformOp } from "../trace/transform_log.js";
import { resolveColumns, resolveRows } from "./selectors.js";
import type { ColumnRef, RowRef } from "./selectors.js";
import type {
  Alignment,
  FootnoteLocation,
  FootnoteMarkStyle,
  FormatRule,
  TableColumn,
  TableRow,
  TableState,
} from "./types.js";

/** Summary-row fields usable as the stub or the row-group source. */
export type RowField = "label" | "category" | "variable";

export interface BindOptions {
  tableId?: string;
  stubLabel?: string;
  missingText?: string;
  markStyle?: FootnoteMarkStyle;
}

export interface MergeOptions {
  /** Output column id. Reusing the id of an earlier merge output adds a rule to it. */
  into?: string;
  /** Rows the rule applies to; all rows when omitted. */
  rows?: RowRef;
  /** Header label of a new output column. Defaults to the first source's label. */
  label?: string;
}

const PLACEHOLDER = /\{(\d+)\}/g;

/** Placeholder indices used by a merge pattern, deduplicated and sorted. */
export function patternPlaceholders(pattern: string): number[] {
  const indices = new Set<number>();
  for (const m of pattern.matchAll(PLACEHOLDER)) indices.add(Number(m[1]));
  return [...indices].sort((a, b) => a - b);
}

function validateRule(rule: FormatRule): void {
  if (rule.type === "integer") return;
  if (!Number.isInteger(rule.decimals) || rule.decimals < 0 || rule.decimals > 20) {
    throw new InvalidTransformationError(
      `Format "${rule.type}" needs 0–20 decimal places, got ${rule.decimals}`,
    );
  }
}

export class TableModel {
  private state: TableState;
  private readonly log: TransformLog;

  private constructor(state: TableState, log: TransformLog) {
    this.state = state;
    this.log = log;
  }

  // ── Construction ──────────────────────────────────────────────────

  /**
   * Initialize rows and columns from a summary dataset.
   *
   * One row per summary row: stub from `stubColumn`, row group from
   * `groupColumn` (none when null). One data column per (group, statistic)
   * pair present in any row, id `<statistic>_<group>`, ordered by group first
   * appearance, then canonical statistic order. Values are copied.
   */
  static bind(
    summaryRows: SummaryRow[],
    stubColumn: RowField,
    groupColumn: RowField | null,
    options: BindOptions = {},
  ): TableModel {
    const groupOrder: string[] = [];
    const present = new Map<string, Set<StatKey>>();
    for (const r of summaryRows) {
      for (const [g, stats] of Object.entries(r.values)) {
        let keys = present.get(g);
        if (!keys) {
          keys = new Set<StatKey>();
          present.set(g, keys);
          groupOrder.push(g);
        }
        for (const k of STAT_KEYS) {
          if (k in stats) keys.add(k);
        }
      }
    }

    const columns: TableColumn[] = [];
    const sources: Array<{ id: string; group: string; statistic: StatKey }> = [];
    for (const g of groupOrder) {
      const keys = present.get(g) ?? new Set<StatKey>();
      for (const statistic of STAT_KEYS) {
        if (!keys.has(statistic)) continue;
        const id = `${statistic}_${g}`;
        columns.push({
          id,
          label: id,
          statistic,
          group: g,
          merged: false,
          hidden: false,
          width: null,
          align: "center",
        });
        sources.push({ id, group: g, statistic });
      }
    }

    const rows: TableRow[] = [];
    const rowGroups: string[] = [];
    const cells: Record<string, Record<string, StatValue>> = {};
    const idUses = new Map<string, number>();

    for (const r of summaryRows) {
      const base = `${r.variable}:${r.label}`;
      const uses = (idUses.get(base) ?? 0) + 1;
      idUses.set(base, uses);
      const id = uses === 1 ? base : `${base}#${uses}`;

      const rowGroup = groupColumn === null ? null : r[groupColumn];
      if (rowGroup !== null && !rowGroups.includes(rowGroup)) rowGroups.push(rowGroup);

      rows.push({
        id,
        label: r[stubColumn],
        variable: r.variable,
        kind: r.kind,
        category: r.category,
        indent: 0,
        rowGroup,
      });

      const rowCells: Record<string, StatValue> = {};
      for (const s of sources) {
        rowCells[s.id] = r.values[s.group]?.[s.statistic] ?? null;
      }
      cells[id] = rowCells;
    }

    const tableId = options.tableId ?? "table";
    const model = new TableModel(
      {
        tableId,
        title: null,
        subtitle: null,
        stubLabel: options.stubLabel ?? "",
        columns,
        rows,
        rowGroups,
        spanners: [],
        mergeRules: [],
        formats: [],
        footnotes: [],
        missingText: options.missingText ?? "",
        markStyle: options.markStyle ?? "numeric",
        cells,
      },
      new TransformLog(tableId),
    );
    model.commit("bind", {
      stubColumn,
      groupColumn,
      rows: rows.length,
      columns: columns.map((c) => c.id),
    });
    return model;
  }

  // ── Accessors ─────────────────────────────────────────────────────

  get tableId(): string {
    return this.state.tableId;
  }

  /** Deep copy of the current state. */
  toState(): TableState {
    return structuredClone(this.state);
  }

  /** Independent model with a copy of this model's state and log. */
  snapshot(): TableModel {
    return new TableModel(structuredClone(this.state), this.log.fork());
  }

  history(): TransformEntry[] {
    return this.log.entries();
  }

  // ── Transformations ───────────────────────────────────────────────

  /**
   * Attach a format rule to the selected cells. When several rules cover the
   * same cell, the one applied last wins.
   */
  applyFormat(columns: ColumnRef, rowFilter: RowRef | undefined, rule: FormatRule): this {
    validateRule(rule);
    const columnIds = resolveColumns(columns, this.state.columns);
    const rowIds = resolveRows(rowFilter, this.state.rows);
    this.state.formats.push({ columnIds, rowIds, rule: structuredClone(rule) });
    return this.commit("applyFormat", { columnIds, rowIds, rule });
  }

  /**
   * Combine 2–4 data columns into one output column through a pattern whose
   * `{1}`…`{k}` placeholders take each source's formatted string.
   *
   * Sources are hidden from the grid but stay addressable, so a column can
   * feed several merges. For each row, the last rule into an output column
   * whose row filter matches decides the cell.
   */
  mergeColumns(sourceIds: string[], pattern: string, options: MergeOptions = {}): this {
    if (sourceIds.length < 2 || sourceIds.length > 4) {
      throw new InvalidMergePatternError(
        `A merge takes 2 to 4 source columns, got ${sourceIds.length}`,
      );
    }
    if (new Set(sourceIds).size !== sourceIds.length) {
      throw new InvalidMergePatternError(`Duplicate merge sources: ${sourceIds.join(", ")}`);
    }

    const byId = new Map(this.state.columns.map((c) => [c.id, c]));
    const unknown = sourceIds.filter((id) => !byId.has(id));
    if (unknown.length > 0) throw new UnknownReferenceError("column", unknown);

    const sources = sourceIds.map((id) => byId.get(id)).filter((c): c is TableColumn => c !== undefined);
    const alreadyMerged = sources.filter((c) => c.merged).map((c) => c.id);
    if (alreadyMerged.length > 0) {
      throw new InvalidTransformationError(
        `Merge outputs cannot be merge sources: ${alreadyMerged.join(", ")}`,
      );
    }

    const placeholders = patternPlaceholders(pattern);
    const expected = sourceIds.map((_, i) => i + 1);
    if (placeholders.length !== expected.length || placeholders.some((p, i) => p !== expected[i])) {
      throw new InvalidMergePatternError(
        `Pattern "${pattern}" must use placeholders {1}..{${sourceIds.length}}, found ${
          placeholders.length > 0 ? placeholders.map((p) => `{${p}}`).join(", ") : "none"
        }`,
      );
    }

    const rowIds = resolveRows(options.rows, this.state.rows);
    const into = options.into ?? this.nextMergeId();
    const target = byId.get(into);

    if (target && !target.merged) {
      throw new InvalidTransformationError(`Merge target "${into}" is a data column`);
    }
    if (!target) {
      const first = sources[0];
      const groups = new Set(sources.map((c) => c.group));
      const group = groups.size === 1 ? first.group : undefined;
      const output: TableColumn = {
        id: into,
        label: options.label ?? first.label,
        merged: true,
        hidden: false,
        width: first.width,
        align: first.align,
      };
      if (group !== undefined) output.group = group;
      const at = this.state.columns.findIndex((c) => c.id === first.id);
      this.state.columns.splice(at, 0, output);
    }

    for (const c of this.state.columns) {
      if (sourceIds.includes(c.id)) c.hidden = true;
    }
    this.state.mergeRules.push({ into, sourceIds: [...sourceIds], pattern, rowIds });
    return this.commit("mergeColumns", { into, sourceIds, pattern, rowIds });
  }

  /** Group columns under a header label. A column joins at most one spanner per level. */
  addSpanner(label: string, columns: ColumnRef, options: { level?: number } = {}): this {
    const level = options.level ?? 1;
    if (!Number.isInteger(level) || level < 1) {
      throw new InvalidTransformationError(`Spanner level must be a positive integer, got ${level}`);
    }
    const columnIds = resolveColumns(columns, this.state.columns);
    if (columnIds.length === 0) {
      throw new InvalidTransformationError(`Spanner "${label}" selects no columns`);
    }
    for (const s of this.state.spanners) {
      if (s.level !== level) continue;
      const overlap = s.columnIds.filter((id) => columnIds.includes(id));
      if (overlap.length > 0) {
        throw new InvalidTransformationError(
          `Column(s) ${overlap.join(", ")} already belong to spanner "${s.label}" at level ${level}`,
        );
      }
    }
    this.state.spanners.push({ label, level, columnIds });
    return this.commit("addSpanner", { label, level, columnIds });
  }

  /** Move rows into a named row group; a row belongs to one group at a time. */
  addRowGroup(label: string, rowRef: RowRef): this {
    const rowIds = resolveRows(rowRef, this.state.rows) ?? this.state.rows.map((r) => r.id);
    for (const r of this.state.rows) {
      if (rowIds.includes(r.id)) r.rowGroup = label;
    }
    if (!this.state.rowGroups.includes(label)) this.state.rowGroups.push(label);
    return this.commit("addRowGroup", { label, rowIds });
  }

  /** Hide columns from the grid. Hidden columns stay addressable by rules and footnotes. */
  hideColumns(columns: ColumnRef): this {
    const columnIds = resolveColumns(columns, this.state.columns);
    for (const c of this.state.columns) {
      if (columnIds.includes(c.id)) c.hidden = true;
    }
    return this.commit("hideColumns", { columnIds });
  }

  setWidth(columns: ColumnRef, width: string): this {
    const columnIds = resolveColumns(columns, this.state.columns);
    for (const c of this.state.columns) {
      if (columnIds.includes(c.id)) c.width = width;
    }
    return this.commit("setWidth", { columnIds, width });
  }

  setAlignment(columns: ColumnRef, align: Alignment): this {
    const columnIds = resolveColumns(columns, this.state.columns);
    for (const c of this.state.columns) {
      if (columnIds.includes(c.id)) c.align = align;
    }
    return this.commit("setAlignment", { columnIds, align });
  }

  relabelColumns(labels: Record<string, string>): this {
    resolveColumns(Object.keys(labels), this.state.columns);
    for (const c of this.state.columns) {
      const label = labels[c.id];
      if (label !== undefined) c.label = label;
    }
    return this.commit("relabelColumns", { labels });
  }

  indentRows(rowRef: RowRef, level: number): this {
    if (!Number.isInteger(level) || level < 0) {
      throw new InvalidTransformationError(`Indent level must be a non-negative integer, got ${level}`);
    }
    const rowIds = resolveRows(rowRef, this.state.rows) ?? this.state.rows.map((r) => r.id);
    for (const r of this.state.rows) {
      if (rowIds.includes(r.id)) r.indent = level;
    }
    return this.commit("indentRows", { rowIds, level });
  }

  /** Append a footnote. Its mark is assigned at render time, in declaration order. */
  addFootnote(location: FootnoteLocation, text: string): this {
    const columnIds = new Set(this.state.columns.map((c) => c.id));
    const rowIds = new Set(this.state.rows.map((r) => r.id));
    const missingColumns: string[] = [];
    const missingRows: string[] = [];

    switch (location.type) {
      case "title":
        break;
      case "columns":
        if (location.columnIds.length === 0) {
          throw new InvalidTransformationError("Column footnote needs at least one column");
        }
        missingColumns.push(...location.columnIds.filter((id) => !columnIds.has(id)));
        break;
      case "stub":
        if (!rowIds.has(location.rowId)) missingRows.push(location.rowId);
        break;
      case "cell":
        if (!rowIds.has(location.rowId)) missingRows.push(location.rowId);
        if (!columnIds.has(location.columnId)) missingColumns.push(location.columnId);
        break;
    }
    if (missingRows.length > 0) throw new UnknownReferenceError("row", missingRows);
    if (missingColumns.length > 0) throw new UnknownReferenceError("column", missingColumns);

    this.state.footnotes.push({ location: structuredClone(location), text });
    return this.commit("addFootnote", { location, text });
  }

  /** Text substituted for every missing or undefined value. */
  setMissingText(text: string): this {
    this.state.missingText = text;
    return this.commit("setMissingText", { text });
  }

  setFootnoteMarks(style: FootnoteMarkStyle): this {
    this.state.markStyle = style;
    return this.commit("setFootnoteMarks", { style });
  }

  setTitle(title: string, subtitle: string | null = null): this {
    this.state.title = title;
    this.state.subtitle = subtitle;
    return this.commit("setTitle", { title, subtitle });
  }

  setStubLabel(label: string): this {
    this.state.stubLabel = label;
    return this.commit("setStubLabel", { label });
  }

  // ── Internals ─────────────────────────────────────────────────────

  private nextMergeId(): string {
    const taken = new Set(this.state.columns.map((c) => c.id));
    let n = this.state.columns.filter((c) => c.merged).length + 1;
    while (taken.has(`merge_${n}`)) n++;
    return `merge_${n}`;
  }

  /** Log entries keep their own copy of the parameters. */
  private commit(op: TransformOp, params: Record<string, unknown>): this {
    this.log.record(op, structuredClone(params), contentHash(this.state));
    return this;
  }
}
