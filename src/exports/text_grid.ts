/**
 * Plain-text Grid Writer
 *
 * Lays a rendered Grid out as fixed-width text: title block, spanner rows
 * with an underline, the column label row, body rows (group rows carry their
 * label in the stub only) and footnotes. Marks are appended as `[mark]`.
 */

import type { Alignment, Grid, GridMark } from "../table/types.js";

export interface TextGridOptions {
  /** Spaces between columns. */
  gap?: number;
  /** Spaces per indent level in the stub. */
  indentWidth?: number;
}

type MarkIndex = Map<string, string[]>;

function markKey(section: GridMark["section"], row: number, column: number): string {
  return `${section}:${row}:${column}`;
}

function indexMarks(marks: GridMark[]): MarkIndex {
  const index: MarkIndex = new Map();
  for (const m of marks) {
    const key = markKey(m.section, m.row, m.column);
    const list = index.get(key) ?? [];
    list.push(m.mark);
    index.set(key, list);
  }
  return index;
}

function withMarks(text: string, marks: string[] | undefined): string {
  if (!marks || marks.length === 0) return text;
  return `${text}${marks.map((m) => `[${m}]`).join("")}`;
}

function pad(text: string, width: number, align: Alignment): string {
  const room = Math.max(0, width - text.length);
  if (align === "right") return " ".repeat(room) + text;
  if (align === "center") {
    const left = Math.floor(room / 2);
    return " ".repeat(left) + text + " ".repeat(room - left);
  }
  return text + " ".repeat(room);
}

/** Render a grid as text lines joined with "\n". Trailing spaces are trimmed. */
export function gridToText(grid: Grid, options: TextGridOptions = {}): string {
  const gap = " ".repeat(options.gap ?? 2);
  const indentWidth = options.indentWidth ?? 2;
  const marks = indexMarks(grid.marks);
  const labelRow = grid.headerRows.length - 1;
  const spannerRows = grid.headerRows.slice(0, labelRow);

  // ── Cell text ─────────────────────────────────────────────────────
  const labels = grid.columns.map((c, i) => withMarks(c.label, marks.get(markKey("header", labelRow, i))));
  const bodyText = grid.body.map((row, r): { stub: string; cells: string[] } => {
    if (row.type === "group") return { stub: row.label, cells: [] };
    return {
      stub: " ".repeat(row.indent * indentWidth) + withMarks(row.stub, marks.get(markKey("stub", r, 0))),
      cells: row.cells.map((cell, c) => withMarks(cell, marks.get(markKey("body", r, c)))),
    };
  });

  // ── Widths ────────────────────────────────────────────────────────
  const stubWidth = Math.max(grid.stubLabel.length, ...bodyText.map((b) => b.stub.length));
  const widths = labels.map((label, c) =>
    Math.max(label.length, ...bodyText.map((b) => b.cells[c]?.length ?? 0)),
  );

  const spanWidth = (first: number, span: number): number =>
    widths.slice(first, first + span).reduce((sum, w) => sum + w, 0) + gap.length * (span - 1);

  // Widen the last column of a spanner whose label does not fit.
  for (const headerRow of spannerRows) {
    let at = 0;
    for (const cell of headerRow.cells) {
      const shortfall = cell.label.length - spanWidth(at, cell.span);
      if (shortfall > 0) widths[at + cell.span - 1] += shortfall;
      at += cell.span;
    }
  }

  const line = (stub: string, cells: string[]): string =>
    [pad(stub, stubWidth, "left"), ...cells].join(gap).trimEnd();

  // ── Lines ─────────────────────────────────────────────────────────
  const out: string[] = [];
  if (grid.title !== null) out.push(withMarks(grid.title, marks.get(markKey("title", 0, 0))));
  if (grid.subtitle !== null) out.push(grid.subtitle);

  const header: string[] = [];
  for (const headerRow of spannerRows) {
    const spanned: string[] = [];
    const rules: string[] = [];
    let at = 0;
    for (const cell of headerRow.cells) {
      const w = spanWidth(at, cell.span);
      spanned.push(pad(cell.label, w, "center"));
      rules.push(cell.label === "" ? " ".repeat(w) : "-".repeat(w));
      at += cell.span;
    }
    header.push(line("", spanned), line("", rules));
  }
  header.push(line(grid.stubLabel, labels.map((l, c) => pad(l, widths[c], "center"))));

  const body = bodyText.map((b, r) => {
    const row = grid.body[r];
    if (row.type === "group") return b.stub;
    return line(
      b.stub,
      b.cells.map((cell, c) => pad(cell, widths[c], grid.columns[c].align)),
    );
  });

  const totalWidth = stubWidth + widths.reduce((sum, w) => sum + gap.length + w, 0);
  const rule = "=".repeat(totalWidth);

  out.push(rule, ...header, "-".repeat(totalWidth), ...body, rule);
  for (const f of grid.footnotes) out.push(`[${f.mark}] ${f.text}`);

  return out.join("\n");
}
