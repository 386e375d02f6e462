/**
 * T01 — Summary of Demographic and Baseline Characteristics
 *
 * One column per arm. Categorical rows show "n (pct%)", continuous
 * variables show n, Mean (SD), Median and Min - Max under their label.
 */

import { aggregate, categoryLabel, describeVariable } from "../../analytics/aggregator.js";
import { countByGroup, observedGroups } from "../../analytics/stats.js";
import { CONTINUOUS_LABELS } from "../../analytics/summarize.js";
import { TableModel } from "../../table/model.js";
import { cols, rows } from "../../table/selectors.js";
import type { RowFilter } from "../../table/selectors.js";
import { studySubtitle } from "../context.js";
import type { ReportContext, ReportTable } from "../context.js";
import { finalizeReport } from "../finalize.js";

export const T01_TITLE = "Summary of Demographic and Baseline Characteristics";

/** Output column id of an arm. */
export function armColumnId(group: string): string {
  return `arm_${group}`;
}

export function buildDemographicsTable(ctx: ReportContext): ReportTable {
  const groups = observedGroups(ctx.records, ctx.groupVar, ctx.groups);
  const totals = countByGroup(ctx.records, ctx.groupVar);
  const summary = aggregate(ctx.records, ctx.groupVar, ctx.variables, { groups });

  const model = TableModel.bind(summary, "label", "category", {
    tableId: "T01",
    stubLabel: "Characteristic",
    missingText: ctx.config.missingText,
    markStyle: ctx.config.markStyle,
  }).setTitle(T01_TITLE, studySubtitle(ctx));

  // ── Formats ───────────────────────────────────────────────────────
  model
    .applyFormat(cols.statistic("n"), undefined, { type: "integer" })
    .applyFormat(cols.statistic("pct"), undefined, { type: "percent", decimals: 1 });

  for (const variable of ctx.variables.map(describeVariable)) {
    if (variable.type !== "continuous") continue;
    const precision = variable.precision ?? 0;
    const ofVariable = rows.category(categoryLabel(variable));
    model
      .applyFormat(cols.statistic("mean", "sd", "median"), ofVariable, {
        type: "fixed",
        decimals: precision + 1,
      })
      .applyFormat(cols.statistic("min", "max"), ofVariable, { type: "fixed", decimals: precision });
  }

  // ── One display column per arm ────────────────────────────────────
  const present = new Set(model.toState().columns.map((c) => c.id));
  const continuousRow = (label: string) =>
    rows.where((r) => r.kind === "continuous" && r.label === label);

  for (const g of groups) {
    const into = armColumnId(g);
    const label = `${g} (N=${totals.get(g) ?? 0})`;
    const merges: Array<{ sources: string[]; pattern: string; rows: RowFilter }> = [
      { sources: [`n_${g}`, `pct_${g}`], pattern: "{1} ({2})", rows: rows.kind("categorical") },
      { sources: [`mean_${g}`, `sd_${g}`], pattern: "{1} ({2})", rows: continuousRow(CONTINUOUS_LABELS.meanSd) },
      { sources: [`min_${g}`, `max_${g}`], pattern: "{1} - {2}", rows: continuousRow(CONTINUOUS_LABELS.range) },
    ];
    for (const m of merges) {
      if (!m.sources.every((id) => present.has(id))) continue;
      model.mergeColumns(m.sources, m.pattern, { into, rows: m.rows, label });
    }
  }

  // Statistics shown through the arm columns only (n and Median rows fall back to them).
  model.hideColumns(cols.where((c) => !c.merged));

  const armColumns = model
    .toState()
    .columns.filter((c) => c.merged)
    .map((c) => c.id);
  if (armColumns.length > 0) {
    model
      .addSpanner("Treatment Arm", armColumns)
      .setAlignment(armColumns, "center")
      .setWidth(armColumns, "120px")
      .addFootnote(
        { type: "columns", columnIds: armColumns },
        "N = number of subjects in the arm; percentages use N as the denominator.",
      );
  }

  model.indentRows(rows.all(), 1);

  const firstMeanRow = model
    .toState()
    .rows.find((r) => r.kind === "continuous" && r.label === CONTINUOUS_LABELS.meanSd);
  if (firstMeanRow) {
    model.addFootnote({ type: "stub", rowId: firstMeanRow.id }, "SD = sample standard deviation.");
  }

  return finalizeReport("T01", T01_TITLE, model, ctx);
}
