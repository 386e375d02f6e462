/**
 * T02 — Response Rate and Odds Ratio by Subgroup
 *
 * Per arm: responders n/N (%) and the exact interval of the rate. One odds
 * ratio column compares treatment with reference; subgroups where the odds
 * ratio cannot be estimated show the not-estimable text instead.
 */

import { summarizeResponse, responseToSummaryRows } from "../../analytics/response.js";
import { countByGroup, observedGroups } from "../../analytics/stats.js";
import { TableModel } from "../../table/model.js";
import { cols } from "../../table/selectors.js";
import { studySubtitle } from "../context.js";
import type { ReportContext, ReportTable } from "../context.js";
import { confidenceLabel, finalizeReport } from "../finalize.js";

export const T02_TITLE = "Response Rate and Odds Ratio by Subgroup";

/** Group key holding the treatment-vs-reference statistics. */
export const COMPARISON_KEY = "comparison";

const NOT_ESTIMABLE = "NE";

export function buildResponseTable(ctx: ReportContext): ReportTable | null {
  const response = ctx.response;
  if (!response) return null;

  const { treatment, reference } = response;
  const confidence = ctx.config.confidence;
  const conf = confidenceLabel(confidence);
  const missingText = ctx.config.missingText === "" ? NOT_ESTIMABLE : ctx.config.missingText;

  const declared = [...(ctx.groups ?? [])];
  for (const g of [reference, treatment]) {
    if (!declared.includes(g)) declared.push(g);
  }
  const groups = observedGroups(ctx.records, ctx.groupVar, declared);
  const totals = countByGroup(ctx.records, ctx.groupVar);

  const summaries = summarizeResponse(ctx.records, ctx.groupVar, response.variable, {
    treatment,
    reference,
    subgroupVar: response.subgroupVariable,
    eventValue: response.eventValue,
    confidence,
    groups,
  });
  const summaryRows = responseToSummaryRows(summaries, {
    variable: response.variable,
    category: response.label,
    comparisonKey: COMPARISON_KEY,
  });

  const model = TableModel.bind(summaryRows, "label", "category", {
    tableId: "T02",
    stubLabel: response.subgroupVariable ? "Subgroup" : "",
    missingText,
    markStyle: ctx.config.markStyle,
  }).setTitle(T02_TITLE, studySubtitle(ctx));

  // ── Formats ───────────────────────────────────────────────────────
  model
    .applyFormat(cols.statistic("n", "total"), undefined, { type: "integer" })
    .applyFormat(cols.statistic("pct", "ciLow", "ciHigh"), undefined, { type: "fixed", decimals: 1 })
    .applyFormat(cols.statistic("or", "orLow", "orHigh"), undefined, { type: "fixed", decimals: 2 });

  // ── Per-arm columns ───────────────────────────────────────────────
  const present = new Set(model.toState().columns.map((c) => c.id));
  const ciColumns: string[] = [];

  for (const g of groups) {
    const resp = [`n_${g}`, `total_${g}`, `pct_${g}`];
    const ci = [`ciLow_${g}`, `ciHigh_${g}`];
    if (![...resp, ...ci].every((id) => present.has(id))) continue;

    model
      .mergeColumns(resp, "{1}/{2} ({3}%)", { into: `resp_${g}`, label: "n/N (%)" })
      .mergeColumns(ci, "({1}, {2})", { into: `ci_${g}`, label: `${conf} CI` })
      .addSpanner(`${g} (N=${totals.get(g) ?? 0})`, [`resp_${g}`, `ci_${g}`]);
    ciColumns.push(`ci_${g}`);
  }

  // ── Odds ratio ────────────────────────────────────────────────────
  const orSources = ["or", "orLow", "orHigh"].map((s) => `${s}_${COMPARISON_KEY}`);
  if (orSources.every((id) => present.has(id))) {
    const tableRows = model.toState().rows;
    const estimable = summaries
      .map((s, i) => (s.oddsRatio.or === null ? null : tableRows[i]?.id ?? null))
      .filter((id): id is string => id !== null);

    // Rows outside the rule fall back to the comparison group, which is all missing there.
    model.mergeColumns(orSources, "{1} ({2}, {3})", {
      into: "odds_ratio",
      rows: estimable,
      label: `Odds Ratio (${conf} CI)`,
    });
    model.addFootnote(
      { type: "columns", columnIds: ["odds_ratio"] },
      `Odds ratio of ${treatment} vs ${reference} with Wald confidence interval on the log scale; ` +
        `${missingText} = not estimable (a zero cell).`,
    );
  }

  if (ciColumns.length > 0) {
    model
      .setWidth(ciColumns, "110px")
      .addFootnote(
        { type: "columns", columnIds: ciColumns },
        "Exact (Clopper-Pearson) confidence interval for the response rate.",
      );
  }

  return finalizeReport("T02", T02_TITLE, model, ctx);
}
