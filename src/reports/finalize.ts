import { gridFingerprint, render } from "../table/renderer.js";
import type { TableModel } from "../table/model.js";
import type { ReportContext, ReportTable } from "./context.js";

/** Render a finished model and attach its fingerprint and provenance. */
export function finalizeReport(
  tableId: string,
  title: string,
  model: TableModel,
  ctx: ReportContext,
): ReportTable {
  const grid = render(model);
  const history = model.history();
  const last = history[history.length - 1];
  return {
    tableId,
    title,
    model,
    grid,
    fingerprint: gridFingerprint(grid),
    provenance: {
      sourceHash: ctx.sourceHash ?? null,
      transformCount: history.length,
      transformRoot: last ? last.hashChain.merkleRoot : null,
    },
  };
}

/** "95%" for 0.95. */
export function confidenceLabel(confidence: number): string {
  return `${Math.round(confidence * 1000) / 10}%`;
}
