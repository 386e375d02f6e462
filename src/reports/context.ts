/**
 * Report Computation Context.
 *
 * Everything a report table builder needs: the filtered subject records,
 * the study's variable and response definitions, and the render settings.
 */

import type { RenderConfig } from "../shared/render_config.js";
import type { SubjectRecord, VariableMetadata } from "../shared/types.js";
import type { ResponseDefinition } from "../evidence/schemas.js";
import type { StudyDataset } from "../evidence/dataset.js";
import type { TableModel } from "../table/model.js";
import type { Grid } from "../table/types.js";

export interface ReportContext {
  studyId: string;
  studyTitle?: string;
  records: SubjectRecord[];
  groupVar: string;
  /** Arm display order; arms seen in the data but not listed follow. */
  groups?: string[];
  variables: VariableMetadata[];
  response?: ResponseDefinition;
  config: RenderConfig;
  /** Hash of the source data the records came from, when known. */
  sourceHash?: string;
}

export interface ReportTable {
  tableId: string;
  title: string;
  model: TableModel;
  grid: Grid;
  /** Canonical hash of the rendered grid. */
  fingerprint: string;
  provenance: {
    sourceHash: string | null;
    transformCount: number;
    /** Merkle root over the model's transform log. */
    transformRoot: string | null;
  };
}

export function contextFromDataset(dataset: StudyDataset, config: RenderConfig): ReportContext {
  const { definition } = dataset;
  return {
    studyId: definition.studyId,
    studyTitle: definition.title,
    records: dataset.records,
    groupVar: definition.groupVariable,
    groups: definition.groups,
    variables: definition.variables,
    response: definition.response,
    config,
    sourceHash: dataset.sourceHash,
  };
}

/** Table subtitle: the study ID, followed by the study title when there is one. */
export function studySubtitle(ctx: ReportContext): string {
  return ctx.studyTitle ? `${ctx.studyId}: ${ctx.studyTitle}` : ctx.studyId;
}
