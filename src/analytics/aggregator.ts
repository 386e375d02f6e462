/**
 * Dispatches each study variable to the matching StatEngine
 * summary and concatenates the results into one long-form dataset.
 */

import { UnknownVariableTypeError } from "../shared/errors.js";
import type {
  SubjectRecord,
  SummaryRow,
  VariableDescriptor,
  VariableMetadata,
} from "../shared/types.js";
import { summarizeCategorical, summarizeContinuous } from "./summarize.js";
import type { SummarizeOptions } from "./summarize.js";

/**
 * Turn untyped variable metadata into the tagged descriptor the StatEngine
 * works with. Throws UnknownVariableType for anything else.
 */
export function describeVariable(meta: VariableMetadata): VariableDescriptor {
  switch (meta.type) {
    case "categorical":
      return { type: "categorical", name: meta.name, label: meta.label, levels: meta.levels };
    case "continuous":
      return {
        type: "continuous",
        name: meta.name,
        label: meta.label,
        unit: meta.unit,
        precision: meta.precision,
      };
    default:
      throw new UnknownVariableTypeError(meta.name, meta.type);
  }
}

/** Row-group label for a variable: its label, plus the unit for continuous variables. */
export function categoryLabel(variable: VariableDescriptor): string {
  if (variable.type === "continuous" && variable.unit) {
    return `${variable.label} (${variable.unit})`;
  }
  return variable.label;
}

/**
 * Summarize every variable by group.
 *
 * Rows come back in variable declaration order; within a variable they keep
 * the order the StatEngine produced (declared levels, then first appearance).
 * All variables are described before any is summarized, so an untyped
 * variable fails the call without partial output.
 */
export function aggregate(
  records: SubjectRecord[],
  groupVar: string,
  variables: VariableMetadata[],
  options: SummarizeOptions = {},
): SummaryRow[] {
  const descriptors = variables.map(describeVariable);

  return descriptors.flatMap((variable) => {
    const rows =
      variable.type === "categorical"
        ? summarizeCategorical(records, groupVar, variable, options)
        : summarizeContinuous(records, groupVar, variable, options);
    const category = categoryLabel(variable);
    return rows.map((row) => ({ ...row, category }));
  });
}
