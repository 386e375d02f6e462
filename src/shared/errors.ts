/**
 * Structural errors raised by the aggregator and table transformations.
 *
 * All of them surface synchronously from the call that detected the problem.
 * Undefined statistics are not errors: they travel as `null` values.
 */

export type TableErrorKind =
  | "UnknownVariableType"
  | "UnknownReference"
  | "InvalidMergePattern"
  | "InvalidTransformation";

export class TableEngineError extends Error {
  readonly kind: TableErrorKind;

  constructor(kind: TableErrorKind, message: string) {
    super(message);
    this.name = kind;
    this.kind = kind;
  }
}

export class UnknownVariableTypeError extends TableEngineError {
  readonly variable: string;

  constructor(variable: string, type: string | undefined) {
    super(
      "UnknownVariableType",
      type === undefined
        ? `Variable "${variable}" has no type metadata (expected categorical or continuous)`
        : `Variable "${variable}" has unsupported type "${type}" (expected categorical or continuous)`,
    );
    this.variable = variable;
  }
}

export class UnknownReferenceError extends TableEngineError {
  readonly target: "row" | "column" | "rowGroup";
  readonly ids: string[];

  constructor(target: "row" | "column" | "rowGroup", ids: string[]) {
    super("UnknownReference", `Unknown ${target} id(s): ${ids.join(", ")}`);
    this.target = target;
    this.ids = ids;
  }
}

export class InvalidMergePatternError extends TableEngineError {
  constructor(message: string) {
    super("InvalidMergePattern", message);
  }
}

export class InvalidTransformationError extends TableEngineError {
  constructor(message: string) {
    super("InvalidTransformation", message);
  }
}
