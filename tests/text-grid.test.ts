import { describe, it, expect } from "vitest";
import { gridToText } from "../src/exports/text_grid.js";
import { TableModel } from "../src/table/model.js";
import { render } from "../src/table/renderer.js";
import type { SummaryRow } from "../src/shared/types.js";

const summary: SummaryRow[] = [
  { variable: "X", kind: "categorical", category: "X", label: "Yes", values: { A: { n: 3 } } },
];

function model(): TableModel {
  return TableModel.bind(summary, "label", null, { stubLabel: "Item" })
    .relabelColumns({ n_A: "A" })
    .setTitle("Table 1");
}

describe("gridToText", () => {
  it("lays out title, header and body between rules", () => {
    expect(gridToText(render(model()))).toBe(
      ["Table 1", "=======", "Item  A", "-------", "Yes   3", "======="].join("\n"),
    );
  });

  it("widens columns under a long spanner and appends footnotes", () => {
    const grid = render(
      model()
        .addSpanner("Arm", ["n_A"])
        .addFootnote({ type: "title" }, "Note."),
    );
    expect(gridToText(grid)).toBe(
      [
        "Table 1[1]",
        "=========",
        "      Arm",
        "      ---",
        "Item   A",
        "---------",
        "Yes    3",
        "=========",
        "[1] Note.",
      ].join("\n"),
    );
  });

  it("prints group rows in the stub and indents members", () => {
    const grid = render(model().addRowGroup("Group", ["X:Yes"]).indentRows(["X:Yes"], 1));
    const lines = gridToText(grid, { gap: 1 }).split("\n");
    expect(lines.slice(4, 6)).toEqual(["Group", "  Yes 3"]);
  });
});
