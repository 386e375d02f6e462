import { describe, it, expect } from "vitest";
import path from "path";
import { fileURLToPath } from "url";
import { loadStudyDataset } from "../src/evidence/dataset.js";
import { buildManifest, buildTableExportFiles, createTableExportZip } from "../src/exports/table_export.js";
import { contextFromDataset } from "../src/reports/context.js";
import { buildAllReportTables } from "../src/reports/registry.js";
import { DEFAULT_RENDER_CONFIG } from "../src/shared/render_config.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const DEMO = path.resolve(__dirname, "..", "fixtures", "demo");

const tables = buildAllReportTables(contextFromDataset(loadStudyDataset(DEMO), DEFAULT_RENDER_CONFIG));
const generatedAt = new Date("2024-01-15T00:00:00.000Z");

describe("Table export files", () => {
  const files = buildTableExportFiles("DEMO-001", tables, generatedAt);

  it("writes text, grid and transform log per table plus a manifest", () => {
    expect(files.map((f) => f.name)).toEqual([
      "tables/T01.txt",
      "tables/T01.grid.json",
      "audit/T01.transforms.jsonl",
      "tables/T02.txt",
      "tables/T02.grid.json",
      "audit/T02.transforms.jsonl",
      "manifest.json",
    ]);
  });

  it("writes one transform entry per line", () => {
    const log = files.find((f) => f.name === "audit/T01.transforms.jsonl");
    const lines = String(log?.content).split("\n");
    expect(lines).toHaveLength(tables[0].model.history().length);
    const first: unknown = JSON.parse(lines[0]);
    expect(first).toMatchObject({ op: "bind", position: 0, tableId: "T01" });
  });

  it("lists fingerprints and provenance in the manifest", () => {
    const manifest = buildManifest("DEMO-001", tables, generatedAt);
    expect(manifest.generatedAt).toBe("2024-01-15T00:00:00.000Z");
    expect(manifest.tables.map((t) => t.tableId)).toEqual(["T01", "T02"]);
    expect(manifest.tables[0].fingerprint).toBe(tables[0].fingerprint);
    expect(manifest.tables[1].transformRoot).toBe(tables[1].provenance.transformRoot);
  });
});

describe("Table export zip", () => {
  it("produces a zip archive", async () => {
    const zip = await createTableExportZip("DEMO-001", tables, generatedAt);
    expect(zip.subarray(0, 2).toString("latin1")).toBe("PK");
    expect(zip.includes("tables/T02.grid.json")).toBe(true);
    expect(zip.includes("manifest.json")).toBe(true);
  });
});
