/**
 * Report Table Export
 *
 * Files written for a rendered study:
 * - tables/<id>.txt               fixed-width text layout
 * - tables/<id>.grid.json         the rendered grid
 * - audit/<id>.transforms.jsonl   transform log, one entry per line
 * - manifest.json                 fingerprints and provenance of every table
 *
 * The zip holds the same entries.
 */

import archiver from "archiver";
import { gridToText } from "./text_grid.js";
import type { ReportTable } from "../reports/context.js";

export interface ExportFile {
  /** Path relative to the study's output directory, `/`-separated. */
  name: string;
  content: string;
}

export interface ExportManifest {
  studyId: string;
  generatedAt: string;
  tables: Array<{
    tableId: string;
    title: string;
    fingerprint: string;
    sourceHash: string | null;
    transformCount: number;
    transformRoot: string | null;
  }>;
}

export function buildManifest(studyId: string, tables: ReportTable[], generatedAt: Date): ExportManifest {
  return {
    studyId,
    generatedAt: generatedAt.toISOString(),
    tables: tables.map((t) => ({
      tableId: t.tableId,
      title: t.title,
      fingerprint: t.fingerprint,
      ...t.provenance,
    })),
  };
}

function tableFiles(t: ReportTable): ExportFile[] {
  return [
    { name: `tables/${t.tableId}.txt`, content: `${gridToText(t.grid)}\n` },
    { name: `tables/${t.tableId}.grid.json`, content: JSON.stringify(t.grid, null, 2) },
    {
      name: `audit/${t.tableId}.transforms.jsonl`,
      content: t.model
        .history()
        .map((e) => JSON.stringify(e))
        .join("\n"),
    },
  ];
}

export function buildTableExportFiles(
  studyId: string,
  tables: ReportTable[],
  generatedAt: Date = new Date(),
): ExportFile[] {
  return [
    ...tables.flatMap(tableFiles),
    {
      name: "manifest.json",
      content: JSON.stringify(buildManifest(studyId, tables, generatedAt), null, 2),
    },
  ];
}

/** Zip the export of the given tables in memory. */
export function createTableExportZip(
  studyId: string,
  tables: ReportTable[],
  generatedAt: Date = new Date(),
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const archive = archiver("zip", { zlib: { level: 9 } });
    const chunks: Buffer[] = [];
    archive.on("data", (chunk: Buffer) => chunks.push(chunk));
    archive.on("end", () => resolve(Buffer.concat(chunks)));
    archive.on("error", reject);

    for (const file of buildTableExportFiles(studyId, tables, generatedAt)) {
      archive.append(file.content, { name: file.name, date: generatedAt });
    }
    archive.finalize().catch(reject);
  });
}
