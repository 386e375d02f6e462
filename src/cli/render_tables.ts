#!/usr/bin/env node
/**
 * CLI: render-tables
 *
 * Usage: render-tables <studyDir> [--marks numeric|alphabetic] [--missing <text>]
 *          [--confidence <level>] [--tables T01,T02] [--out <dir>] [--zip]
 *
 * Loads <studyDir>/study.json and the subject CSV it names, builds every
 * report table and prints them. With --out, writes text, grid JSON, transform
 * logs and a manifest under <dir>/<studyId>/.
 * TABLE_MARK_STYLE, TABLE_MISSING_TEXT and TABLE_CONFIDENCE set defaults.
 */

import "dotenv/config";
import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import { loadStudyDataset } from "../evidence/dataset.js";
import { buildTableExportFiles, createTableExportZip } from "../exports/table_export.js";
import { gridToText } from "../exports/text_grid.js";
import { contextFromDataset } from "../reports/context.js";
import type { ReportTable } from "../reports/context.js";
import { REPORT_BUILDERS } from "../reports/registry.js";
import { loadRenderConfig } from "../shared/render_config.js";
import type { RenderConfigSources } from "../shared/render_config.js";

export const USAGE =
  "Usage: render-tables <studyDir> [--marks numeric|alphabetic] [--missing <text>] " +
  "[--confidence <level>] [--tables T01,T02] [--out <dir>] [--zip]";

export interface RenderTablesArgs {
  studyDir: string;
  config: RenderConfigSources;
  /** Table IDs to build; all when empty. */
  tables: string[];
  outDir: string | null;
  zip: boolean;
}

/** Parse argv (without node and script). Returns null when no study directory is given. */
export function parseArgs(args: string[]): RenderTablesArgs | null {
  const parsed: RenderTablesArgs = {
    studyDir: "",
    config: {},
    tables: [],
    outDir: null,
    zip: false,
  };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = i + 1 < args.length ? args[i + 1] : undefined;
    if (arg === "--marks" && next !== undefined) {
      parsed.config.markStyle = next;
      i++;
    } else if (arg === "--missing" && next !== undefined) {
      parsed.config.missingText = next;
      i++;
    } else if (arg === "--confidence" && next !== undefined) {
      parsed.config.confidence = next;
      i++;
    } else if (arg === "--tables" && next !== undefined) {
      parsed.tables = next
        .split(",")
        .map((t) => t.trim().toUpperCase())
        .filter((t) => t !== "");
      i++;
    } else if (arg === "--out" && next !== undefined) {
      parsed.outDir = next;
      i++;
    } else if (arg === "--zip") {
      parsed.zip = true;
    } else if (!arg.startsWith("--")) {
      positional.push(arg);
    }
  }

  if (positional.length === 0) return null;
  parsed.studyDir = positional[0];
  return parsed;
}

export type StepLogger = (step: string, msg: string) => void;

/**
 * Load, build and (optionally) write. Returns the built tables.
 */
export async function runRenderTables(
  args: RenderTablesArgs,
  log: StepLogger,
  env: Record<string, string | undefined> = process.env,
): Promise<ReportTable[]> {
  const config = loadRenderConfig(args.config, env);
  log("CONFIG", `marks=${config.markStyle} missing="${config.missingText}" confidence=${config.confidence}`);

  const dataset = loadStudyDataset(args.studyDir);
  log("LOAD", `${dataset.definition.studyId}: ${dataset.records.length} subjects (SHA-256=${dataset.sourceHash.slice(0, 16)}...)`);
  if (dataset.excludedCount > 0) {
    log("LOAD", `  ${dataset.excludedCount} rows excluded by ${dataset.definition.inclusionFlag?.column ?? "flag"}`);
  }
  for (const e of dataset.errors) {
    log("LOAD", `  ⚠ row ${e.index + 1}: ${e.issues.join("; ")}`);
  }

  const unknown = args.tables.filter((id) => !REPORT_BUILDERS.some((b) => b.tableId === id));
  if (unknown.length > 0) {
    throw new Error(`Unknown table ID(s): ${unknown.join(", ")}`);
  }
  const builders =
    args.tables.length === 0 ? REPORT_BUILDERS : REPORT_BUILDERS.filter((b) => args.tables.includes(b.tableId));

  const ctx = contextFromDataset(dataset, config);
  const tables: ReportTable[] = [];
  for (const builder of builders) {
    const table = builder.build(ctx);
    if (!table) {
      log("TABLES", `${builder.tableId}: skipped (nothing to report)`);
      continue;
    }
    log("TABLES", `${table.tableId}: ${table.title} (${table.provenance.transformCount} transforms, ${table.fingerprint.slice(0, 12)})`);
    tables.push(table);
  }

  if (args.outDir !== null) {
    const generatedAt = new Date();
    const studyOut = path.join(args.outDir, dataset.definition.studyId);
    for (const file of buildTableExportFiles(dataset.definition.studyId, tables, generatedAt)) {
      const target = path.join(studyOut, file.name);
      mkdirSync(path.dirname(target), { recursive: true });
      writeFileSync(target, file.content);
    }
    log("EXPORT", `Wrote ${tables.length} tables to ${studyOut}`);

    if (args.zip) {
      const zipPath = path.join(studyOut, "tables_export.zip");
      writeFileSync(zipPath, await createTableExportZip(dataset.definition.studyId, tables, generatedAt));
      log("EXPORT", `Bundle: ${zipPath}`);
    }
  }

  return tables;
}

// ── CLI entry point ──────────────────────────────────────────────────
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  const startTime = Date.now();
  const log: StepLogger = (step, msg) => {
    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  [${elapsed}s] [${step}] ${msg}`);
  };

  const tables = await runRenderTables(args, log);
  for (const table of tables) {
    console.log();
    console.log(gridToText(table.grid));
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))) {
  main().catch((err: unknown) => {
    console.error("\nTable rendering failed:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
}
