/**
 * Reads a study definition and its subject CSV into
 * validated SubjectRecords.
 *
 * study.json → schema check → CSV parse → row validation → inclusion flag
 * filter → value coercion (numbers for continuous variables, null for blanks).
 */

import { existsSync, readFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";

import { sha256Bytes } from "../shared/hash.js";
import type { SubjectRecord, Value } from "../shared/types.js";
import { StudyDefinitionSchema, rawSubjectSchema, validateRecords } from "./schemas.js";
import type { StudyDefinition } from "./schemas.js";

export interface StudyDataset {
  definition: StudyDefinition;
  records: SubjectRecord[];
  /** Rows dropped by the inclusion flag. */
  excludedCount: number;
  /** Rows that failed validation. */
  errors: Array<{ index: number; issues: string[] }>;
  /** SHA-256 of the raw CSV bytes. */
  sourceHash: string;
}

/**
 * Load `study.json` from a study directory.
 */
export function loadStudyDefinition(studyDir: string): StudyDefinition {
  const definitionPath = path.join(studyDir, "study.json");
  if (!existsSync(definitionPath)) {
    throw new Error(`Study definition not found: ${definitionPath}`);
  }
  const raw: unknown = JSON.parse(readFileSync(definitionPath, "utf-8"));
  return StudyDefinitionSchema.parse(raw);
}

/**
 * Parse CSV text into header-keyed rows.
 */
export function parseSubjectCsv(text: string): Record<string, string>[] {
  const rows: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  if (!Array.isArray(rows)) return [];
  return rows.filter(
    (r): r is Record<string, string> => typeof r === "object" && r !== null,
  );
}

function coerce(raw: string | undefined, numeric: boolean): Value {
  if (raw === undefined || raw.trim() === "") return null;
  if (!numeric) return raw;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

/**
 * Turn validated CSV rows into SubjectRecords for a study definition.
 * Continuous variables become numbers; every other column stays a string.
 */
export function toSubjectRecords(
  rows: Record<string, string>[],
  definition: StudyDefinition,
): { records: SubjectRecord[]; excludedCount: number; errors: StudyDataset["errors"] } {
  const { valid, errors } = validateRecords(rows, rawSubjectSchema(definition.subjectIdColumn));
  const continuous = new Set(
    definition.variables.filter((v) => v.type === "continuous").map((v) => v.name),
  );

  const flag = definition.inclusionFlag;
  const included = flag ? valid.filter((row) => row[flag.column] === flag.value) : valid;

  const records = included.map((row) => {
    const values: Record<string, Value> = {};
    for (const [column, raw] of Object.entries(row)) {
      values[column] = coerce(raw, continuous.has(column));
    }
    return { subjectId: row[definition.subjectIdColumn], values };
  });

  return { records, excludedCount: valid.length - included.length, errors };
}

/**
 * Load a study directory: `study.json` plus the CSV it names.
 */
export function loadStudyDataset(studyDir: string): StudyDataset {
  const definition = loadStudyDefinition(studyDir);
  const dataPath = path.join(studyDir, definition.dataFile);
  if (!existsSync(dataPath)) {
    throw new Error(`Subject data file not found: ${dataPath}`);
  }

  const buffer = readFileSync(dataPath);
  const rows = parseSubjectCsv(buffer.toString("utf-8"));
  const { records, excludedCount, errors } = toSubjectRecords(rows, definition);

  return {
    definition,
    records,
    excludedCount,
    errors,
    sourceHash: sha256Bytes(buffer),
  };
}
