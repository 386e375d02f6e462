import { z } from "zod";

// ── Variable metadata ──────────────────────────────────────────────
// `type` stays a free string: the aggregator owns the decision of what
// a usable type is and reports UnknownVariableType itself.
export const VariableMetadataSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
  type: z.string().optional(),
  unit: z.string().optional(),
  levels: z.array(z.string()).optional(),
  precision: z.number().int().min(0).max(6).optional(),
});

// ── Response analysis ──────────────────────────────────────────────
export const ResponseDefinitionSchema = z.object({
  variable: z.string().min(1),
  label: z.string().min(1),
  eventValue: z.string().default("Y"),
  subgroupVariable: z.string().optional(),
  treatment: z.string().min(1),
  reference: z.string().min(1),
});

export type ResponseDefinition = z.infer<typeof ResponseDefinitionSchema>;

// ── Study definition ───────────────────────────────────────────────
export const StudyDefinitionSchema = z.object({
  studyId: z.string().min(1),
  title: z.string().optional(),
  dataFile: z.string().min(1),
  subjectIdColumn: z.string().min(1),
  groupVariable: z.string().min(1),
  groups: z.array(z.string()).optional(),
  /** Records are kept only when this column holds this value. */
  inclusionFlag: z
    .object({
      column: z.string().min(1),
      value: z.string().default("Y"),
    })
    .optional(),
  variables: z.array(VariableMetadataSchema).min(1),
  response: ResponseDefinitionSchema.optional(),
});

export type StudyDefinition = z.infer<typeof StudyDefinitionSchema>;

// ── Raw subject row ────────────────────────────────────────────────
export function rawSubjectSchema(subjectIdColumn: string) {
  return z
    .record(z.string())
    .refine((row) => (row[subjectIdColumn] ?? "").trim() !== "", {
      message: `${subjectIdColumn} is required`,
      path: [subjectIdColumn],
    });
}

/**
 * Validate an array of records against a schema.
 * Returns validated records and errors.
 */
export function validateRecords<T>(
  records: unknown[],
  schema: z.ZodType<T>,
): { valid: T[]; errors: Array<{ index: number; issues: string[] }> } {
  const valid: T[] = [];
  const errors: Array<{ index: number; issues: string[] }> = [];

  for (let i = 0; i < records.length; i++) {
    const result = schema.safeParse(records[i]);
    if (result.success) {
      valid.push(result.data);
    } else {
      errors.push({
        index: i,
        issues: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      });
    }
  }

  return { valid, errors };
}
