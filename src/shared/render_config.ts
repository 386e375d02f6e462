/**
 * Render Configuration
 *
 * Settings shared by every report table:
 * - markStyle:    footnote marks as numbers (1, 2, 3) or letters (a, b, c).
 * - missingText:  text shown for missing and undefined statistics.
 * - confidence:   confidence level of exact and odds-ratio intervals.
 *
 * CLI arguments take priority over environment variables; both fall back to
 * the defaults below.
 */

import { z } from "zod";

export const RenderConfigSchema = z.object({
  markStyle: z.enum(["numeric", "alphabetic"]).default("numeric"),
  missingText: z.string().default(""),
  confidence: z.number().gt(0).lt(1).default(0.95),
});

export type RenderConfig = z.infer<typeof RenderConfigSchema>;

export const DEFAULT_RENDER_CONFIG: RenderConfig = RenderConfigSchema.parse({});

/**
 * Parse footnote mark style from CLI argument and/or environment variable.
 * Accepts "numeric"/"number"/"1" and "alphabetic"/"alpha"/"letters"/"a".
 */
export function parseMarkStyle(cliArg?: string, envVar?: string): RenderConfig["markStyle"] {
  const raw = (cliArg ?? envVar ?? "numeric").trim().toLowerCase();
  if (["alphabetic", "alpha", "letters", "a"].includes(raw)) return "alphabetic";
  return "numeric";
}

export interface RenderConfigSources {
  markStyle?: string;
  missingText?: string;
  confidence?: string;
}

/**
 * Build a validated config from CLI values and an environment map
 * (`TABLE_MARK_STYLE`, `TABLE_MISSING_TEXT`, `TABLE_CONFIDENCE`).
 * Throws a ZodError when the confidence level is not in (0, 1).
 */
export function loadRenderConfig(
  cli: RenderConfigSources = {},
  env: Record<string, string | undefined> = process.env,
): RenderConfig {
  const confidence = cli.confidence ?? env.TABLE_CONFIDENCE;
  return RenderConfigSchema.parse({
    markStyle: parseMarkStyle(cli.markStyle, env.TABLE_MARK_STYLE),
    missingText: cli.missingText ?? env.TABLE_MISSING_TEXT,
    confidence: confidence === undefined ? undefined : Number(confidence),
  });
}
