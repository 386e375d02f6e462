import type { FootnoteMarkStyle, FormatRule } from "./types.js";

const groupedInteger = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/**
 * Format the magnitude and put the sign back, so halves round away from zero
 * in both directions and a value that rounds to zero prints without a sign.
 */
function signed(value: number, format: (magnitude: number) => string): string {
  const text = format(Math.abs(value));
  return value < 0 && /[1-9]/.test(text) ? `-${text}` : text;
}

/**
 * Format a number with a rule. Without a rule the value prints as-is.
 */
export function formatValue(value: number, rule: FormatRule | undefined): string {
  if (!rule) return String(value);

  switch (rule.type) {
    case "integer": {
      const grouping = rule.grouping === true;
      return signed(value, (m) => (grouping ? groupedInteger.format(Math.round(m)) : String(Math.round(m))));
    }
    case "fixed": {
      const { decimals } = rule;
      return signed(value, (m) => m.toFixed(decimals));
    }
    case "percent": {
      const { decimals } = rule;
      return `${signed(value * 100, (m) => m.toFixed(decimals))}%`;
    }
  }
}

/**
 * Footnote mark for the mark at `index` (0-based).
 * Alphabetic marks continue a, …, z, aa, ab, … after the alphabet runs out.
 */
export function footnoteMark(index: number, style: FootnoteMarkStyle): string {
  if (style === "numeric") return String(index + 1);

  let n = index + 1;
  let mark = "";
  while (n > 0) {
    const rem = (n - 1) % 26;
    mark = String.fromCharCode(97 + rem) + mark;
    n = Math.floor((n - 1) / 26);
  }
  return mark;
}

/** Replace `{k}` placeholders with the k-th value (1-based). */
export function fillPattern(pattern: string, values: string[]): string {
  return pattern.replace(/\{(\d+)\}/g, (whole: string, k: string) => values[Number(k) - 1] ?? whole);
}
