import jStat from "jstat";
import type { ConfidenceInterval, OddsRatioResult } from "../shared/types.js";

function assertConfidence(confidence: number): void {
  if (!(confidence > 0 && confidence < 1)) {
    throw new RangeError(`Confidence level must be in (0, 1), got ${confidence}`);
  }
}

function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Exact (Clopper–Pearson) two-sided interval for a binomial proportion,
 * computed from F-distribution quantiles. Bounds are on the percent scale.
 *
 *   low  = x / (x + (n − x + 1) · F(1 − α/2; 2(n − x + 1), 2x))
 *   high = (x + 1) · F(1 − α/2; 2(x + 1), 2(n − x)) / (n − x + (x + 1) · F(…))
 *
 * With no trials both bounds are undefined (null).
 */
export function clopperPearson(
  successes: number,
  total: number,
  confidence: number = 0.95,
): ConfidenceInterval {
  assertCount("successes", successes);
  assertCount("total", total);
  assertConfidence(confidence);
  if (successes > total) {
    throw new RangeError(`successes (${successes}) exceeds total (${total})`);
  }
  if (total === 0) return { low: null, high: null };

  const x = successes;
  const n = total;
  const p = 1 - (1 - confidence) / 2;

  let low = 0;
  if (x > 0) {
    const f = jStat.centralF.inv(p, 2 * (n - x + 1), 2 * x);
    low = x / (x + (n - x + 1) * f);
  }

  let high = 1;
  if (x < n) {
    const f = jStat.centralF.inv(p, 2 * (x + 1), 2 * (n - x));
    high = ((x + 1) * f) / (n - x + (x + 1) * f);
  }

  return { low: low * 100, high: high * 100 };
}

/**
 * Odds ratio of group A against reference group B with a Wald interval on
 * the log scale (variance = 1/a + 1/b + 1/c + 1/d over the 2×2 cells).
 *
 * Any zero cell leaves the ratio or its variance undefined, so all three
 * results are null in that case.
 */
export function oddsRatioCI(
  respA: number,
  totalA: number,
  respB: number,
  totalB: number,
  confidence: number = 0.95,
): OddsRatioResult {
  assertCount("respA", respA);
  assertCount("totalA", totalA);
  assertCount("respB", respB);
  assertCount("totalB", totalB);
  assertConfidence(confidence);
  if (respA > totalA || respB > totalB) {
    throw new RangeError("Responder count exceeds group total");
  }

  const a = respA;
  const c = totalA - respA;
  const b = respB;
  const d = totalB - respB;

  if (a === 0 || b === 0 || c === 0 || d === 0) {
    return { or: null, low: null, high: null };
  }

  const or = (a / c) / (b / d);
  const se = Math.sqrt(1 / a + 1 / b + 1 / c + 1 / d);
  const z = jStat.normal.inv(1 - (1 - confidence) / 2, 0, 1);
  const logOr = Math.log(or);

  return {
    or,
    low: Math.exp(logOr - z * se),
    high: Math.exp(logOr + z * se),
  };
}
