/**
 * Relative Valuation - Comparable Multiples
 *
 * Extracts the usable multiple of each comparable. A multiple is usable
 * when it is present, finite and positive. When a P/E, P/S or P/B multiple
 * is absent but the comparable reports a market cap and a positive
 * denominator, the multiple is derived from those.
 */

import type { Comparable } from "@/lib/valuationModel/types";
import { summarize } from "@/lib/statistics";
import type { MultipleMethod, MultipleStatistics } from "./types";

export function isValidMultiple(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function derive(marketCap: number | null | undefined, denominator: number): number | undefined {
  if (!isValidMultiple(marketCap) || !(denominator > 0)) return undefined;
  return marketCap / denominator;
}

/** The comparable's multiple for `method`, or undefined when unusable. */
export function comparableMultiple(c: Comparable, method: MultipleMethod): number | undefined {
  switch (method) {
    case "PE":
      return isValidMultiple(c.peRatio) ? c.peRatio : derive(c.marketCap, c.netIncome);
    case "PS":
      return isValidMultiple(c.psRatio) ? c.psRatio : derive(c.marketCap, c.revenue);
    case "PB":
      return isValidMultiple(c.pbRatio) ? c.pbRatio : derive(c.marketCap, c.netAssets);
    case "EV_EBITDA":
      // EV needs the comparable's net debt, which is not carried
      return isValidMultiple(c.evEbitda) ? c.evEbitda : undefined;
  }
}

export function extractMultiples(
  comparables: readonly Comparable[],
  method: MultipleMethod,
): number[] {
  const out: number[] = [];
  for (const c of comparables) {
    const m = comparableMultiple(c, method);
    if (m !== undefined) out.push(m);
  }
  return out;
}

export function multipleStatistics(multiples: readonly number[]): MultipleStatistics | undefined {
  return summarize(multiples);
}

/** Per-method statistics over the comparable set; methods with no data are omitted. */
export function analyzeComparableStatistics(
  comparables: readonly Comparable[],
): Partial<Record<MultipleMethod, MultipleStatistics>> {
  const stats: Partial<Record<MultipleMethod, MultipleStatistics>> = {};
  for (const method of ["PE", "PS", "PB", "EV_EBITDA"] as const) {
    const s = multipleStatistics(extractMultiples(comparables, method));
    if (s) stats[method] = s;
  }
  return stats;
}
