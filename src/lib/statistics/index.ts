/**
 * Statistics
 *
 * Small descriptive-statistics helpers shared by relative valuation,
 * scenario comparison, Monte Carlo and sensitivity sweeps.
 *
 * Pure functions — deterministic, no side effects. Inputs are never mutated.
 */

import type { HistogramBin } from "@/lib/valuationModel/types";

export const DEFAULT_HISTOGRAM_BINS = 30;

function sortedCopy(values: readonly number[]): number[] {
  return [...values].sort((a, b) => a - b);
}

/** Arithmetic mean; undefined for an empty list. */
export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Median; an even count averages the two middle values. */
export function median(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  const sorted = sortedCopy(values);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid];
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

/** Population standard deviation (divides by n). */
export function populationStd(values: readonly number[]): number | undefined {
  const m = mean(values);
  if (m === undefined) return undefined;
  let ss = 0;
  for (const v of values) ss += (v - m) * (v - m);
  return Math.sqrt(ss / values.length);
}

/**
 * Percentile of an ascending-sorted list with linear interpolation between
 * closest ranks. `p` is in [0, 100].
 */
export function percentileSorted(sorted: readonly number[], p: number): number | undefined {
  if (sorted.length === 0) return undefined;
  if (sorted.length === 1) return sorted[0];
  const clamped = Math.min(100, Math.max(0, p));
  const idx = (clamped / 100) * (sorted.length - 1);
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sorted[lo];
  return sorted[lo] + (sorted[hi] - sorted[lo]) * (idx - lo);
}

export function percentile(values: readonly number[], p: number): number | undefined {
  return percentileSorted(sortedCopy(values), p);
}

/**
 * Equal-width histogram over [min, max]. The last bin is closed on the
 * right so the maximum is counted. When every value is equal a single bin
 * holds them all.
 */
export function histogram(
  values: readonly number[],
  binCount: number = DEFAULT_HISTOGRAM_BINS,
): HistogramBin[] {
  if (values.length === 0) return [];
  if (!Number.isInteger(binCount) || binCount < 1) {
    throw new RangeError(`binCount must be a positive integer, got ${binCount}`);
  }

  let lo = values[0];
  let hi = values[0];
  for (const v of values) {
    if (v < lo) lo = v;
    if (v > hi) hi = v;
  }

  if (lo === hi) {
    return [{ binLower: lo, binUpper: hi, count: values.length }];
  }

  const width = (hi - lo) / binCount;
  const counts = new Array<number>(binCount).fill(0);
  for (const v of values) {
    const idx = Math.min(binCount - 1, Math.floor((v - lo) / width));
    counts[idx] += 1;
  }

  return counts.map((count, i) => ({
    binLower: lo + i * width,
    binUpper: i === binCount - 1 ? hi : lo + (i + 1) * width,
    count,
  }));
}

/** `count` evenly spaced values from start to stop inclusive. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`count must be a positive integer, got ${count}`);
  }
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * step));
}

export interface SummaryStatistics {
  mean: number;
  median: number;
  std: number;
  min: number;
  max: number;
  count: number;
}

/** Summary of a non-empty list; undefined when empty. */
export function summarize(values: readonly number[]): SummaryStatistics | undefined {
  if (values.length === 0) return undefined;
  const sorted = sortedCopy(values);
  const m = mean(sorted);
  const med = median(sorted);
  const sd = populationStd(sorted);
  if (m === undefined || med === undefined || sd === undefined) return undefined;
  return {
    mean: m,
    median: med,
    std: sd,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    count: sorted.length,
  };
}
