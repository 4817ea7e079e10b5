import type { ValuationResult } from "./types";

/** Build a frozen ValuationResult. Results are never mutated after this. */
export function createValuationResult<TDetails>(
  result: ValuationResult<TDetails>,
): ValuationResult<TDetails> {
  return Object.freeze({ ...result, assumptions: Object.freeze({ ...result.assumptions }) });
}

/** Midpoint of the range when one exists, otherwise the point value. */
export function valueMid(result: ValuationResult<unknown>): number {
  if (result.valueLow !== undefined && result.valueHigh !== undefined) {
    return (result.valueLow + result.valueHigh) / 2;
  }
  return result.value;
}

/** (high - low) / mid, or undefined when there is no usable range. */
export function rangeWidthPct(result: ValuationResult<unknown>): number | undefined {
  if (result.valueLow === undefined || result.valueHigh === undefined) return undefined;
  const mid = valueMid(result);
  if (mid <= 0) return undefined;
  return (result.valueHigh - result.valueLow) / mid;
}
