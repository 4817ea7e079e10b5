/**
 * Valuation Engine — Cross-check Recommendation
 */

import { summarize } from "@/lib/statistics";
import type { Confidence, MethodValue, Recommendation } from "./types";

export const RANGE_LOW_FACTOR = 0.9;
export const RANGE_HIGH_FACTOR = 1.1;

/** Coefficient of variation below 0.1 is high confidence, below 0.2 medium. */
export function confidenceFromCv(cv: number): Confidence {
  if (cv < 0.1) return "high";
  if (cv < 0.2) return "medium";
  return "low";
}

/**
 * Median of the positive method values, widened to [min * 0.9, max * 1.1].
 * null when no method produced a positive value.
 */
export function buildRecommendation(methods: readonly MethodValue[]): Recommendation | null {
  const used = methods.filter((m) => Number.isFinite(m.value) && m.value > 0);
  const s = summarize(used.map((m) => m.value));
  if (!s) return null;

  const cv = s.mean > 0 ? s.std / s.mean : 1;

  return {
    finalValue: s.median,
    valueRange: [s.min * RANGE_LOW_FACTOR, s.max * RANGE_HIGH_FACTOR],
    confidence: confidenceFromCv(cv),
    coefficientOfVariation: cv,
    methodsUsed: used.length,
    methodDetails: used,
  };
}
