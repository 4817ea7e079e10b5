/**
 * Valuation Engine — Public API
 *
 * Orchestration boundary: every entry point returns EngineResult and
 * never throws.
 */

// Re-export types
export type {
  Confidence,
  ValuationStep,
  ValuationStepError,
  MethodValue,
  Recommendation,
  RiskAnalysis,
  ValuationBundle,
  FullValuationOptions,
  QuickMethod,
  AnyValuationResult,
  BatchValuationOptions,
  BatchEntry,
} from "./types";

// Re-export sub-modules
export { buildRecommendation, confidenceFromCv, RANGE_LOW_FACTOR, RANGE_HIGH_FACTOR } from "./recommendation";
export { fullValuation } from "./fullValuation";
export { quickValuation, resolveQuickMethod, batchValuation } from "./quickValuation";
