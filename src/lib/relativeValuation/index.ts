/**
 * Relative Valuation - Public API
 *
 * Values a company from comparable-company multiples (P/E, P/S, P/B,
 * EV/EBITDA). Independent of the DCF kernel.
 */

export type {
  MultipleMethod,
  RelativeValuationOptions,
  MultipleStatistics,
  MultipleDetails,
  MultipleResult,
  RelativeValuationMap,
  CompositeWeights,
  CompositeDetails,
  CompositeResult,
  CoverageReason,
  MethodCoverage,
} from "./types";
export { MULTIPLE_METHODS, DEFAULT_COMPOSITE_WEIGHTS } from "./types";

export {
  isValidMultiple,
  comparableMultiple,
  extractMultiples,
  multipleStatistics,
  analyzeComparableStatistics,
} from "./multiples";

export {
  companyMetric,
  valueFromMultiple,
  multipleValuation,
  peValuation,
  psValuation,
  pbValuation,
  evEbitdaValuation,
  autoComparableAnalysis,
  compositeRelativeValuation,
  relativeValuationCoverage,
} from "./valuation";
