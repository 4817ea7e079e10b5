/**
 * DCF Engine - Public API
 *
 * Absolute valuation: cost of capital, free cash flow forecast, terminal
 * value and the discounted cash flow evaluator.
 */

export type {
  TerminalMethod,
  DcfOptions,
  DcfOverrides,
  DcfOverrideKey,
  WaccBreakdown,
  FcfForecast,
  DcfDetails,
  DcfResult,
  DcfSensitivityPoint,
  DcfSensitivityResult,
  ProductSegment,
  SegmentValuation,
  SegmentContribution,
  ConsolidatedForecast,
  MultiProductDetails,
  MultiProductResult,
} from "./types";
export {
  DEFAULT_PROJECTION_YEARS,
  DEFAULT_EXIT_MULTIPLE,
  MIN_WACC_SPREAD,
  MAX_PRODUCT_SEGMENTS,
  SEGMENT_WEIGHT_TOLERANCE,
} from "./types";

export { calculateWacc, calculateWaccBreakdown } from "./wacc";
export { forecastFreeCashFlows, growthSchedule, explicitGrowthSchedule } from "./forecast";
export { calculateTerminalValue, assertWaccSpread, assertDiscountRate } from "./terminalValue";
export type { ResolvedDcfOptions } from "./dcf";
export {
  dcfValuation,
  computeDcf,
  resolveDcfOptions,
  validateOverrides,
  DcfOverridesSchema,
} from "./dcf";
export { dcfSensitivityAnalysis } from "./sensitivity";
export { multiProductDcf } from "./multiProduct";
