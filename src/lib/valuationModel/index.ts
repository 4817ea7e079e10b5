/**
 * Valuation Model - Public API
 *
 * Value objects, input validation and the error taxonomy shared by the
 * relative, DCF, scenario, stress and sensitivity engines.
 */

export type {
  CompanyStage,
  ReinvestmentAssumptions,
  Company,
  Comparable,
  ValuationMethod,
  ValuationResult,
  ScenarioConfig,
  StressTestResult,
  HistogramBin,
  MonteCarloPercentiles,
  MonteCarloResult,
} from "./types";

export type {
  ValuationErrorCode,
  ValuationIssue,
  EngineFailure,
  EngineResult,
} from "./errors";
export {
  ValuationError,
  isValuationError,
  toEngineFailure,
  toEngineResult,
  toEngineResultAsync,
} from "./errors";

export type { CompanyInput, ComparableInput, ScenarioConfigInput } from "./schemas";
export {
  COMPANY_DEFAULTS,
  CompanyInputSchema,
  ComparableSchema,
  ScenarioConfigSchema,
} from "./schemas";

export {
  parseCompany,
  deriveCompany,
  parseComparable,
  parseComparables,
  parseScenarioConfig,
} from "./company";

export { createValuationResult, valueMid, rangeWidthPct } from "./results";
