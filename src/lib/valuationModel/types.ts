/**
 * Valuation Model - Types
 *
 * Shared value objects consumed by every engine: the subject company,
 * comparable companies, valuation results, scenario configs, stress and
 * Monte Carlo results.
 *
 * All monetary amounts share one currency unit chosen by the caller.
 * Rates are fractional (0.15 = 15%), never percentages.
 */

// ---------------------------------------------------------------------------
// Company
// ---------------------------------------------------------------------------

export type CompanyStage = "early" | "growth" | "mature" | "listed";

export interface ReinvestmentAssumptions {
  /** Capital expenditure as a fraction of revenue */
  capexRatio: number;
  /** Working capital increase as a fraction of revenue */
  workingCapitalRatio: number;
  /** Depreciation & amortization as a fraction of revenue */
  depreciationRatio: number;
}

export interface Company {
  readonly name: string;
  readonly industry: string;
  readonly stage: CompanyStage;

  readonly revenue: number;
  /** May be negative for loss-making companies */
  readonly netIncome: number;
  readonly netAssets: number;
  /** May be negative or unknown */
  readonly ebitda: number | undefined;
  readonly totalDebt: number;
  readonly cashAndEquivalents: number;

  readonly growthRate: number;
  readonly operatingMargin: number;
  readonly taxRate: number;

  readonly beta: number;
  readonly riskFreeRate: number;
  readonly marketRiskPremium: number;
  readonly costOfDebt: number;
  readonly targetDebtRatio: number;
  readonly terminalGrowthRate: number;

  readonly reinvestment: Readonly<ReinvestmentAssumptions>;
}

// ---------------------------------------------------------------------------
// Comparable
// ---------------------------------------------------------------------------

export interface Comparable {
  name: string;
  tsCode?: string;
  industry: string;
  marketCap?: number | null;
  revenue: number;
  netIncome: number;
  netAssets: number;
  ebitda?: number | null;
  peRatio?: number | null;
  psRatio?: number | null;
  pbRatio?: number | null;
  evEbitda?: number | null;
  growthRate?: number | null;
}

// ---------------------------------------------------------------------------
// Valuation Result
// ---------------------------------------------------------------------------

export type ValuationMethod =
  | "DCF"
  | "PE"
  | "PS"
  | "PB"
  | "EV_EBITDA"
  | "RELATIVE_COMPOSITE"
  | "SCENARIO_WEIGHTED"
  | "VC"
  | "MULTI_PRODUCT_DCF"
  | "COST"
  | "ADJUSTED_NET_ASSETS"
  | "TRANSACTION_COMPARABLE"
  | "FIRST_CHICAGO"
  | "SUM_OF_PARTS";

export interface ValuationResult<TDetails = Readonly<Record<string, unknown>>> {
  readonly method: ValuationMethod;
  /** Equity value */
  readonly value: number;
  readonly valueLow?: number;
  readonly valueHigh?: number;
  readonly details: TDetails;
  readonly assumptions: Readonly<Record<string, number | string | boolean>>;
}

// ---------------------------------------------------------------------------
// Scenario
// ---------------------------------------------------------------------------

export interface ScenarioConfig {
  name: string;
  /** Added to growthRate (0.05 = +5 points) */
  revenueGrowthAdj: number;
  /** Added to operatingMargin */
  marginAdj: number;
  /** Added to the computed WACC */
  waccAdj: number;
  /** Added to terminalGrowthRate */
  terminalGrowthAdj?: number;
}

// ---------------------------------------------------------------------------
// Stress
// ---------------------------------------------------------------------------

export interface StressTestResult {
  readonly testName: string;
  readonly scenarioDescription: string;
  readonly baseValue: number;
  readonly stressedValue: number;
  /** (stressed - base) / |base|; negative for a loss even when base < 0 */
  readonly changePct: number;
  /** min(0, changePct) */
  readonly downsideProtection: number;
  readonly details: Readonly<Record<string, number>>;
}

// ---------------------------------------------------------------------------
// Monte Carlo
// ---------------------------------------------------------------------------

export interface HistogramBin {
  binLower: number;
  binUpper: number;
  count: number;
}

export interface MonteCarloPercentiles {
  p5: number;
  p10: number;
  p25: number;
  p75: number;
  p90: number;
  p95: number;
}

export interface MonteCarloResult {
  /** Iterations attempted (after the iteration cap) */
  readonly iterations: number;
  /** Iterations that produced a finite valuation */
  readonly validIterations: number;
  readonly seed: number;
  readonly mean: number | null;
  readonly median: number | null;
  /** Population standard deviation */
  readonly std: number | null;
  readonly min: number | null;
  readonly max: number | null;
  readonly percentile5: number | null;
  readonly percentile95: number | null;
  readonly percentiles: MonteCarloPercentiles | null;
  readonly histogram: readonly HistogramBin[];
  readonly warnings: readonly string[];
}
