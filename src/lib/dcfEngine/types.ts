/**
 * DCF Engine - Types
 */

import type { ReinvestmentAssumptions, ValuationResult } from "@/lib/valuationModel/types";

export type TerminalMethod = "perpetuity" | "exitMultiple";

export const DEFAULT_PROJECTION_YEARS = 5;
export const DEFAULT_EXIT_MULTIPLE = 10;

/**
 * WACC must exceed terminal growth by at least this much, otherwise the
 * perpetuity formula diverges.
 */
export const MIN_WACC_SPREAD = 0.001;

export interface DcfOptions {
  /** Forecast horizon in whole years (>= 1). Default 5. */
  projectionYears?: number;
  terminalMethod?: TerminalMethod;
  /** Multiple of final-year FCF used by the exit-multiple method. Default 10. */
  exitMultiple?: number;
}

/**
 * Per-call parameter overrides. Applied to a derived copy of the company;
 * the source company is never modified.
 */
export interface DcfOverrides {
  growthRate?: number;
  operatingMargin?: number;
  /** Replaces the base revenue level */
  revenue?: number;
  terminalGrowthRate?: number;
  taxRate?: number;

  beta?: number;
  riskFreeRate?: number;
  marketRiskPremium?: number;
  costOfDebt?: number;
  targetDebtRatio?: number;

  /** Absolute WACC; bypasses the CAPM computation */
  wacc?: number;
  /** Added to the WACC (computed or absolute) */
  waccAdjustment?: number;
}

export type DcfOverrideKey = keyof DcfOverrides;

export interface WaccBreakdown {
  wacc: number;
  costOfEquity: number;
  afterTaxCostOfDebt: number;
  equityWeight: number;
  debtWeight: number;
}

export interface FcfForecast {
  readonly year: number;
  readonly revenue: number;
  readonly operatingProfit: number;
  readonly nopat: number;
  readonly depreciation: number;
  readonly capex: number;
  readonly workingCapitalChange: number;
  readonly fcf: number;
  readonly growthRate: number;
}

export interface DcfDetails {
  wacc: number;
  costOfEquity: number | undefined;
  afterTaxCostOfDebt: number | undefined;
  pvForecasts: number;
  pvTerminal: number;
  terminalValue: number;
  enterpriseValue: number;
  netDebt: number;
  terminalMethod: TerminalMethod;
  terminalGrowthRate: number;
  projectionYears: number;
  forecasts: readonly FcfForecast[];
}

export type DcfResult = ValuationResult<DcfDetails>;

export interface DcfSensitivityPoint {
  parameterValue: number;
  /** Equity value, or null when the model is degenerate at this value */
  value: number | null;
}

export interface DcfSensitivityResult {
  parameter: DcfOverrideKey;
  points: DcfSensitivityPoint[];
}

// ---------------------------------------------------------------------------
// Multi-product DCF
// ---------------------------------------------------------------------------

export const MAX_PRODUCT_SEGMENTS = 10;
/** Segment revenue weights must sum to 1 within this tolerance */
export const SEGMENT_WEIGHT_TOLERANCE = 0.01;

export interface ProductSegment {
  name: string;
  /** Current annual revenue of the segment */
  revenue: number;
  /** Share of company revenue, (0, 1] */
  revenueWeight: number;
  /** Growth for years 1..k; later years grow at terminalGrowthRate */
  growthPath: number[];
  terminalGrowthRate: number;
  operatingMargin: number;
  /** Informational; not used in the cash flow */
  grossMargin?: number;
  reinvestment?: Partial<ReinvestmentAssumptions>;
  /** Segment beta; the company beta applies when absent */
  beta?: number;
}

export interface SegmentValuation {
  name: string;
  revenueWeight: number;
  wacc: number;
  pvForecasts: number;
  pvTerminal: number;
  terminalValue: number;
  enterpriseValue: number;
  currentRevenue: number;
  finalRevenue: number;
  /** (finalRevenue / currentRevenue)^(1/n) - 1 */
  revenueCagr: number;
  forecasts: readonly FcfForecast[];
}

export interface SegmentContribution {
  name: string;
  /** Segment EV / total EV; 0 when total EV is not positive */
  share: number;
}

export type ConsolidatedForecast = Omit<FcfForecast, "growthRate">;

export interface MultiProductDetails {
  /** Company WACC, used for every segment without its own beta */
  wacc: number;
  enterpriseValue: number;
  netDebt: number;
  totalRevenue: number;
  terminalMethod: TerminalMethod;
  projectionYears: number;
  segments: readonly SegmentValuation[];
  /** Sorted by share, largest first */
  contributions: readonly SegmentContribution[];
  consolidatedForecasts: readonly ConsolidatedForecast[];
}

export type MultiProductResult = ValuationResult<MultiProductDetails>;
