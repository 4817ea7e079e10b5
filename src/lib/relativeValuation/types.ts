/**
 * Relative Valuation - Types
 */

import type { ValuationResult } from "@/lib/valuationModel/types";

export type MultipleMethod = "PE" | "PS" | "PB" | "EV_EBITDA";

export const MULTIPLE_METHODS: readonly MultipleMethod[] = ["PE", "PS", "PB", "EV_EBITDA"];

export interface RelativeValuationOptions {
  /** P/E and P/S only: metric * (1 + growthRate) */
  useForwardMetrics?: boolean;
  /** Fractional discount for a non-traded stake, e.g. 0.2 */
  illiquidityDiscount?: number;
  /** Fractional premium for a controlling stake, e.g. 0.1 */
  controlPremium?: number;
}

export interface MultipleStatistics {
  count: number;
  mean: number;
  median: number;
  std: number;
  min: number;
  max: number;
}

export interface MultipleDetails {
  multiple: MultipleMethod;
  /** Company metric the multiple is applied to */
  metric: number;
  metricLabel: string;
  isForward: boolean;
  statistics: MultipleStatistics;
  /** 1 - illiquidityDiscount + controlPremium */
  adjustmentFactor: number;
  /** EV/EBITDA only */
  enterpriseValue?: number;
  /** EV/EBITDA only: totalDebt - cash */
  netDebt?: number;
}

export type MultipleResult = ValuationResult<MultipleDetails>;

export type RelativeValuationMap = Partial<Record<MultipleMethod, MultipleResult>>;

export type CompositeWeights = Record<MultipleMethod, number>;

export const DEFAULT_COMPOSITE_WEIGHTS: Readonly<CompositeWeights> = {
  PE: 0.3,
  PS: 0.3,
  PB: 0.2,
  EV_EBITDA: 0.2,
};

export interface CompositeDetails {
  methodsUsed: MultipleMethod[];
  /** Weights after normalising over the methods actually available */
  normalizedWeights: Partial<Record<MultipleMethod, number>>;
}

export type CompositeResult = ValuationResult<CompositeDetails>;

export type CoverageReason = "NON_POSITIVE_METRIC" | "NO_VALID_MULTIPLES";

export interface MethodCoverage {
  method: MultipleMethod;
  usable: boolean;
  validMultiples: number;
  reason?: CoverageReason;
}
