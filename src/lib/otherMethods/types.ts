/**
 * Other Methods — Types
 */

import type { ValuationResult } from "@/lib/valuationModel/types";

export interface VcOptions {
  projectionYears?: number;
  /** P/E applied to exit-year net income */
  targetPe?: number;
  /** Money multiple the investor requires over the holding period */
  targetReturnMultiple?: number;
  /** Annual uplift on net income from margin expansion (0.02 = 2%/yr) */
  marginImprovement?: number;
}

export interface VcDetails {
  exitNetIncome: number;
  exitValue: number;
  targetPe: number;
  targetReturnMultiple: number;
  projectionYears: number;
  /** targetReturnMultiple^(1/n) - 1 */
  impliedIrr: number;
}

export type VcResult = ValuationResult<VcDetails>;

// ---------------------------------------------------------------------------
// VC method (exit backsolve)
// ---------------------------------------------------------------------------

export type VcExitMethod = "PE" | "PS";

export interface VcExitOptions {
  /** Expected equity value at exit; used unless a multiple can derive one */
  exitValuation?: number;
  targetReturnMultiple?: number;
  investmentYears?: number;
  /** Exit metric the multiple applies to. Default "PE". */
  exitMethod?: VcExitMethod;
  /** Applied to net income (PE) or revenue (PS) grown at growthRate to the exit year */
  exitMultiple?: number;
}

export interface VcExitDetails {
  exitValuation: number;
  /** "multiple" when derived from exitMultiple, else "supplied" */
  exitSource: "multiple" | "supplied";
  exitMethod: VcExitMethod;
  exitMultiple: number | null;
  targetReturnMultiple: number;
  investmentYears: number;
  impliedIrr: number;
}

export type VcExitResult = ValuationResult<VcExitDetails>;

// ---------------------------------------------------------------------------
// Asset-based methods
// ---------------------------------------------------------------------------

export interface CostMethodOptions {
  intangibleAssetValue?: number;
  goodwillValue?: number;
  /** Multiplies the adjusted net assets. Default 1. */
  adjustmentFactor?: number;
}

export interface CostMethodDetails {
  netAssets: number;
  intangibleAssetValue: number;
  goodwillValue: number;
  adjustedNetAssets: number;
  adjustmentFactor: number;
  priceToBook: number;
}

export type CostMethodResult = ValuationResult<CostMethodDetails>;

export interface NetAssetAdjustments {
  /** Fair-value adjustments to assets by item; negative for a write-down */
  assets?: Record<string, number>;
  /** Adjustments to liabilities by item; positive adds a liability */
  liabilities?: Record<string, number>;
}

export interface AdjustedNetAssetDetails {
  originalNetAssets: number;
  assetAdjustments: Readonly<Record<string, number>>;
  liabilityAdjustments: Readonly<Record<string, number>>;
  totalAssetAdjustment: number;
  totalLiabilityAdjustment: number;
  adjustedNetAssets: number;
}

export type AdjustedNetAssetResult = ValuationResult<AdjustedNetAssetDetails>;

// ---------------------------------------------------------------------------
// Precedent transactions
// ---------------------------------------------------------------------------

export interface PrecedentTransaction {
  companyName: string;
  dealValue?: number | null;
  metricValue?: number | null;
  /** Deal value / metric; entries without a positive multiple are ignored */
  multiple?: number | null;
  dealDate?: string;
  stage?: string;
}

export interface TransactionComparableDetails {
  transactionCount: number;
  multiplesUsed: number;
  meanMultiple: number;
  medianMultiple: number;
  minMultiple: number;
  maxMultiple: number;
  metricUsed: "netIncome" | "revenue";
  metricValue: number;
}

export type TransactionComparableResult = ValuationResult<TransactionComparableDetails>;

// ---------------------------------------------------------------------------
// First Chicago
// ---------------------------------------------------------------------------

export interface FirstChicagoOptions {
  successValue: number;
  failureValue: number;
  /** [0, 1]. Default 0.3. */
  probabilityOfSuccess?: number;
}

export interface FirstChicagoDetails {
  successValue: number;
  failureValue: number;
  probabilityOfSuccess: number;
}

export type FirstChicagoResult = ValuationResult<FirstChicagoDetails>;

// ---------------------------------------------------------------------------
// Sum of the parts
// ---------------------------------------------------------------------------

export interface BusinessUnit {
  name: string;
  /** Direct valuation; takes precedence over revenue * multiple */
  value?: number | null;
  revenue?: number | null;
  multiple?: number | null;
}

export interface SumOfPartsOptions {
  /** Fraction of the parts total deducted for corporate costs. Default 0.1. */
  corporateDiscountRate?: number;
}

export interface ValuedBusinessUnit {
  name: string;
  value: number;
  basis: "direct" | "multiple";
  revenue: number | null;
  multiple: number | null;
}

export interface SumOfPartsDetails {
  partsValue: number;
  corporateDiscount: number;
  corporateDiscountRate: number;
  units: readonly ValuedBusinessUnit[];
  /** Units with neither a value nor revenue and multiple */
  skipped: readonly string[];
}

export type SumOfPartsResult = ValuationResult<SumOfPartsDetails>;
