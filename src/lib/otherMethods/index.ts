/**
 * Other Methods — Public API
 *
 * Valuation methods outside the relative/DCF core: venture capital,
 * asset-based, precedent transactions, First Chicago and sum of the parts.
 */

// Re-export types
export type {
  VcOptions,
  VcDetails,
  VcResult,
  VcExitMethod,
  VcExitOptions,
  VcExitDetails,
  VcExitResult,
  CostMethodOptions,
  CostMethodDetails,
  CostMethodResult,
  NetAssetAdjustments,
  AdjustedNetAssetDetails,
  AdjustedNetAssetResult,
  PrecedentTransaction,
  TransactionComparableDetails,
  TransactionComparableResult,
  FirstChicagoOptions,
  FirstChicagoDetails,
  FirstChicagoResult,
  BusinessUnit,
  SumOfPartsOptions,
  ValuedBusinessUnit,
  SumOfPartsDetails,
  SumOfPartsResult,
} from "./types";

// Re-export sub-modules
export { VC_DEFAULTS, VC_EXIT_DEFAULTS, vcMethod, vcMethodWithProjection } from "./vcMethod";
export { costMethod, adjustedNetAssetMethod } from "./assetMethods";
export { transactionComparable } from "./transactionComparable";
export { DEFAULT_PROBABILITY_OF_SUCCESS, firstChicagoMethod } from "./firstChicago";
export { DEFAULT_CORPORATE_DISCOUNT_RATE, sumOfPartsValuation } from "./sumOfParts";
export { STAGE_METHODS, analyzeStageAppropriateValuation } from "./stageMethods";
