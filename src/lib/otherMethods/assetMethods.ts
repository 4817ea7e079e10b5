/**
 * Other Methods — Asset-Based Valuation
 *
 * Cost method and adjusted net asset method. Both start from book net
 * assets, so a company without them cannot be valued this way.
 */

import { z } from "zod";
import { ValuationError } from "@/lib/valuationModel/errors";
import { createValuationResult } from "@/lib/valuationModel/results";
import type { Company } from "@/lib/valuationModel/types";
import type {
  AdjustedNetAssetResult,
  CostMethodOptions,
  CostMethodResult,
  NetAssetAdjustments,
} from "./types";
import { parseMethodInput } from "./validation";

const nonNegative = z.number().finite().min(0);

const CostMethodOptionsSchema = z
  .object({
    intangibleAssetValue: nonNegative.default(0),
    goodwillValue: nonNegative.default(0),
    adjustmentFactor: z.number().finite().positive().default(1),
  })
  .strict();

const AdjustmentsSchema = z
  .object({
    assets: z.record(z.number().finite()).default({}),
    liabilities: z.record(z.number().finite()).default({}),
  })
  .strict();

function requireNetAssets(company: Company, method: string): number {
  if (!(company.netAssets > 0)) {
    throw new ValuationError("MISSING_DATA", `${method} requires positive net assets`, {
      parameter: "netAssets",
    });
  }
  return company.netAssets;
}

function total(items: Readonly<Record<string, number>>): number {
  return Object.values(items).reduce((sum, v) => sum + v, 0);
}

/**
 *   adjustedNetAssets = netAssets + intangibleAssetValue + goodwillValue
 *   value             = adjustedNetAssets * adjustmentFactor
 */
export function costMethod(company: Company, options: CostMethodOptions = {}): CostMethodResult {
  const o = parseMethodInput(CostMethodOptionsSchema, options, "cost method options");
  const netAssets = requireNetAssets(company, "Cost method");

  const adjustedNetAssets = netAssets + o.intangibleAssetValue + o.goodwillValue;
  const value = adjustedNetAssets * o.adjustmentFactor;

  return createValuationResult({
    method: "COST",
    value,
    details: {
      netAssets,
      intangibleAssetValue: o.intangibleAssetValue,
      goodwillValue: o.goodwillValue,
      adjustedNetAssets,
      adjustmentFactor: o.adjustmentFactor,
      priceToBook: value / netAssets,
    },
    assumptions: { adjustmentFactor: o.adjustmentFactor },
  });
}

/** Net assets restated at fair value: netAssets + sum(assets) - sum(liabilities). */
export function adjustedNetAssetMethod(
  company: Company,
  adjustments: NetAssetAdjustments = {},
): AdjustedNetAssetResult {
  const a = parseMethodInput(AdjustmentsSchema, adjustments, "net asset adjustments");
  const originalNetAssets = requireNetAssets(company, "Adjusted net asset method");

  const totalAssetAdjustment = total(a.assets);
  const totalLiabilityAdjustment = total(a.liabilities);
  const adjustedNetAssets = originalNetAssets + totalAssetAdjustment - totalLiabilityAdjustment;

  return createValuationResult({
    method: "ADJUSTED_NET_ASSETS",
    value: adjustedNetAssets,
    details: {
      originalNetAssets,
      assetAdjustments: Object.freeze({ ...a.assets }),
      liabilityAdjustments: Object.freeze({ ...a.liabilities }),
      totalAssetAdjustment,
      totalLiabilityAdjustment,
      adjustedNetAssets,
    },
    assumptions: {},
  });
}
