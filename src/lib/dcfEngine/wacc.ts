/**
 * DCF Engine - Cost of Capital
 */

import type { Company } from "@/lib/valuationModel/types";
import type { WaccBreakdown } from "./types";

/**
 * CAPM cost of equity and after-tax cost of debt, weighted by the target
 * capital structure:
 *
 *   ke   = rf + beta * MRP
 *   kd'  = kd * (1 - t)
 *   wacc = ke * (1 - D) + kd' * D
 *
 * Pure function — deterministic, no side effects.
 */
export function calculateWaccBreakdown(
  company: Pick<
    Company,
    "beta" | "riskFreeRate" | "marketRiskPremium" | "costOfDebt" | "targetDebtRatio" | "taxRate"
  >,
): WaccBreakdown {
  const costOfEquity = company.riskFreeRate + company.beta * company.marketRiskPremium;
  const afterTaxCostOfDebt = company.costOfDebt * (1 - company.taxRate);
  const debtWeight = company.targetDebtRatio;
  const equityWeight = 1 - debtWeight;

  return {
    wacc: costOfEquity * equityWeight + afterTaxCostOfDebt * debtWeight,
    costOfEquity,
    afterTaxCostOfDebt,
    equityWeight,
    debtWeight,
  };
}

export function calculateWacc(
  company: Parameters<typeof calculateWaccBreakdown>[0],
): number {
  return calculateWaccBreakdown(company).wacc;
}
