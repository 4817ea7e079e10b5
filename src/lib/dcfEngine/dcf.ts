/**
 * DCF Engine - Valuation Kernel
 *
 * The single evaluator every scenario, stress, Monte Carlo and sensitivity
 * analysis calls. `dcfValuation` validates its arguments once; `computeDcf`
 * is the unchecked inner loop those analyses run thousands of times.
 */

import { z } from "zod";
import { ValuationError } from "@/lib/valuationModel/errors";
import { deriveCompany } from "@/lib/valuationModel/company";
import { createValuationResult } from "@/lib/valuationModel/results";
import type { Company } from "@/lib/valuationModel/types";
import {
  DEFAULT_EXIT_MULTIPLE,
  DEFAULT_PROJECTION_YEARS,
  type DcfOptions,
  type DcfOverrides,
  type DcfResult,
  type TerminalMethod,
} from "./types";
import { calculateWaccBreakdown } from "./wacc";
import { assertProjectionYears, forecastFreeCashFlows } from "./forecast";
import { assertDiscountRate, assertWaccSpread, calculateTerminalValue } from "./terminalValue";

export interface ResolvedDcfOptions {
  projectionYears: number;
  terminalMethod: TerminalMethod;
  exitMultiple: number;
}

const finite = z.number().finite();

export const DcfOverridesSchema = z
  .object({
    growthRate: finite.gt(-1).optional(),
    operatingMargin: finite.min(0).lt(1).optional(),
    revenue: finite.min(0).optional(),
    terminalGrowthRate: finite.gt(-1).optional(),
    taxRate: finite.min(0).lt(1).optional(),
    beta: finite.min(0).optional(),
    riskFreeRate: finite.optional(),
    marketRiskPremium: finite.optional(),
    costOfDebt: finite.min(0).optional(),
    targetDebtRatio: finite.min(0).max(1).optional(),
    wacc: finite.optional(),
    waccAdjustment: finite.optional(),
  })
  .strict();

export function resolveDcfOptions(options: DcfOptions = {}): ResolvedDcfOptions {
  const projectionYears = options.projectionYears ?? DEFAULT_PROJECTION_YEARS;
  assertProjectionYears(projectionYears);

  const exitMultiple = options.exitMultiple ?? DEFAULT_EXIT_MULTIPLE;
  if (!Number.isFinite(exitMultiple) || exitMultiple <= 0) {
    throw new ValuationError("INVALID_INPUT", `exitMultiple must be > 0, got ${exitMultiple}`, {
      parameter: "exitMultiple",
    });
  }

  return {
    projectionYears,
    terminalMethod: options.terminalMethod ?? "perpetuity",
    exitMultiple,
  };
}

export function validateOverrides(overrides: DcfOverrides): DcfOverrides {
  const parsed = DcfOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const path = first ? first.path.join(".") : "overrides";
    throw new ValuationError(
      "INVALID_INPUT",
      `Invalid override ${path}: ${first?.message ?? "unknown"}`,
      {
        parameter: path,
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      },
    );
  }
  return parsed.data;
}

function applyOverrides(company: Company, o: DcfOverrides): Company {
  return deriveCompany(company, {
    ...(o.growthRate !== undefined ? { growthRate: o.growthRate } : {}),
    ...(o.operatingMargin !== undefined ? { operatingMargin: o.operatingMargin } : {}),
    ...(o.revenue !== undefined ? { revenue: o.revenue } : {}),
    ...(o.terminalGrowthRate !== undefined ? { terminalGrowthRate: o.terminalGrowthRate } : {}),
    ...(o.taxRate !== undefined ? { taxRate: o.taxRate } : {}),
    ...(o.beta !== undefined ? { beta: o.beta } : {}),
    ...(o.riskFreeRate !== undefined ? { riskFreeRate: o.riskFreeRate } : {}),
    ...(o.marketRiskPremium !== undefined ? { marketRiskPremium: o.marketRiskPremium } : {}),
    ...(o.costOfDebt !== undefined ? { costOfDebt: o.costOfDebt } : {}),
    ...(o.targetDebtRatio !== undefined ? { targetDebtRatio: o.targetDebtRatio } : {}),
  });
}

/**
 * Unchecked DCF evaluation. Callers guarantee `company` came from
 * parseCompany and that overrides/options are already validated.
 *
 * Throws ValuationError("DEGENERATE_MODEL") when the result is not
 * finite, when WACC is at or below -1, or (perpetuity method only) when
 * WACC does not clear terminal growth.
 *
 * Pure function — deterministic, no side effects.
 */
export function computeDcf(
  company: Company,
  overrides: DcfOverrides,
  options: ResolvedDcfOptions,
): DcfResult {
  const subject = applyOverrides(company, overrides);

  const breakdown = overrides.wacc === undefined ? calculateWaccBreakdown(subject) : undefined;
  const wacc = (overrides.wacc ?? breakdown?.wacc ?? 0) + (overrides.waccAdjustment ?? 0);
  const g = subject.terminalGrowthRate;

  if (options.terminalMethod === "perpetuity") {
    assertWaccSpread(wacc, g);
  } else {
    assertDiscountRate(wacc);
  }

  const forecasts = forecastFreeCashFlows(subject, { projectionYears: options.projectionYears });

  let pvForecasts = 0;
  for (const f of forecasts) {
    pvForecasts += f.fcf / Math.pow(1 + wacc, f.year);
  }

  const finalFcf = forecasts[forecasts.length - 1].fcf;
  const terminalValue = calculateTerminalValue(
    finalFcf,
    wacc,
    g,
    options.terminalMethod,
    options.exitMultiple,
  );
  const pvTerminal = terminalValue / Math.pow(1 + wacc, options.projectionYears);
  const enterpriseValue = pvForecasts + pvTerminal;
  const netDebt = subject.totalDebt - subject.cashAndEquivalents;
  const equityValue = enterpriseValue - netDebt;

  if (!Number.isFinite(equityValue)) {
    throw new ValuationError("DEGENERATE_MODEL", "DCF produced a non-finite value", {
      parameter: "enterpriseValue",
    });
  }

  return createValuationResult({
    method: "DCF",
    value: equityValue,
    details: {
      wacc,
      costOfEquity: breakdown?.costOfEquity,
      afterTaxCostOfDebt: breakdown?.afterTaxCostOfDebt,
      pvForecasts,
      pvTerminal,
      terminalValue,
      enterpriseValue,
      netDebt,
      terminalMethod: options.terminalMethod,
      terminalGrowthRate: g,
      projectionYears: options.projectionYears,
      forecasts,
    },
    assumptions: {
      growthRate: subject.growthRate,
      operatingMargin: subject.operatingMargin,
      revenue: subject.revenue,
      taxRate: subject.taxRate,
      wacc,
      terminalGrowthRate: g,
      projectionYears: options.projectionYears,
      terminalMethod: options.terminalMethod,
    },
  });
}

/**
 * Discounted cash flow valuation of `company` with optional overrides.
 *
 *   EV     = sum(fcf_t / (1 + wacc)^t) + TV / (1 + wacc)^n
 *   equity = EV - totalDebt + cash
 */
export function dcfValuation(
  company: Company,
  overrides: DcfOverrides = {},
  options: DcfOptions = {},
): DcfResult {
  return computeDcf(company, validateOverrides(overrides), resolveDcfOptions(options));
}
