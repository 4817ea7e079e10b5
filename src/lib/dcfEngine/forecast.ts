/**
 * DCF Engine - Free Cash Flow Forecast
 */

import { ValuationError } from "@/lib/valuationModel/errors";
import type { Company } from "@/lib/valuationModel/types";
import { DEFAULT_PROJECTION_YEARS, type FcfForecast } from "./types";

export type ForecastInputs = Pick<
  Company,
  "revenue" | "growthRate" | "operatingMargin" | "taxRate" | "terminalGrowthRate" | "reinvestment"
>;

/**
 * Growth schedule fading linearly from `growthRate` (year 1) to
 * `terminalGrowthRate` (final year). A one-year horizon uses growthRate.
 */
export function growthSchedule(
  growthRate: number,
  terminalGrowthRate: number,
  projectionYears: number,
): number[] {
  if (projectionYears === 1) return [growthRate];
  const step = (terminalGrowthRate - growthRate) / (projectionYears - 1);
  return Array.from({ length: projectionYears }, (_, i) =>
    i === projectionYears - 1 ? terminalGrowthRate : growthRate + step * i,
  );
}

/**
 * Year-by-year growth taken from `growthPath`; years past its end grow at
 * `terminalGrowthRate`.
 */
export function explicitGrowthSchedule(
  growthPath: readonly number[],
  terminalGrowthRate: number,
  projectionYears: number,
): number[] {
  return Array.from({ length: projectionYears }, (_, i) =>
    i < growthPath.length ? growthPath[i] : terminalGrowthRate,
  );
}

export function assertProjectionYears(projectionYears: number): void {
  if (!Number.isInteger(projectionYears) || projectionYears < 1) {
    throw new ValuationError(
      "INVALID_INPUT",
      `projectionYears must be a positive integer, got ${projectionYears}`,
      { parameter: "projectionYears" },
    );
  }
}

/**
 * Project `projectionYears` years of free cash flow. Revenue compounds from
 * the base level; reinvestment lines are fractions of that year's revenue.
 * Growth fades from growthRate to terminalGrowthRate unless an explicit
 * `growthPath` is given.
 *
 *   fcf = revenue * margin * (1 - t) + depreciation - capex - workingCapitalChange
 *
 * Pure function — deterministic, no side effects.
 */
export function forecastFreeCashFlows(
  inputs: ForecastInputs,
  opts: { projectionYears?: number; growthPath?: readonly number[] } = {},
): readonly FcfForecast[] {
  const projectionYears = opts.projectionYears ?? DEFAULT_PROJECTION_YEARS;
  assertProjectionYears(projectionYears);

  const schedule = opts.growthPath
    ? explicitGrowthSchedule(opts.growthPath, inputs.terminalGrowthRate, projectionYears)
    : growthSchedule(inputs.growthRate, inputs.terminalGrowthRate, projectionYears);
  const { capexRatio, workingCapitalRatio, depreciationRatio } = inputs.reinvestment;

  const forecasts: FcfForecast[] = [];
  let revenue = inputs.revenue;

  for (let i = 0; i < projectionYears; i++) {
    const growthRate = schedule[i];
    revenue = revenue * (1 + growthRate);

    const operatingProfit = revenue * inputs.operatingMargin;
    const nopat = operatingProfit * (1 - inputs.taxRate);
    const depreciation = revenue * depreciationRatio;
    const capex = revenue * capexRatio;
    const workingCapitalChange = revenue * workingCapitalRatio;

    forecasts.push(
      Object.freeze({
        year: i + 1,
        revenue,
        operatingProfit,
        nopat,
        depreciation,
        capex,
        workingCapitalChange,
        fcf: nopat + depreciation - capex - workingCapitalChange,
        growthRate,
      }),
    );
  }

  return Object.freeze(forecasts);
}
