/**
 * Sensitivity Engine — Parameter Sweeps
 */

import { ValuationError } from "@/lib/valuationModel/errors";
import type { Company } from "@/lib/valuationModel/types";
import { linspace } from "@/lib/statistics";
import { calculateWacc } from "@/lib/dcfEngine";
import {
  DEFAULT_SENSITIVITY_STEPS,
  DEFAULT_SPREAD_PCT,
  ZERO_BASE_HALF_WIDTH,
  type SensitivityParameter,
  type SweepOptions,
} from "./types";

/** Unperturbed value of each sensitivity parameter for `company`. */
export function baseParameterValue(company: Company, parameter: SensitivityParameter): number {
  switch (parameter) {
    case "growthRate":
      return company.growthRate;
    case "operatingMargin":
      return company.operatingMargin;
    case "wacc":
      return calculateWacc(company);
    case "terminalGrowthRate":
      return company.terminalGrowthRate;
  }
}

/**
 * Parameter values to evaluate, in ascending order unless explicit points
 * were given.
 *
 * - points:  used as given
 * - range:   `steps` evenly spaced values over [min, max]
 * - default: base * (1 ± spreadPct), or base ± 0.01 when base is 0
 */
export function buildSweep(base: number, opts: SweepOptions = {}): number[] {
  if (opts.points) {
    if (opts.points.length === 0 || !opts.points.every(Number.isFinite)) {
      throw new ValuationError("INVALID_INPUT", "Sweep points must be a non-empty list of finite numbers", {
        parameter: "points",
      });
    }
    return [...opts.points];
  }

  const steps = opts.steps ?? DEFAULT_SENSITIVITY_STEPS;
  if (!Number.isInteger(steps) || steps < 2) {
    throw new ValuationError("INVALID_INPUT", `steps must be an integer >= 2, got ${steps}`, {
      parameter: "steps",
    });
  }

  if (opts.range) {
    const [min, max] = opts.range;
    if (!Number.isFinite(min) || !Number.isFinite(max) || min > max) {
      throw new ValuationError("INVALID_INPUT", `Invalid sweep range [${min}, ${max}]`, {
        parameter: "range",
      });
    }
    return linspace(min, max, steps);
  }

  const spreadPct = opts.spreadPct ?? DEFAULT_SPREAD_PCT;
  if (!Number.isFinite(spreadPct) || spreadPct <= 0) {
    throw new ValuationError("INVALID_INPUT", `spreadPct must be > 0, got ${spreadPct}`, {
      parameter: "spreadPct",
    });
  }

  if (base === 0) {
    return linspace(-ZERO_BASE_HALF_WIDTH, ZERO_BASE_HALF_WIDTH, steps);
  }
  const a = base * (1 - spreadPct);
  const b = base * (1 + spreadPct);
  return linspace(Math.min(a, b), Math.max(a, b), steps);
}
