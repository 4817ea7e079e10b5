/**
 * Sensitivity Engine — Multiple Sensitivity
 *
 * Sweeps the aggregate (median) comparable multiple of one relative
 * valuation method and reports the implied equity value at each step.
 */

import { ValuationError } from "@/lib/valuationModel/errors";
import type { Comparable, Company } from "@/lib/valuationModel/types";
import { linspace } from "@/lib/statistics";
import { multipleValuation, valueFromMultiple } from "@/lib/relativeValuation";
import type { MultipleMethod } from "@/lib/relativeValuation/types";
import {
  DEFAULT_SENSITIVITY_STEPS,
  DEFAULT_SPREAD_PCT,
  type MultipleSensitivity,
  type MultipleSensitivityOptions,
} from "./types";

/**
 * Throws UNSUPPORTED_METHOD / MISSING_DATA when the method cannot run
 * against these comparables.
 */
export function multipleSensitivity(
  company: Company,
  comparables: readonly Comparable[],
  method: MultipleMethod,
  options: MultipleSensitivityOptions = {},
): MultipleSensitivity {
  const { steps = DEFAULT_SENSITIVITY_STEPS, spreadPct = DEFAULT_SPREAD_PCT, ...relative } = options;

  if (!Number.isInteger(steps) || steps < 2) {
    throw new ValuationError("INVALID_INPUT", `steps must be an integer >= 2, got ${steps}`, {
      parameter: "steps",
    });
  }
  if (!Number.isFinite(spreadPct) || spreadPct <= 0 || spreadPct >= 1) {
    throw new ValuationError("INVALID_INPUT", `spreadPct must be in (0, 1), got ${spreadPct}`, {
      parameter: "spreadPct",
    });
  }

  const base = multipleValuation(company, comparables, method, relative);
  const baseMultiple = base.details.statistics.median;

  const points = linspace(baseMultiple * (1 - spreadPct), baseMultiple * (1 + spreadPct), steps).map(
    (multiple) => ({ multiple, value: valueFromMultiple(company, method, multiple, relative) }),
  );

  const values = points.map((p) => p.value);
  return {
    method,
    baseMultiple,
    baseValue: base.value,
    points,
    valuationRange: Math.max(...values) - Math.min(...values),
  };
}
