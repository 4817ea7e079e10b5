/**
 * Sensitivity Engine — One-Way Sensitivity
 */

import type { Company } from "@/lib/valuationModel/types";
import { dcfSensitivityAnalysis, dcfValuation } from "@/lib/dcfEngine";
import type {
  OneWayOptions,
  OneWaySensitivity,
  SensitivityParameter,
  SensitivityPoint,
} from "./types";
import { baseParameterValue, buildSweep } from "./sweep";

function elasticity(
  valid: readonly { parameterValue: number; value: number }[],
  baseValue: number,
  baseParam: number,
): number | null {
  if (valid.length < 2 || baseValue === 0 || baseParam === 0) return null;
  const first = valid[0];
  const last = valid[valid.length - 1];
  const paramChange = (last.parameterValue - first.parameterValue) / baseParam;
  if (paramChange === 0) return null;
  return (last.value - first.value) / baseValue / paramChange;
}

/**
 * Sweep one parameter through the DCF kernel, holding the others at base.
 * Degenerate points are recorded as null and excluded from the range.
 *
 * Pure function — deterministic, no side effects.
 */
export function oneWaySensitivity(
  company: Company,
  parameter: SensitivityParameter,
  options: OneWayOptions = {},
): OneWaySensitivity {
  const baseValue = dcfValuation(company, {}, options.dcf).value;
  const baseParam = baseParameterValue(company, parameter);
  const sweep = buildSweep(baseParam, options);

  const points: SensitivityPoint[] = dcfSensitivityAnalysis(
    company,
    parameter,
    sweep,
    options.dcf,
  ).points;

  const valid: { parameterValue: number; value: number }[] = [];
  for (const p of points) {
    if (p.value !== null) valid.push({ parameterValue: p.parameterValue, value: p.value });
  }

  let minValue: number | null = null;
  let maxValue: number | null = null;
  for (const p of valid) {
    if (minValue === null || p.value < minValue) minValue = p.value;
    if (maxValue === null || p.value > maxValue) maxValue = p.value;
  }

  const valuationRange = minValue !== null && maxValue !== null ? maxValue - minValue : null;

  return {
    parameter,
    baseParameterValue: baseParam,
    baseValue,
    points,
    minValue,
    maxValue,
    valuationRange,
    impactPercentage:
      valuationRange !== null && baseValue !== 0 ? valuationRange / baseValue : null,
    elasticity: elasticity(valid, baseValue, baseParam),
  };
}
