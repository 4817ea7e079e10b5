/**
 * Sensitivity Engine — Tornado & Comprehensive Analysis
 */

import type { Company } from "@/lib/valuationModel/types";
import { dcfValuation } from "@/lib/dcfEngine";
import { oneWaySensitivity } from "./oneWay";
import {
  SENSITIVITY_PARAMETERS,
  type ComprehensiveSensitivity,
  type OneWayOptions,
  type OneWaySensitivity,
  type ParameterImpact,
  type SensitivityParameter,
  type TornadoEntry,
} from "./types";

type SharedSweepOptions = Pick<OneWayOptions, "steps" | "spreadPct" | "dcf">;

function toTornadoEntry(s: OneWaySensitivity): TornadoEntry {
  const first = s.points[0];
  const last = s.points[s.points.length - 1];
  return {
    parameter: s.parameter,
    baseParameterValue: s.baseParameterValue,
    lowParameterValue: first.parameterValue,
    highParameterValue: last.parameterValue,
    lowValue: first.value,
    highValue: last.value,
    valuationRange: s.valuationRange,
    impactPercentage: s.impactPercentage,
  };
}

function compareRange(a: TornadoEntry, b: TornadoEntry): number {
  if (a.valuationRange === null && b.valuationRange === null) return 0;
  if (a.valuationRange === null) return 1;
  if (b.valuationRange === null) return -1;
  return b.valuationRange - a.valuationRange;
}

/** Descending valuationRange; null ranges sink to the end. Stable. */
function rankByRange(entries: readonly TornadoEntry[]): TornadoEntry[] {
  return [...entries].sort(compareRange);
}

function sweepAll(
  company: Company,
  options: SharedSweepOptions,
): Record<SensitivityParameter, OneWaySensitivity> {
  const shared: OneWayOptions = {
    steps: options.steps,
    spreadPct: options.spreadPct,
    dcf: options.dcf,
  };
  return {
    growthRate: oneWaySensitivity(company, "growthRate", shared),
    operatingMargin: oneWaySensitivity(company, "operatingMargin", shared),
    wacc: oneWaySensitivity(company, "wacc", shared),
    terminalGrowthRate: oneWaySensitivity(company, "terminalGrowthRate", shared),
  };
}

function tornadoFrom(sweeps: Record<SensitivityParameter, OneWaySensitivity>): TornadoEntry[] {
  return rankByRange(SENSITIVITY_PARAMETERS.map((p) => toTornadoEntry(sweeps[p])));
}

function impactOf(s: OneWaySensitivity): ParameterImpact {
  return {
    valuationRange: s.valuationRange,
    baseValue: s.baseValue,
    impactPercentage: s.impactPercentage,
  };
}

/**
 * One-way sensitivity for growth, margin, WACC and terminal growth,
 * ranked by descending valuation range. Ties keep declaration order.
 */
export function tornadoChartData(
  company: Company,
  options: SharedSweepOptions = {},
): TornadoEntry[] {
  return tornadoFrom(sweepAll(company, options));
}

/** Per-parameter impact plus the tornado ranking, from a single set of sweeps. */
export function comprehensiveSensitivity(
  company: Company,
  options: SharedSweepOptions = {},
): ComprehensiveSensitivity {
  const baseValue = dcfValuation(company, {}, options.dcf).value;
  const sweeps = sweepAll(company, options);

  return {
    baseValue,
    parameters: {
      growthRate: impactOf(sweeps.growthRate),
      operatingMargin: impactOf(sweeps.operatingMargin),
      wacc: impactOf(sweeps.wacc),
      terminalGrowthRate: impactOf(sweeps.terminalGrowthRate),
    },
    tornado: tornadoFrom(sweeps),
  };
}
