/**
 * Sensitivity Engine — Types
 */

import type { DcfOptions } from "@/lib/dcfEngine/types";
import type { MultipleMethod, RelativeValuationOptions } from "@/lib/relativeValuation/types";

export type SensitivityParameter = "growthRate" | "operatingMargin" | "wacc" | "terminalGrowthRate";

/** Declaration order; tornado ties keep this order. */
export const SENSITIVITY_PARAMETERS: readonly SensitivityParameter[] = [
  "growthRate",
  "operatingMargin",
  "wacc",
  "terminalGrowthRate",
];

export const DEFAULT_SENSITIVITY_STEPS = 11;
export const DEFAULT_SPREAD_PCT = 0.2;
/** Absolute half-width of the sweep when the base parameter value is 0 */
export const ZERO_BASE_HALF_WIDTH = 0.01;

export interface SweepOptions {
  /** Explicit [min, max]; swept in `steps` evenly spaced points */
  range?: readonly [number, number];
  /** Explicit parameter values; take precedence over range */
  points?: readonly number[];
  steps?: number;
  /** Default sweep is base * (1 ± spreadPct) */
  spreadPct?: number;
}

export interface OneWayOptions extends SweepOptions {
  dcf?: DcfOptions;
}

export interface SensitivityPoint {
  parameterValue: number;
  /** null when the model is degenerate at this value */
  value: number | null;
}

export interface OneWaySensitivity {
  parameter: SensitivityParameter;
  baseParameterValue: number;
  /** Unperturbed DCF equity value */
  baseValue: number;
  points: SensitivityPoint[];
  minValue: number | null;
  maxValue: number | null;
  /** maxValue - minValue over valid points */
  valuationRange: number | null;
  /** valuationRange / baseValue */
  impactPercentage: number | null;
  /** (%change in value) / (%change in parameter) between the outermost valid points */
  elasticity: number | null;
}

export interface TwoWayOptions {
  row?: SweepOptions;
  column?: SweepOptions;
  dcf?: DcfOptions;
}

export interface TwoWaySensitivity {
  rowParameter: SensitivityParameter;
  columnParameter: SensitivityParameter;
  rowValues: number[];
  columnValues: number[];
  /** values[row][column]; null for degenerate cells */
  values: (number | null)[][];
  minValue: number | null;
  maxValue: number | null;
}

export interface TornadoEntry {
  parameter: SensitivityParameter;
  baseParameterValue: number;
  lowParameterValue: number;
  highParameterValue: number;
  lowValue: number | null;
  highValue: number | null;
  valuationRange: number | null;
  impactPercentage: number | null;
}

export interface ParameterImpact {
  valuationRange: number | null;
  baseValue: number;
  impactPercentage: number | null;
}

export interface ComprehensiveSensitivity {
  baseValue: number;
  parameters: Record<SensitivityParameter, ParameterImpact>;
  tornado: TornadoEntry[];
}

export interface MultipleSensitivityOptions extends RelativeValuationOptions {
  steps?: number;
  spreadPct?: number;
}

export interface MultipleSensitivityPoint {
  multiple: number;
  value: number;
}

export interface MultipleSensitivity {
  method: MultipleMethod;
  /** Median comparable multiple */
  baseMultiple: number;
  baseValue: number;
  points: MultipleSensitivityPoint[];
  valuationRange: number;
}
