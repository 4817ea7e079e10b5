/**
 * Sensitivity Engine — Two-Way Sensitivity
 *
 * Grid of DCF values over two parameters: values[row][column]. The async
 * variant computes one row at a time with an event-loop yield before each;
 * both variants produce the same matrix.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { ValuationError, isValuationError } from "@/lib/valuationModel/errors";
import type { Company } from "@/lib/valuationModel/types";
import { computeDcf, resolveDcfOptions, validateOverrides } from "@/lib/dcfEngine";
import type { DcfOverrides, ResolvedDcfOptions } from "@/lib/dcfEngine";
import { baseParameterValue, buildSweep } from "./sweep";
import type { SensitivityParameter, TwoWayOptions, TwoWaySensitivity } from "./types";

interface GridPlan {
  company: Company;
  rowParameter: SensitivityParameter;
  columnParameter: SensitivityParameter;
  rowValues: number[];
  columnValues: number[];
  dcf: ResolvedDcfOptions;
}

function planGrid(
  company: Company,
  rowParameter: SensitivityParameter,
  columnParameter: SensitivityParameter,
  options: TwoWayOptions,
): GridPlan {
  if (rowParameter === columnParameter) {
    throw new ValuationError("INVALID_INPUT", "Two-way sensitivity needs two distinct parameters", {
      parameter: "columnParameter",
    });
  }
  return {
    company,
    rowParameter,
    columnParameter,
    rowValues: buildSweep(baseParameterValue(company, rowParameter), options.row),
    columnValues: buildSweep(baseParameterValue(company, columnParameter), options.column),
    dcf: resolveDcfOptions(options.dcf),
  };
}

function evaluateCell(plan: GridPlan, rowValue: number, columnValue: number): number | null {
  const patch: DcfOverrides = {};
  patch[plan.rowParameter] = rowValue;
  patch[plan.columnParameter] = columnValue;
  try {
    return computeDcf(plan.company, validateOverrides(patch), plan.dcf).value;
  } catch (e) {
    if (isValuationError(e)) return null;
    throw e;
  }
}

function computeRow(plan: GridPlan, rowIndex: number): (number | null)[] {
  const rowValue = plan.rowValues[rowIndex];
  return plan.columnValues.map((c) => evaluateCell(plan, rowValue, c));
}

function assemble(plan: GridPlan, values: (number | null)[][]): TwoWaySensitivity {
  let minValue: number | null = null;
  let maxValue: number | null = null;
  for (const row of values) {
    for (const v of row) {
      if (v === null) continue;
      if (minValue === null || v < minValue) minValue = v;
      if (maxValue === null || v > maxValue) maxValue = v;
    }
  }
  return {
    rowParameter: plan.rowParameter,
    columnParameter: plan.columnParameter,
    rowValues: plan.rowValues,
    columnValues: plan.columnValues,
    values,
    minValue,
    maxValue,
  };
}

export function twoWaySensitivity(
  company: Company,
  rowParameter: SensitivityParameter,
  columnParameter: SensitivityParameter,
  options: TwoWayOptions = {},
): TwoWaySensitivity {
  const plan = planGrid(company, rowParameter, columnParameter, options);
  return assemble(
    plan,
    plan.rowValues.map((_, i) => computeRow(plan, i)),
  );
}

export async function twoWaySensitivityAsync(
  company: Company,
  rowParameter: SensitivityParameter,
  columnParameter: SensitivityParameter,
  options: TwoWayOptions = {},
): Promise<TwoWaySensitivity> {
  const plan = planGrid(company, rowParameter, columnParameter, options);
  const values: (number | null)[][] = [];
  for (let i = 0; i < plan.rowValues.length; i++) {
    await yieldToEventLoop();
    values.push(computeRow(plan, i));
  }
  return assemble(plan, values);
}
