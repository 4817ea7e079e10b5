/**
 * DCF Engine - Terminal Value
 */

import { ValuationError } from "@/lib/valuationModel/errors";
import { DEFAULT_EXIT_MULTIPLE, MIN_WACC_SPREAD, type TerminalMethod } from "./types";

/** Throws DEGENERATE_MODEL unless wacc is a finite rate above -100%. */
export function assertDiscountRate(wacc: number): void {
  if (!Number.isFinite(wacc) || wacc <= -1) {
    throw new ValuationError("DEGENERATE_MODEL", `WACC must be finite and above -1, got ${wacc}`, {
      parameter: "wacc",
    });
  }
}

/** Throws DEGENERATE_MODEL when wacc does not clear terminal growth by MIN_WACC_SPREAD. */
export function assertWaccSpread(wacc: number, terminalGrowthRate: number): void {
  if (!Number.isFinite(wacc)) {
    throw new ValuationError("DEGENERATE_MODEL", `WACC is not finite (${wacc})`, {
      parameter: "wacc",
    });
  }
  if (wacc - terminalGrowthRate <= MIN_WACC_SPREAD) {
    throw new ValuationError(
      "DEGENERATE_MODEL",
      `WACC (${wacc.toFixed(4)}) must exceed terminal growth (${terminalGrowthRate.toFixed(4)}) by more than ${MIN_WACC_SPREAD}`,
      { parameter: "wacc" },
    );
  }
}

/**
 * Terminal value at the end of the forecast horizon.
 *
 * - perpetuity:   fcf * (1 + g) / (wacc - g)
 * - exitMultiple: fcf * multiple
 */
export function calculateTerminalValue(
  finalFcf: number,
  wacc: number,
  terminalGrowthRate: number,
  method: TerminalMethod = "perpetuity",
  exitMultiple: number = DEFAULT_EXIT_MULTIPLE,
): number {
  if (method === "exitMultiple") {
    return finalFcf * exitMultiple;
  }
  assertWaccSpread(wacc, terminalGrowthRate);
  return (finalFcf * (1 + terminalGrowthRate)) / (wacc - terminalGrowthRate);
}
