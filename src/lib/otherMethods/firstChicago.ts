/**
 * Other Methods — First Chicago Method
 *
 * Probability-weighted value of a success and a failure outcome, for
 * early-stage companies whose path is binary.
 */

import { z } from "zod";
import { createValuationResult } from "@/lib/valuationModel/results";
import type { FirstChicagoOptions, FirstChicagoResult } from "./types";
import { parseMethodInput } from "./validation";

export const DEFAULT_PROBABILITY_OF_SUCCESS = 0.3;

const FirstChicagoSchema = z
  .object({
    successValue: z.number().finite().min(0),
    failureValue: z.number().finite().min(0),
    probabilityOfSuccess: z.number().finite().min(0).max(1).default(DEFAULT_PROBABILITY_OF_SUCCESS),
  })
  .strict();

/** value = success * p + failure * (1 - p) */
export function firstChicagoMethod(options: FirstChicagoOptions): FirstChicagoResult {
  const o = parseMethodInput(FirstChicagoSchema, options, "First Chicago scenarios");
  const p = o.probabilityOfSuccess;

  return createValuationResult({
    method: "FIRST_CHICAGO",
    value: o.successValue * p + o.failureValue * (1 - p),
    valueLow: Math.min(o.successValue, o.failureValue),
    valueHigh: Math.max(o.successValue, o.failureValue),
    details: {
      successValue: o.successValue,
      failureValue: o.failureValue,
      probabilityOfSuccess: p,
    },
    assumptions: { probabilityOfSuccess: p },
  });
}
