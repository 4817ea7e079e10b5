/**
 * Other Methods — Sum of the Parts
 *
 * Values each business unit directly or at revenue * multiple, then
 * deducts a corporate-cost discount from the total.
 */

import { z } from "zod";
import { ValuationError } from "@/lib/valuationModel/errors";
import { createValuationResult } from "@/lib/valuationModel/results";
import type {
  BusinessUnit,
  SumOfPartsDetails,
  SumOfPartsOptions,
  SumOfPartsResult,
  ValuedBusinessUnit,
} from "./types";
import { parseMethodInput } from "./validation";

export const DEFAULT_CORPORATE_DISCOUNT_RATE = 0.1;

const optionalAmount = z.number().finite().min(0).nullish();

const BusinessUnitsSchema = z.array(
  z.object({
    name: z.string().trim().min(1),
    value: optionalAmount,
    revenue: optionalAmount,
    multiple: optionalAmount,
  }),
);

const SumOfPartsOptionsSchema = z
  .object({
    corporateDiscountRate: z
      .number()
      .finite()
      .min(0)
      .lt(1)
      .default(DEFAULT_CORPORATE_DISCOUNT_RATE),
  })
  .strict();

type ParsedUnit = z.output<typeof BusinessUnitsSchema>[number];

function valueUnit(unit: ParsedUnit): ValuedBusinessUnit | null {
  const revenue = unit.revenue ?? null;
  const multiple = unit.multiple ?? null;
  if (unit.value) {
    return { name: unit.name, value: unit.value, basis: "direct", revenue, multiple };
  }
  if (revenue && multiple) {
    return { name: unit.name, value: revenue * multiple, basis: "multiple", revenue, multiple };
  }
  return null;
}

/**
 *   partsValue = sum(unit values)
 *   value      = partsValue * (1 - corporateDiscountRate)
 *
 * A unit with a non-zero `value` uses it; otherwise it needs both revenue
 * and multiple, or it is skipped. MISSING_DATA when no unit can be valued.
 */
export function sumOfPartsValuation(
  units: readonly BusinessUnit[],
  options: SumOfPartsOptions = {},
): SumOfPartsResult {
  const parsed = parseMethodInput(BusinessUnitsSchema, units, "business units");
  const o = parseMethodInput(SumOfPartsOptionsSchema, options, "sum-of-parts options");

  const valued: ValuedBusinessUnit[] = [];
  const skipped: string[] = [];
  for (const unit of parsed) {
    const v = valueUnit(unit);
    if (v) valued.push(Object.freeze(v));
    else skipped.push(unit.name);
  }

  if (valued.length === 0) {
    throw new ValuationError("MISSING_DATA", "No business unit has a value or revenue and multiple", {
      parameter: "units",
    });
  }

  const partsValue = valued.reduce((sum, u) => sum + u.value, 0);
  const corporateDiscount = partsValue * o.corporateDiscountRate;

  const details: SumOfPartsDetails = {
    partsValue,
    corporateDiscount,
    corporateDiscountRate: o.corporateDiscountRate,
    units: valued,
    skipped,
  };

  return createValuationResult({
    method: "SUM_OF_PARTS",
    value: partsValue - corporateDiscount,
    details,
    assumptions: { corporateDiscountRate: o.corporateDiscountRate },
  });
}
