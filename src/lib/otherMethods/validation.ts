/**
 * Other Methods — Input Validation
 */

import type { z } from "zod";
import { ValuationError } from "@/lib/valuationModel/errors";

/** safeParse `input`, throwing INVALID_INPUT named after the first failing path. */
export function parseMethodInput<TOut, TIn>(
  schema: z.ZodType<TOut, z.ZodTypeDef, TIn>,
  input: unknown,
  label: string,
): TOut {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ValuationError("INVALID_INPUT", `Invalid ${label}: ${first?.message ?? "unknown"}`, {
      parameter: first && first.path.length > 0 ? first.path.join(".") : label,
      issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }
  return parsed.data;
}
