/**
 * Valuation Engine — Quick & Batch Valuation
 */

import pLimit from "p-limit";
import { parseCompany } from "@/lib/valuationModel/company";
import { ValuationError, toEngineResult, type EngineResult } from "@/lib/valuationModel/errors";
import type { CompanyInput } from "@/lib/valuationModel/schemas";
import type { Comparable, Company } from "@/lib/valuationModel/types";
import { dcfValuation } from "@/lib/dcfEngine";
import { multipleValuation } from "@/lib/relativeValuation";
import { vcMethodWithProjection } from "@/lib/otherMethods";
import { fullValuation } from "./fullValuation";
import type {
  AnyValuationResult,
  BatchEntry,
  BatchValuationOptions,
  QuickMethod,
} from "./types";

const DEFAULT_BATCH_CONCURRENCY = 2;

/**
 * Stage-based method choice:
 * - early:         P/S when loss-making with revenue, else VC
 * - growth:        P/S when loss-making, else DCF
 * - mature/listed: P/E when profitable, else DCF
 */
export function resolveQuickMethod(company: Company): Exclude<QuickMethod, "auto"> {
  switch (company.stage) {
    case "early":
      return company.revenue > 0 && company.netIncome <= 0 ? "PS" : "VC";
    case "growth":
      return company.netIncome <= 0 ? "PS" : "DCF";
    case "mature":
    case "listed":
      return company.netIncome > 0 ? "PE" : "DCF";
  }
}

/** Single-method valuation. Multiple methods need comparables. */
export function quickValuation(
  input: CompanyInput,
  method: QuickMethod = "auto",
  comparables?: readonly Comparable[],
): EngineResult<AnyValuationResult> {
  return toEngineResult<AnyValuationResult>(() => {
    const company = parseCompany(input);
    const chosen = method === "auto" ? resolveQuickMethod(company) : method;

    switch (chosen) {
      case "DCF":
        return dcfValuation(company);
      case "VC":
        return vcMethodWithProjection(company);
      default:
        if (!comparables || comparables.length === 0) {
          throw new ValuationError("MISSING_DATA", `${chosen} requires comparable companies`, {
            parameter: "comparables",
          });
        }
        return multipleValuation(company, comparables, chosen);
    }
  });
}

/**
 * Full valuation (without risk analysis) of each company against shared
 * comparables. One company's failure does not affect the others.
 */
export async function batchValuation(
  inputs: readonly CompanyInput[],
  options: BatchValuationOptions = {},
): Promise<BatchEntry[]> {
  const limiter = pLimit(options.concurrency ?? DEFAULT_BATCH_CONCURRENCY);

  const entries = await Promise.all(
    inputs.map((input) =>
      limiter(async (): Promise<BatchEntry> => ({
        company: input.name,
        result: await fullValuation(input, {
          comparables: options.comparables,
          config: options.config,
          enableRiskAnalysis: false,
        }),
      })),
    ),
  );

  console.info("[valuationEngine] batch complete", {
    companies: entries.length,
    failed: entries.filter((e) => !e.result.ok).length,
  });
  return entries;
}
