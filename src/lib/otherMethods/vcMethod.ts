/**
 * Other Methods — Venture Capital Method
 *
 * Backsolves today's value from a projected exit:
 *
 *   exitNetIncome = netIncome * (1 + g)^n * (1 + marginImprovement)^n
 *   exitValue     = exitNetIncome * targetPe
 *   value         = exitValue / targetReturnMultiple
 */

import { z } from "zod";
import { ValuationError } from "@/lib/valuationModel/errors";
import { createValuationResult } from "@/lib/valuationModel/results";
import type { Company } from "@/lib/valuationModel/types";
import type { VcExitDetails, VcExitOptions, VcExitResult, VcOptions, VcResult } from "./types";
import { parseMethodInput } from "./validation";

export const VC_DEFAULTS = {
  projectionYears: 5,
  targetPe: 20,
  targetReturnMultiple: 10,
  marginImprovement: 0,
} as const;

const VcOptionsSchema = z
  .object({
    projectionYears: z.number().int().min(1).default(VC_DEFAULTS.projectionYears),
    targetPe: z.number().finite().positive().default(VC_DEFAULTS.targetPe),
    targetReturnMultiple: z
      .number()
      .finite()
      .positive()
      .default(VC_DEFAULTS.targetReturnMultiple),
    marginImprovement: z.number().finite().min(0).default(VC_DEFAULTS.marginImprovement),
  })
  .strict();

/**
 * Throws UNSUPPORTED_METHOD for a company without positive net income:
 * a loss cannot be capitalised at a P/E.
 */
export function vcMethodWithProjection(company: Company, options: VcOptions = {}): VcResult {
  const o = parseMethodInput(VcOptionsSchema, options, "VC options");

  if (!(company.netIncome > 0)) {
    throw new ValuationError("UNSUPPORTED_METHOD", "VC method requires positive net income", {
      parameter: "netIncome",
    });
  }

  const n = o.projectionYears;
  const exitNetIncome =
    company.netIncome * Math.pow(1 + company.growthRate, n) * Math.pow(1 + o.marginImprovement, n);
  const exitValue = exitNetIncome * o.targetPe;

  return createValuationResult({
    method: "VC",
    value: exitValue / o.targetReturnMultiple,
    details: {
      exitNetIncome,
      exitValue,
      targetPe: o.targetPe,
      targetReturnMultiple: o.targetReturnMultiple,
      projectionYears: n,
      impliedIrr: Math.pow(o.targetReturnMultiple, 1 / n) - 1,
    },
    assumptions: {
      growthRate: company.growthRate,
      marginImprovement: o.marginImprovement,
    },
  });
}

// ---------------------------------------------------------------------------
// Exit backsolve
// ---------------------------------------------------------------------------

export const VC_EXIT_DEFAULTS = {
  targetReturnMultiple: 10,
  investmentYears: 5,
  exitMethod: "PE",
} as const;

const VcExitOptionsSchema = z
  .object({
    exitValuation: z.number().finite().positive().optional(),
    targetReturnMultiple: z
      .number()
      .finite()
      .positive()
      .default(VC_EXIT_DEFAULTS.targetReturnMultiple),
    investmentYears: z.number().int().min(1).default(VC_EXIT_DEFAULTS.investmentYears),
    exitMethod: z.enum(["PE", "PS"]).default(VC_EXIT_DEFAULTS.exitMethod),
    exitMultiple: z.number().finite().positive().optional(),
  })
  .strict();

/**
 * Venture capital method from an expected exit:
 *
 *   exitValuation = metric * (1 + g)^n * exitMultiple
 *   value         = exitValuation / targetReturnMultiple
 *
 * The metric is net income for a PE exit and revenue for a PS exit. When
 * no multiple is given, or the metric is not positive, the supplied
 * exitValuation is used instead; MISSING_DATA when there is neither.
 */
export function vcMethod(company: Company, options: VcExitOptions = {}): VcExitResult {
  const o = parseMethodInput(VcExitOptionsSchema, options, "VC exit options");
  const n = o.investmentYears;
  const metric = o.exitMethod === "PE" ? company.netIncome : company.revenue;

  const derived =
    o.exitMultiple !== undefined && metric > 0
      ? metric * Math.pow(1 + company.growthRate, n) * o.exitMultiple
      : undefined;
  const exitValuation = derived ?? o.exitValuation;

  if (exitValuation === undefined) {
    const reason =
      o.exitMultiple === undefined
        ? "VC method needs exitValuation or exitMultiple"
        : `A ${o.exitMethod} exit multiple needs positive ${o.exitMethod === "PE" ? "net income" : "revenue"}; supply exitValuation instead`;
    throw new ValuationError("MISSING_DATA", reason, { parameter: "exitValuation" });
  }

  const details: VcExitDetails = {
    exitValuation,
    exitSource: derived === undefined ? "supplied" : "multiple",
    exitMethod: o.exitMethod,
    exitMultiple: o.exitMultiple ?? null,
    targetReturnMultiple: o.targetReturnMultiple,
    investmentYears: n,
    impliedIrr: Math.pow(o.targetReturnMultiple, 1 / n) - 1,
  };

  return createValuationResult({
    method: "VC",
    value: exitValuation / o.targetReturnMultiple,
    details,
    assumptions: {
      growthRate: company.growthRate,
    },
  });
}
