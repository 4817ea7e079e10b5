/**
 * Relative Valuation - Multiple-Based Valuation
 *
 * value = company metric * median(comparable multiples) * adjustment
 * range = company metric * [min, max] multiple * adjustment
 *
 * EV/EBITDA produces an enterprise value, bridged to equity with
 * (- totalDebt + cash).
 *
 * Pure functions — deterministic, no side effects.
 */

import { z } from "zod";
import { ValuationError, isValuationError } from "@/lib/valuationModel/errors";
import { createValuationResult } from "@/lib/valuationModel/results";
import type { Comparable, Company } from "@/lib/valuationModel/types";
import { extractMultiples, multipleStatistics } from "./multiples";
import {
  DEFAULT_COMPOSITE_WEIGHTS,
  MULTIPLE_METHODS,
  type CompositeResult,
  type CompositeWeights,
  type MethodCoverage,
  type MultipleMethod,
  type MultipleResult,
  type RelativeValuationMap,
  type RelativeValuationOptions,
} from "./types";

const RelativeOptionsSchema = z.object({
  useForwardMetrics: z.boolean().default(false),
  illiquidityDiscount: z.number().finite().min(0).lt(1).default(0),
  controlPremium: z.number().finite().min(0).default(0),
});

type ResolvedRelativeOptions = z.output<typeof RelativeOptionsSchema>;

function resolveOptions(options: RelativeValuationOptions): ResolvedRelativeOptions {
  const parsed = RelativeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const path = first ? first.path.join(".") : "options";
    throw new ValuationError("INVALID_INPUT", `Invalid option ${path}: ${first?.message ?? ""}`, {
      parameter: path,
    });
  }
  return parsed.data;
}

const METRIC_LABELS: Record<MultipleMethod, string> = {
  PE: "netIncome",
  PS: "revenue",
  PB: "netAssets",
  EV_EBITDA: "ebitda",
};

/** Company base metric for a method; forward metrics only apply to P/E and P/S. */
export function companyMetric(
  company: Company,
  method: MultipleMethod,
  useForwardMetrics = false,
): { metric: number | undefined; isForward: boolean } {
  const forwardFactor = 1 + company.growthRate;
  switch (method) {
    case "PE":
      return useForwardMetrics
        ? { metric: company.netIncome * forwardFactor, isForward: true }
        : { metric: company.netIncome, isForward: false };
    case "PS":
      return useForwardMetrics
        ? { metric: company.revenue * forwardFactor, isForward: true }
        : { metric: company.revenue, isForward: false };
    case "PB":
      return { metric: company.netAssets, isForward: false };
    case "EV_EBITDA":
      return { metric: company.ebitda, isForward: false };
  }
}

function adjustmentFactor(o: ResolvedRelativeOptions): number {
  return 1 - o.illiquidityDiscount + o.controlPremium;
}

/**
 * Equity value implied by applying `multiple` to the company's metric.
 * Throws UNSUPPORTED_METHOD when the metric is missing or non-positive.
 */
export function valueFromMultiple(
  company: Company,
  method: MultipleMethod,
  multiple: number,
  options: RelativeValuationOptions = {},
): number {
  const o = resolveOptions(options);
  const { metric } = companyMetric(company, method, o.useForwardMetrics);
  if (metric === undefined || !(metric > 0)) {
    throw new ValuationError(
      "UNSUPPORTED_METHOD",
      `${method} requires a positive ${METRIC_LABELS[method]}`,
      { parameter: METRIC_LABELS[method] },
    );
  }
  const raw = metric * multiple * adjustmentFactor(o);
  if (method === "EV_EBITDA") {
    return raw - company.totalDebt + company.cashAndEquivalents;
  }
  return raw;
}

/**
 * Value `company` with one multiple method.
 *
 * Throws UNSUPPORTED_METHOD when the company metric is <= 0 and
 * MISSING_DATA when no comparable supplies a valid multiple.
 */
export function multipleValuation(
  company: Company,
  comparables: readonly Comparable[],
  method: MultipleMethod,
  options: RelativeValuationOptions = {},
): MultipleResult {
  const o = resolveOptions(options);
  const { metric, isForward } = companyMetric(company, method, o.useForwardMetrics);
  const metricLabel = METRIC_LABELS[method];

  if (metric === undefined || !(metric > 0)) {
    throw new ValuationError("UNSUPPORTED_METHOD", `${method} requires a positive ${metricLabel}`, {
      parameter: metricLabel,
    });
  }

  const statistics = multipleStatistics(extractMultiples(comparables, method));
  if (!statistics) {
    throw new ValuationError("MISSING_DATA", `No comparable supplies a valid ${method} multiple`, {
      parameter: "comparables",
    });
  }

  const factor = adjustmentFactor(o);
  const implied = metric * statistics.median * factor;
  const impliedLow = metric * statistics.min * factor;
  const impliedHigh = metric * statistics.max * factor;

  const bridge = method === "EV_EBITDA" ? company.cashAndEquivalents - company.totalDebt : 0;

  return createValuationResult({
    method,
    value: implied + bridge,
    valueLow: impliedLow + bridge,
    valueHigh: impliedHigh + bridge,
    details: {
      multiple: method,
      metric,
      metricLabel,
      isForward,
      statistics,
      adjustmentFactor: factor,
      ...(method === "EV_EBITDA"
        ? { enterpriseValue: implied, netDebt: company.totalDebt - company.cashAndEquivalents }
        : {}),
    },
    assumptions: {
      medianMultiple: statistics.median,
      comparableCount: statistics.count,
      useForwardMetrics: o.useForwardMetrics,
      illiquidityDiscount: o.illiquidityDiscount,
      controlPremium: o.controlPremium,
    },
  });
}

export function peValuation(
  company: Company,
  comparables: readonly Comparable[],
  options?: RelativeValuationOptions,
): MultipleResult {
  return multipleValuation(company, comparables, "PE", options);
}

export function psValuation(
  company: Company,
  comparables: readonly Comparable[],
  options?: RelativeValuationOptions,
): MultipleResult {
  return multipleValuation(company, comparables, "PS", options);
}

export function pbValuation(
  company: Company,
  comparables: readonly Comparable[],
  options?: RelativeValuationOptions,
): MultipleResult {
  return multipleValuation(company, comparables, "PB", { ...options, useForwardMetrics: false });
}

export function evEbitdaValuation(
  company: Company,
  comparables: readonly Comparable[],
  options?: RelativeValuationOptions,
): MultipleResult {
  return multipleValuation(company, comparables, "EV_EBITDA", {
    ...options,
    useForwardMetrics: false,
  });
}

// ---------------------------------------------------------------------------
// Aggregate analysis
// ---------------------------------------------------------------------------

/**
 * Run each requested method, skipping any that are not applicable
 * (non-positive metric or no valid multiples). An empty mapping means
 * relative valuation is unavailable; it is never an error.
 */
export function autoComparableAnalysis(
  company: Company,
  comparables: readonly Comparable[],
  opts: RelativeValuationOptions & { methods?: readonly MultipleMethod[] } = {},
): RelativeValuationMap {
  const { methods = MULTIPLE_METHODS, ...options } = opts;
  // Invalid options are the caller's error, not a skipped method
  resolveOptions(options);

  const results: RelativeValuationMap = {};
  for (const method of methods) {
    try {
      results[method] = multipleValuation(company, comparables, method, options);
    } catch (e) {
      if (isValuationError(e) && (e.code === "UNSUPPORTED_METHOD" || e.code === "MISSING_DATA")) {
        continue;
      }
      throw e;
    }
  }
  return results;
}

/**
 * Weighted average of the available method values, weights normalised over
 * the methods present. Range spans the lowest low and highest high.
 * Returns undefined when fewer than two methods are available.
 */
export function compositeRelativeValuation(
  results: RelativeValuationMap,
  weights: Partial<CompositeWeights> = {},
): CompositeResult | undefined {
  const w: CompositeWeights = { ...DEFAULT_COMPOSITE_WEIGHTS, ...weights };

  const entries: { method: MultipleMethod; result: MultipleResult; weight: number }[] = [];
  for (const method of MULTIPLE_METHODS) {
    const result = results[method];
    if (result && w[method] > 0) entries.push({ method, result, weight: w[method] });
  }
  if (entries.length < 2) return undefined;

  const totalWeight = entries.reduce((s, e) => s + e.weight, 0);
  const normalizedWeights: Partial<Record<MultipleMethod, number>> = {};
  let value = 0;
  let low = Number.POSITIVE_INFINITY;
  let high = Number.NEGATIVE_INFINITY;

  for (const e of entries) {
    const nw = e.weight / totalWeight;
    normalizedWeights[e.method] = nw;
    value += e.result.value * nw;
    low = Math.min(low, e.result.valueLow ?? e.result.value);
    high = Math.max(high, e.result.valueHigh ?? e.result.value);
  }

  return createValuationResult({
    method: "RELATIVE_COMPOSITE",
    value,
    valueLow: low,
    valueHigh: high,
    details: {
      methodsUsed: entries.map((e) => e.method),
      normalizedWeights,
    },
    assumptions: Object.fromEntries(
      entries.map((e) => [`weight${e.method}`, e.weight] as const),
    ),
  });
}

/** For each method: whether it can run against these comparables, and why not. */
export function relativeValuationCoverage(
  company: Company,
  comparables: readonly Comparable[],
  options: Pick<RelativeValuationOptions, "useForwardMetrics"> = {},
): MethodCoverage[] {
  return MULTIPLE_METHODS.map((method) => {
    const { metric } = companyMetric(company, method, options.useForwardMetrics ?? false);
    const validMultiples = extractMultiples(comparables, method).length;
    if (metric === undefined || !(metric > 0)) {
      return { method, usable: false, validMultiples, reason: "NON_POSITIVE_METRIC" as const };
    }
    if (validMultiples === 0) {
      return { method, usable: false, validMultiples, reason: "NO_VALID_MULTIPLES" as const };
    }
    return { method, usable: true, validMultiples };
  });
}
