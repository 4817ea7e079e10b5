/**
 * DCF Engine - Multi-Product Valuation
 *
 * Values each product segment as its own DCF (explicit growth path,
 * segment margin and reinvestment, company tax rate and capital
 * structure), then sums segment enterprise values and bridges to equity
 * with the company's net debt.
 *
 * Revenue weights are checked for consistency only; segment values come
 * from segment cash flows.
 */

import { z } from "zod";
import { ValuationError, isValuationError } from "@/lib/valuationModel/errors";
import { createValuationResult } from "@/lib/valuationModel/results";
import { ReinvestmentSchema } from "@/lib/valuationModel/schemas";
import type { Company } from "@/lib/valuationModel/types";
import {
  MAX_PRODUCT_SEGMENTS,
  SEGMENT_WEIGHT_TOLERANCE,
  type ConsolidatedForecast,
  type DcfOptions,
  type MultiProductResult,
  type ProductSegment,
  type SegmentContribution,
  type SegmentValuation,
} from "./types";
import { calculateWacc } from "./wacc";
import { forecastFreeCashFlows } from "./forecast";
import { assertDiscountRate, assertWaccSpread, calculateTerminalValue } from "./terminalValue";
import { resolveDcfOptions, type ResolvedDcfOptions } from "./dcf";

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const finite = z.number().finite();

const ProductSegmentSchema = z
  .object({
    name: z.string().trim().min(1),
    revenue: finite.positive(),
    revenueWeight: finite.gt(0).max(1),
    growthPath: z.array(finite.min(-0.5).max(1)).min(1),
    terminalGrowthRate: finite.gt(-1),
    operatingMargin: finite.min(0).lt(1),
    grossMargin: finite.min(0).max(1).optional(),
    reinvestment: ReinvestmentSchema.default({}),
    beta: finite.min(0).optional(),
  })
  .strict();

type ParsedSegment = z.output<typeof ProductSegmentSchema>;

const SegmentsSchema = z
  .array(ProductSegmentSchema)
  .min(1)
  .max(MAX_PRODUCT_SEGMENTS)
  .superRefine((segments, ctx) => {
    const total = segments.reduce((sum, s) => sum + s.revenueWeight, 0);
    if (Math.abs(total - 1) > SEGMENT_WEIGHT_TOLERANCE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `revenue weights must sum to 1, got ${total.toFixed(2)}`,
      });
    }
    const seen = new Set<string>();
    segments.forEach((s, i) => {
      if (seen.has(s.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate segment name "${s.name}"`,
          path: [i, "name"],
        });
      }
      seen.add(s.name);
    });
  });

function parseSegments(segments: readonly ProductSegment[]): ParsedSegment[] {
  const parsed = SegmentsSchema.safeParse(segments);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({
      path: ["segments", ...i.path].join("."),
      message: i.message,
    }));
    throw new ValuationError(
      "INVALID_INPUT",
      `Invalid product segments: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      { parameter: issues[0]?.path, issues },
    );
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Segment valuation
// ---------------------------------------------------------------------------

function valueSegment(
  company: Company,
  segment: ParsedSegment,
  companyWacc: number,
  options: ResolvedDcfOptions,
): SegmentValuation {
  const wacc =
    segment.beta === undefined ? companyWacc : calculateWacc({ ...company, beta: segment.beta });

  try {
    if (options.terminalMethod === "perpetuity") {
      assertWaccSpread(wacc, segment.terminalGrowthRate);
    } else {
      assertDiscountRate(wacc);
    }
  } catch (e) {
    if (!isValuationError(e)) throw e;
    throw new ValuationError(e.code, `Segment "${segment.name}": ${e.message}`, {
      parameter: e.parameter,
    });
  }

  const forecasts = forecastFreeCashFlows(
    {
      revenue: segment.revenue,
      growthRate: segment.growthPath[0],
      operatingMargin: segment.operatingMargin,
      taxRate: company.taxRate,
      terminalGrowthRate: segment.terminalGrowthRate,
      reinvestment: segment.reinvestment,
    },
    { projectionYears: options.projectionYears, growthPath: segment.growthPath },
  );

  let pvForecasts = 0;
  for (const f of forecasts) {
    pvForecasts += f.fcf / Math.pow(1 + wacc, f.year);
  }

  const final = forecasts[forecasts.length - 1];
  const terminalValue = calculateTerminalValue(
    final.fcf,
    wacc,
    segment.terminalGrowthRate,
    options.terminalMethod,
    options.exitMultiple,
  );
  const pvTerminal = terminalValue / Math.pow(1 + wacc, options.projectionYears);

  return Object.freeze({
    name: segment.name,
    revenueWeight: segment.revenueWeight,
    wacc,
    pvForecasts,
    pvTerminal,
    terminalValue,
    enterpriseValue: pvForecasts + pvTerminal,
    currentRevenue: segment.revenue,
    finalRevenue: final.revenue,
    revenueCagr: Math.pow(final.revenue / segment.revenue, 1 / options.projectionYears) - 1,
    forecasts,
  });
}

/** Per-year sums across segments. */
function consolidate(
  segments: readonly SegmentValuation[],
  projectionYears: number,
): ConsolidatedForecast[] {
  return Array.from({ length: projectionYears }, (_, i) => {
    const year = {
      year: i + 1,
      revenue: 0,
      operatingProfit: 0,
      nopat: 0,
      depreciation: 0,
      capex: 0,
      workingCapitalChange: 0,
      fcf: 0,
    };
    for (const s of segments) {
      const f = s.forecasts[i];
      year.revenue += f.revenue;
      year.operatingProfit += f.operatingProfit;
      year.nopat += f.nopat;
      year.depreciation += f.depreciation;
      year.capex += f.capex;
      year.workingCapitalChange += f.workingCapitalChange;
      year.fcf += f.fcf;
    }
    return Object.freeze(year);
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Sum-of-segments DCF for a company with several product lines.
 *
 * Throws INVALID_INPUT for malformed segments (1 to 10 segments, weights
 * summing to 1 within 0.01, growth path entries in [-0.5, 1]) and
 * DEGENERATE_MODEL when a segment's WACC does not clear its terminal
 * growth under the perpetuity method.
 */
export function multiProductDcf(
  company: Company,
  segments: readonly ProductSegment[],
  options: DcfOptions = {},
): MultiProductResult {
  const parsed = parseSegments(segments);
  const resolved = resolveDcfOptions(options);
  const companyWacc = calculateWacc(company);

  const valued = parsed.map((s) => valueSegment(company, s, companyWacc, resolved));
  const enterpriseValue = valued.reduce((sum, s) => sum + s.enterpriseValue, 0);
  const netDebt = company.totalDebt - company.cashAndEquivalents;
  const equityValue = enterpriseValue - netDebt;

  if (!Number.isFinite(equityValue)) {
    throw new ValuationError("DEGENERATE_MODEL", "Multi-product DCF produced a non-finite value", {
      parameter: "enterpriseValue",
    });
  }

  const contributions: SegmentContribution[] = valued
    .map((s) => ({
      name: s.name,
      share: enterpriseValue > 0 ? s.enterpriseValue / enterpriseValue : 0,
    }))
    .sort((a, b) => b.share - a.share);

  return createValuationResult({
    method: "MULTI_PRODUCT_DCF",
    value: equityValue,
    details: {
      wacc: companyWacc,
      enterpriseValue,
      netDebt,
      totalRevenue: parsed.reduce((sum, s) => sum + s.revenue, 0),
      terminalMethod: resolved.terminalMethod,
      projectionYears: resolved.projectionYears,
      segments: valued,
      contributions,
      consolidatedForecasts: consolidate(valued, resolved.projectionYears),
    },
    assumptions: {
      taxRate: company.taxRate,
      segmentCount: valued.length,
      projectionYears: resolved.projectionYears,
      terminalMethod: resolved.terminalMethod,
    },
  });
}
