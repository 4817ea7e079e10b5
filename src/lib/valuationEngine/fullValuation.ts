/**
 * Valuation Engine — Full Valuation
 *
 * Pipeline:
 * 1. Resolve comparables (supplied, else market data, else none)
 * 2. Relative valuation per multiple plus the weighted composite
 * 3. DCF
 * 4. Risk analysis: scenarios, stress report, sensitivity
 * 5. Cross-check recommendation
 * 6. Persist to history when a store is configured
 *
 * A failing step is recorded in `errors` and the pipeline continues.
 * Market-data and history failures are logged and ignored.
 */

import { parseCompany } from "@/lib/valuationModel/company";
import {
  toEngineFailure,
  toEngineResultAsync,
  type EngineResult,
} from "@/lib/valuationModel/errors";
import type { CompanyInput } from "@/lib/valuationModel/schemas";
import type { Comparable, Company } from "@/lib/valuationModel/types";
import { dcfValuation } from "@/lib/dcfEngine";
import {
  MULTIPLE_METHODS,
  autoComparableAnalysis,
  compositeRelativeValuation,
  type RelativeValuationMap,
} from "@/lib/relativeValuation";
import { compareScenarios } from "@/lib/scenarioEngine";
import { generateStressReportAsync } from "@/lib/stressEngine";
import { comprehensiveSensitivity } from "@/lib/sensitivityEngine";
import type { DcfResult } from "@/lib/dcfEngine/types";
import { buildRecommendation } from "./recommendation";
import type {
  FullValuationOptions,
  MethodValue,
  RiskAnalysis,
  ValuationBundle,
  ValuationStep,
  ValuationStepError,
} from "./types";

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

async function resolveComparables(
  company: Company,
  options: FullValuationOptions,
): Promise<readonly Comparable[]> {
  if (options.comparables !== undefined) return options.comparables;
  if (!options.marketData) return [];

  const industry = options.industry ?? company.industry;
  try {
    return await options.marketData.getComparables(industry, { limit: options.comparableLimit });
  } catch (e) {
    console.warn("[valuationEngine] market data unavailable (non-fatal)", {
      company: company.name,
      industry,
      error: errorMessage(e),
    });
    return [];
  }
}

function collectMethodValues(relative: RelativeValuationMap, dcf: DcfResult | undefined): MethodValue[] {
  const values: MethodValue[] = [];
  for (const method of MULTIPLE_METHODS) {
    const r = relative[method];
    if (!r) continue;
    values.push({
      source: "relative",
      method,
      value: r.value,
      valueLow: r.valueLow,
      valueHigh: r.valueHigh,
    });
  }
  if (dcf) values.push({ source: "absolute", method: "DCF", value: dcf.value });
  return values;
}

async function runFullValuation(
  company: Company,
  options: FullValuationOptions,
): Promise<ValuationBundle> {
  const started = Date.now();
  const clock = options.clock ?? (() => new Date());
  const errors: ValuationStepError[] = [];

  const attempt = <T>(step: ValuationStep, fn: () => T): T | undefined => {
    try {
      return fn();
    } catch (e) {
      errors.push({ step, error: toEngineFailure(e) });
      return undefined;
    }
  };

  const attemptAsync = async <T>(step: ValuationStep, fn: () => Promise<T>): Promise<T | undefined> => {
    try {
      return await fn();
    } catch (e) {
      errors.push({ step, error: toEngineFailure(e) });
      return undefined;
    }
  };

  // 1–2. Relative valuation
  const comparables = await resolveComparables(company, options);
  const relative: RelativeValuationMap =
    comparables.length > 0
      ? (attempt("relative", () =>
          autoComparableAnalysis(company, comparables, {
            ...options.relative,
            methods: options.methods,
          }),
        ) ?? {})
      : {};
  const composite = compositeRelativeValuation(relative) ?? null;

  // 3. DCF
  const dcf = attempt("dcf", () => dcfValuation(company));

  // 4. Risk analysis
  const riskAnalysis: RiskAnalysis = {};
  if (options.enableRiskAnalysis ?? true) {
    const scenario = attempt("scenario", () => compareScenarios(company));
    if (scenario) riskAnalysis.scenario = scenario;

    const stressTest = await attemptAsync("stressTest", () =>
      generateStressReportAsync(company, {
        monteCarlo: {
          binCount: options.config?.histogramBins,
          ...options.monteCarlo,
          limits: options.config?.monteCarloLimits,
        },
      }),
    );
    if (stressTest) riskAnalysis.stressTest = stressTest;

    const sensitivity = attempt("sensitivity", () => comprehensiveSensitivity(company));
    if (sensitivity) riskAnalysis.sensitivity = sensitivity;
  }

  // 5. Recommendation
  const recommendation = buildRecommendation(collectMethodValues(relative, dcf));

  const bundle: ValuationBundle = {
    company: company.name,
    industry: company.industry,
    stage: company.stage,
    timestamp: clock().toISOString(),
    comparablesUsed: comparables.length,
    valuationMethods: {
      relative,
      composite,
      absolute: dcf ? { DCF: dcf } : null,
    },
    riskAnalysis,
    recommendation,
    errors,
  };

  // 6. History
  if (options.history) {
    try {
      bundle.historyId = await options.history.save(bundle);
    } catch (e) {
      console.warn("[valuationEngine] history save failed (non-fatal)", {
        company: company.name,
        error: errorMessage(e),
      });
    }
  }

  console.info("[valuationEngine] full valuation complete", {
    company: company.name,
    methodsUsed: recommendation?.methodsUsed ?? 0,
    failedSteps: errors.map((e) => e.step),
    ms: Date.now() - started,
  });

  return bundle;
}

/**
 * Value a company with every applicable method. Never throws: invalid
 * input and unexpected failures come back as `{ ok: false, error }`.
 */
export async function fullValuation(
  input: CompanyInput,
  options: FullValuationOptions = {},
): Promise<EngineResult<ValuationBundle>> {
  return toEngineResultAsync(async () => runFullValuation(parseCompany(input), options));
}
