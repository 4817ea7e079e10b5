/**
 * Stress Engine — Shock Runner
 *
 * Runs discrete stress shocks through the DCF kernel and measures the
 * change against the unstressed valuation.
 *
 * Pure computation — no I/O, no side effects.
 */

import { ValuationError, toEngineFailure } from "@/lib/valuationModel/errors";
import type { Company, StressTestResult } from "@/lib/valuationModel/types";
import { dcfValuation } from "@/lib/dcfEngine";
import type { DcfOptions, DcfOverrides } from "@/lib/dcfEngine/types";
import { DEFAULT_STRESS_ASSUMPTIONS, resolveStressAssumptions } from "./assumptions";
import {
  applyGrowthSlowdown,
  applyMarginCompression,
  applyRevenueShock,
  applyWaccShock,
  combineOverrides,
} from "./modelTransforms";
import type { CrashAssumptions, StressFailure, StressTestKind } from "./types";

export interface StressBaseline {
  value: number;
  wacc: number;
}

/** Unstressed valuation every shock is measured against. Must be non-zero. */
export function computeStressBaseline(company: Company, options: DcfOptions = {}): StressBaseline {
  const base = dcfValuation(company, {}, options);
  if (base.value === 0) {
    throw new ValuationError("DEGENERATE_MODEL", "Base valuation is zero; change is undefined", {
      parameter: "baseValue",
    });
  }
  return { value: base.value, wacc: base.details.wacc };
}

/**
 * (stressed - base) / |base|. The absolute denominator keeps the sign
 * of the change when net debt pushes the base equity value below zero,
 * so a loss is always negative. A zero base has no defined relative change.
 */
export function changePct(baseValue: number, stressedValue: number): number {
  if (baseValue === 0) {
    throw new ValuationError("DEGENERATE_MODEL", "Base valuation is zero; change is undefined", {
      parameter: "baseValue",
    });
  }
  return (stressedValue - baseValue) / Math.abs(baseValue);
}

function pct(x: number): string {
  return `${x >= 0 ? "+" : ""}${(x * 100).toFixed(0)}%`;
}

function points(x: number): string {
  return `${(x * 100).toFixed(1)} pts`;
}

function signedPoints(x: number): string {
  return `${x >= 0 ? "+" : "-"}${points(Math.abs(x))}`;
}

// ---------------------------------------------------------------------------
// Single shock execution
// ---------------------------------------------------------------------------

/**
 * Value the company under `overrides` and compare against the baseline.
 *
 * Pure function — deterministic, no side effects.
 */
export function runShock(
  company: Company,
  baseline: StressBaseline,
  testName: StressTestKind,
  scenarioDescription: string,
  overrides: DcfOverrides,
  details: Record<string, number>,
  options: DcfOptions = {},
): StressTestResult {
  const stressed = dcfValuation(company, overrides, options);
  const change = changePct(baseline.value, stressed.value);

  return Object.freeze({
    testName,
    scenarioDescription,
    baseValue: baseline.value,
    stressedValue: stressed.value,
    changePct: change,
    downsideProtection: Math.min(0, change),
    details: Object.freeze({ ...details, stressedWacc: stressed.details.wacc }),
  });
}

/**
 * Run one shock. Without a sink a failure propagates; with one it is
 * recorded there and the shock is skipped.
 */
function guarded(
  sink: StressFailure[] | undefined,
  testName: StressTestKind,
  scenarioDescription: string,
  run: () => StressTestResult,
): StressTestResult | null {
  if (!sink) return run();
  try {
    return run();
  } catch (e) {
    sink.push({ testName, scenarioDescription, error: toEngineFailure(e) });
    return null;
  }
}

function collect(results: Array<StressTestResult | null>): StressTestResult[] {
  return results.filter((r): r is StressTestResult => r !== null);
}

// ---------------------------------------------------------------------------
// Shock families (baseline supplied)
// ---------------------------------------------------------------------------

export function runRevenueShocks(
  company: Company,
  baseline: StressBaseline,
  shocks: readonly number[],
  options: DcfOptions = {},
  sink?: StressFailure[],
): StressTestResult[] {
  return collect(
    shocks.map((shock) => {
      const description = `Revenue ${pct(shock)}`;
      return guarded(sink, "revenueShock", description, () => {
        const overrides = applyRevenueShock(company, shock);
        return runShock(
          company,
          baseline,
          "revenueShock",
          description,
          overrides,
          { shock, stressedRevenue: overrides.revenue ?? company.revenue },
          options,
        );
      });
    }),
  );
}

export function runMarginCompressions(
  company: Company,
  baseline: StressBaseline,
  compressions: readonly number[],
  options: DcfOptions = {},
  sink?: StressFailure[],
): StressTestResult[] {
  return collect(
    compressions.map((compression) => {
      const description = `Operating margin -${points(compression)}`;
      return guarded(sink, "marginCompression", description, () => {
        const overrides = applyMarginCompression(company, compression);
        return runShock(
          company,
          baseline,
          "marginCompression",
          description,
          overrides,
          { compression, stressedMargin: overrides.operatingMargin ?? company.operatingMargin },
          options,
        );
      });
    }),
  );
}

export function runWaccShocks(
  company: Company,
  baseline: StressBaseline,
  shocks: readonly number[],
  options: DcfOptions = {},
  sink?: StressFailure[],
): StressTestResult[] {
  return collect(
    shocks.map((shock) => {
      const description = `WACC ${signedPoints(shock)}`;
      return guarded(sink, "waccShock", description, () =>
        runShock(company, baseline, "waccShock", description, applyWaccShock(shock), { shock }, options),
      );
    }),
  );
}

export function runGrowthSlowdowns(
  company: Company,
  baseline: StressBaseline,
  factors: readonly number[],
  options: DcfOptions = {},
  sink?: StressFailure[],
): StressTestResult[] {
  return collect(
    factors.map((factor) => {
      const description = `Growth x${factor.toFixed(2)}`;
      return guarded(sink, "growthSlowdown", description, () => {
        const overrides = applyGrowthSlowdown(company, factor);
        return runShock(
          company,
          baseline,
          "growthSlowdown",
          description,
          overrides,
          { factor, stressedGrowthRate: overrides.growthRate ?? company.growthRate },
          options,
        );
      });
    }),
  );
}

function crashDescription(crash: CrashAssumptions): string {
  return `Revenue ${pct(crash.revenueShock)}, operating margin -${points(crash.marginCompression)}, WACC ${signedPoints(crash.waccShock)}`;
}

export function runExtremeCrash(
  company: Company,
  baseline: StressBaseline,
  crash: CrashAssumptions,
  options: DcfOptions = {},
): StressTestResult {
  const overrides = combineOverrides(
    applyRevenueShock(company, crash.revenueShock),
    applyMarginCompression(company, crash.marginCompression),
    applyWaccShock(crash.waccShock),
  );
  return runShock(
    company,
    baseline,
    "extremeCrash",
    crashDescription(crash),
    overrides,
    {
      revenueShock: crash.revenueShock,
      marginCompression: crash.marginCompression,
      waccShock: crash.waccShock,
      stressedRevenue: overrides.revenue ?? company.revenue,
      stressedMargin: overrides.operatingMargin ?? company.operatingMargin,
    },
    options,
  );
}

/** Extreme crash that records a failure in `sink` instead of throwing. */
export function runExtremeCrashGuarded(
  company: Company,
  baseline: StressBaseline,
  crash: CrashAssumptions,
  options: DcfOptions,
  sink: StressFailure[],
): StressTestResult | null {
  return guarded(sink, "extremeCrash", crashDescription(crash), () =>
    runExtremeCrash(company, baseline, crash, options),
  );
}

// ---------------------------------------------------------------------------
// Public stress tests
// ---------------------------------------------------------------------------

export function revenueShockTest(
  company: Company,
  shocks: readonly number[] = DEFAULT_STRESS_ASSUMPTIONS.revenueShocks,
  options: DcfOptions = {},
): StressTestResult[] {
  const { revenueShocks } = resolveStressAssumptions({ revenueShocks: shocks });
  return runRevenueShocks(company, computeStressBaseline(company, options), revenueShocks, options);
}

export function marginCompressionTest(
  company: Company,
  compressions: readonly number[] = DEFAULT_STRESS_ASSUMPTIONS.marginCompressions,
  options: DcfOptions = {},
): StressTestResult[] {
  const { marginCompressions } = resolveStressAssumptions({ marginCompressions: compressions });
  return runMarginCompressions(
    company,
    computeStressBaseline(company, options),
    marginCompressions,
    options,
  );
}

export function waccShockTest(
  company: Company,
  shocks: readonly number[] = DEFAULT_STRESS_ASSUMPTIONS.waccShocks,
  options: DcfOptions = {},
): StressTestResult[] {
  const { waccShocks } = resolveStressAssumptions({ waccShocks: shocks });
  return runWaccShocks(company, computeStressBaseline(company, options), waccShocks, options);
}

export function growthSlowdownTest(
  company: Company,
  factors: readonly number[] = DEFAULT_STRESS_ASSUMPTIONS.growthSlowdownFactors,
  options: DcfOptions = {},
): StressTestResult[] {
  const { growthSlowdownFactors } = resolveStressAssumptions({ growthSlowdownFactors: factors });
  return runGrowthSlowdowns(
    company,
    computeStressBaseline(company, options),
    growthSlowdownFactors,
    options,
  );
}

export function extremeMarketCrash(
  company: Company,
  crash: CrashAssumptions = DEFAULT_STRESS_ASSUMPTIONS.crash,
  options: DcfOptions = {},
): StressTestResult {
  const resolved = resolveStressAssumptions({ crash });
  return runExtremeCrash(company, computeStressBaseline(company, options), resolved.crash, options);
}
