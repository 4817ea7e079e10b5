/**
 * Stress Engine — Public API
 *
 * Runs every discrete stress family, the extreme crash and a Monte Carlo
 * simulation against one company and aggregates the downside.
 *
 * Pure computation — no I/O. The async report differs only in scheduling
 * the Monte Carlo chunks.
 */

import type { Company, MonteCarloResult, StressTestResult } from "@/lib/valuationModel/types";
import type { StressFailure, StressReport, StressReportOptions, StressTests } from "./types";
import { resolveStressAssumptions } from "./assumptions";
import {
  computeStressBaseline,
  runExtremeCrashGuarded,
  runGrowthSlowdowns,
  runMarginCompressions,
  runRevenueShocks,
  runWaccShocks,
} from "./runner";
import { monteCarloSimulation, monteCarloSimulationAsync } from "./monteCarlo";

// Re-export types
export type {
  CrashAssumptions,
  StressAssumptions,
  StressTestKind,
  DistributionSpec,
  SimulatedParameter,
  MonteCarloDistributions,
  ParameterDomain,
  MonteCarloLimits,
  MonteCarloOptions,
  StressTests,
  StressFailure,
  StressReport,
  StressReportOptions,
} from "./types";

// Re-export sub-modules
export {
  DEFAULT_STRESS_ASSUMPTIONS,
  DEFAULT_MONTE_CARLO_ITERATIONS,
  DEFAULT_MONTE_CARLO_DISTRIBUTIONS,
  DEFAULT_MONTE_CARLO_LIMITS,
  PARAMETER_DOMAINS,
  resolveStressAssumptions,
} from "./assumptions";
export {
  applyRevenueShock,
  applyMarginCompression,
  applyWaccShock,
  applyGrowthSlowdown,
  combineOverrides,
} from "./modelTransforms";
export type { StressBaseline } from "./runner";
export {
  changePct,
  computeStressBaseline,
  revenueShockTest,
  marginCompressionTest,
  waccShockTest,
  growthSlowdownTest,
  extremeMarketCrash,
} from "./runner";
export { mulberry32, createRandomSource, deriveSeed } from "./random";
export type { RandomSource } from "./random";
export { monteCarloSimulation, monteCarloSimulationAsync } from "./monteCarlo";

// ---------------------------------------------------------------------------
// Downside aggregation
// ---------------------------------------------------------------------------

/** Most negative changePct across all results; 0 when none is negative. */
export function maxDownside(results: readonly StressTestResult[]): number {
  return results.reduce((worst, r) => Math.min(worst, r.changePct), 0);
}

/**
 * Run every discrete shock against one baseline. A failing baseline
 * aborts the report; a failing shock is recorded and the rest still run.
 */
function runDiscreteTests(company: Company, options: StressReportOptions) {
  const assumptions = resolveStressAssumptions(options.assumptions);
  const baseline = computeStressBaseline(company, options.dcf);
  const dcf = options.dcf ?? {};
  const failures: StressFailure[] = [];

  const tests: StressTests = {
    revenueShock: runRevenueShocks(company, baseline, assumptions.revenueShocks, dcf, failures),
    marginCompression: runMarginCompressions(
      company,
      baseline,
      assumptions.marginCompressions,
      dcf,
      failures,
    ),
    waccShock: runWaccShocks(company, baseline, assumptions.waccShocks, dcf, failures),
    growthSlowdown: runGrowthSlowdowns(
      company,
      baseline,
      assumptions.growthSlowdownFactors,
      dcf,
      failures,
    ),
    extremeCrash: runExtremeCrashGuarded(company, baseline, assumptions.crash, dcf, failures),
  };

  if (failures.length > 0) {
    console.warn("[stressEngine] shocks skipped (non-fatal)", {
      company: company.name,
      failures: failures.map((f) => `${f.scenarioDescription}: ${f.error.code}`),
    });
  }

  return { baseline, tests, failures };
}

function buildReport(
  company: Company,
  discrete: ReturnType<typeof runDiscreteTests>,
  monteCarlo: MonteCarloResult,
): StressReport {
  const { baseline, tests, failures } = discrete;
  const all = [
    ...tests.revenueShock,
    ...tests.marginCompression,
    ...tests.waccShock,
    ...tests.growthSlowdown,
    ...(tests.extremeCrash ? [tests.extremeCrash] : []),
  ];

  return {
    company: company.name,
    baseValue: baseline.value,
    baseWacc: baseline.wacc,
    tests,
    monteCarlo,
    maxDownside: maxDownside(all),
    failures,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run all stress tests plus Monte Carlo against a company.
 *
 * Pipeline:
 * 1. Value the unstressed company (baseline)
 * 2. Run revenue, margin, WACC and growth shock families
 * 3. Run the combined extreme crash
 *    (a shock that cannot be valued goes to `failures`)
 * 4. Run Monte Carlo
 * 5. Aggregate the worst downside across discrete tests
 */
export function generateStressReport(
  company: Company,
  options: StressReportOptions = {},
): StressReport {
  const discrete = runDiscreteTests(company, options);
  const monteCarlo = monteCarloSimulation(company, { dcf: options.dcf, ...options.monteCarlo });
  return buildReport(company, discrete, monteCarlo);
}

export async function generateStressReportAsync(
  company: Company,
  options: StressReportOptions = {},
): Promise<StressReport> {
  const discrete = runDiscreteTests(company, options);
  const monteCarlo = await monteCarloSimulationAsync(company, {
    dcf: options.dcf,
    ...options.monteCarlo,
  });
  return buildReport(company, discrete, monteCarlo);
}
