/**
 * Stress Engine — Types
 *
 * Discrete stress shocks, the extreme-crash case, Monte Carlo simulation
 * and the aggregate stress report.
 */

import type { MonteCarloResult, StressTestResult } from "@/lib/valuationModel/types";
import type { EngineFailure } from "@/lib/valuationModel/errors";
import type { DcfOptions } from "@/lib/dcfEngine/types";

// ---------------------------------------------------------------------------
// Discrete shocks
// ---------------------------------------------------------------------------

export interface CrashAssumptions {
  /** Applied to the base revenue level, e.g. -0.4 */
  revenueShock: number;
  /** Operating margin points removed, e.g. 0.10 */
  marginCompression: number;
  /** WACC points added, e.g. 0.03 */
  waccShock: number;
}

export interface StressAssumptions {
  /** Base revenue level multiplied by (1 + shock); each >= -1 */
  revenueShocks: readonly number[];
  /** Operating margin points removed (floor 0); each >= 0 */
  marginCompressions: readonly number[];
  /** WACC points added */
  waccShocks: readonly number[];
  /** growthRate multiplied by factor; each >= 0 */
  growthSlowdownFactors: readonly number[];
  crash: CrashAssumptions;
}

export type StressTestKind =
  | "revenueShock"
  | "marginCompression"
  | "waccShock"
  | "growthSlowdown"
  | "extremeCrash";

// ---------------------------------------------------------------------------
// Monte Carlo
// ---------------------------------------------------------------------------

export type DistributionSpec =
  /** Zero-mean normal perturbation */
  | { kind: "normal"; std: number }
  /** Zero-mean uniform perturbation on [-halfWidth, halfWidth] */
  | { kind: "uniform"; halfWidth: number };

export type SimulatedParameter = "growthRate" | "operatingMargin" | "wacc" | "terminalGrowthRate";

/** A null entry disables perturbation of that parameter. */
export type MonteCarloDistributions = Record<SimulatedParameter, DistributionSpec | null>;

export interface ParameterDomain {
  min: number;
  max: number;
}

export interface MonteCarloLimits {
  /** Requests above this are capped with a warning */
  maxIterations: number;
  /** Iterations per independently seeded chunk; the async variant yields between chunks */
  chunkSize: number;
}

export interface MonteCarloOptions {
  iterations?: number;
  /** uint32; drawn at random and reported when absent */
  seed?: number;
  distributions?: Partial<MonteCarloDistributions>;
  binCount?: number;
  dcf?: DcfOptions;
  limits?: Partial<MonteCarloLimits>;
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface StressTests {
  revenueShock: StressTestResult[];
  marginCompression: StressTestResult[];
  waccShock: StressTestResult[];
  growthSlowdown: StressTestResult[];
  /** null when the crash model is degenerate (see failures) */
  extremeCrash: StressTestResult | null;
}

/** A shock whose stressed model could not be valued. */
export interface StressFailure {
  testName: StressTestKind;
  scenarioDescription: string;
  error: EngineFailure;
}

export interface StressReport {
  company: string;
  baseValue: number;
  baseWacc: number;
  tests: StressTests;
  monteCarlo: MonteCarloResult;
  /** Most negative changePct across all discrete tests; 0 when none is negative */
  maxDownside: number;
  /** Shocks left out of `tests` because they failed */
  failures: StressFailure[];
}

export interface StressReportOptions {
  assumptions?: Partial<StressAssumptions>;
  monteCarlo?: MonteCarloOptions;
  dcf?: DcfOptions;
}
