/**
 * Stress Engine — Monte Carlo Simulation
 *
 * Each iteration perturbs growth, margin, WACC and (optionally) terminal
 * growth around the company's base values, clamps them into their domains
 * and calls the DCF kernel once.
 *
 * Iterations run in fixed-size chunks. Chunk i draws from its own
 * generator seeded with deriveSeed(seed, i), so the synchronous and the
 * async (chunk-by-chunk) variants produce identical output.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { z } from "zod";
import { ValuationError, isValuationError } from "@/lib/valuationModel/errors";
import type { Company, MonteCarloResult } from "@/lib/valuationModel/types";
import { DEFAULT_HISTOGRAM_BINS, histogram, mean, percentileSorted, populationStd } from "@/lib/statistics";
import { calculateWacc, computeDcf, resolveDcfOptions } from "@/lib/dcfEngine";
import type { DcfOverrides, ResolvedDcfOptions } from "@/lib/dcfEngine";
import {
  DEFAULT_MONTE_CARLO_DISTRIBUTIONS,
  DEFAULT_MONTE_CARLO_ITERATIONS,
  DEFAULT_MONTE_CARLO_LIMITS,
  DistributionSpecSchema,
  PARAMETER_DOMAINS,
} from "./assumptions";
import {
  assertSeed,
  createRandomSource,
  deriveSeed,
  randomSeed,
  samplePerturbation,
} from "./random";
import type {
  MonteCarloDistributions,
  MonteCarloLimits,
  MonteCarloOptions,
  SimulatedParameter,
} from "./types";

/** Sampling order within an iteration. Changing it changes seeded output. */
const SIMULATED_PARAMETERS: readonly SimulatedParameter[] = [
  "growthRate",
  "operatingMargin",
  "wacc",
  "terminalGrowthRate",
];

interface SimulationPlan {
  company: Company;
  iterations: number;
  seed: number;
  distributions: MonteCarloDistributions;
  base: Record<SimulatedParameter, number>;
  dcf: ResolvedDcfOptions;
  limits: MonteCarloLimits;
  binCount: number;
  warnings: string[];
}

interface ChunkOutcome {
  values: number[];
  skipped: number;
}

const positiveInt = z.number().int().positive();

const LimitsSchema = z.object({
  maxIterations: positiveInt,
  chunkSize: positiveInt,
});

const DistributionsSchema = z.object({
  growthRate: DistributionSpecSchema.nullable(),
  operatingMargin: DistributionSpecSchema.nullable(),
  wacc: DistributionSpecSchema.nullable(),
  terminalGrowthRate: DistributionSpecSchema.nullable(),
});

const PlanInputSchema = z.object({
  iterations: positiveInt,
  binCount: positiveInt,
  limits: LimitsSchema,
  distributions: DistributionsSchema,
});

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

function planSimulation(company: Company, options: MonteCarloOptions): SimulationPlan {
  const parsed = PlanInputSchema.safeParse({
    iterations: options.iterations ?? DEFAULT_MONTE_CARLO_ITERATIONS,
    binCount: options.binCount ?? DEFAULT_HISTOGRAM_BINS,
    limits: { ...DEFAULT_MONTE_CARLO_LIMITS, ...options.limits },
    distributions: { ...DEFAULT_MONTE_CARLO_DISTRIBUTIONS, ...options.distributions },
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
    throw new ValuationError(
      "INVALID_INPUT",
      `Invalid Monte Carlo options: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      { parameter: issues[0]?.path, issues },
    );
  }
  const { limits, distributions, binCount } = parsed.data;

  const seed = options.seed ?? randomSeed();
  assertSeed(seed);

  const warnings: string[] = [];
  let iterations = parsed.data.iterations;
  if (iterations > limits.maxIterations) {
    warnings.push(
      `Requested ${iterations} iterations exceeds the cap of ${limits.maxIterations}; ran ${limits.maxIterations}`,
    );
    iterations = limits.maxIterations;
  }

  return {
    company,
    iterations,
    seed,
    distributions,
    base: {
      growthRate: company.growthRate,
      operatingMargin: company.operatingMargin,
      wacc: calculateWacc(company),
      terminalGrowthRate: company.terminalGrowthRate,
    },
    dcf: resolveDcfOptions(options.dcf),
    limits,
    binCount,
    warnings,
  };
}

function chunkCount(plan: SimulationPlan): number {
  return Math.ceil(plan.iterations / plan.limits.chunkSize);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

function runChunk(plan: SimulationPlan, chunkIndex: number): ChunkOutcome {
  const start = chunkIndex * plan.limits.chunkSize;
  const count = Math.min(plan.limits.chunkSize, plan.iterations - start);
  const rng = createRandomSource(deriveSeed(plan.seed, chunkIndex));

  const values: number[] = [];
  let skipped = 0;

  for (let i = 0; i < count; i++) {
    const overrides: DcfOverrides = {};
    for (const param of SIMULATED_PARAMETERS) {
      const spec = plan.distributions[param];
      if (!spec) continue;
      const domain = PARAMETER_DOMAINS[param];
      overrides[param] = clamp(
        plan.base[param] + samplePerturbation(spec, rng),
        domain.min,
        domain.max,
      );
    }

    try {
      values.push(computeDcf(plan.company, overrides, plan.dcf).value);
    } catch (e) {
      if (!isValuationError(e)) throw e;
      skipped += 1;
    }
  }

  return { values, skipped };
}

function assembleResult(plan: SimulationPlan, chunks: readonly ChunkOutcome[]): MonteCarloResult {
  const values = chunks.flatMap((c) => c.values);
  const skipped = chunks.reduce((s, c) => s + c.skipped, 0);
  const warnings = [...plan.warnings];

  if (values.length === 0) {
    warnings.push("No valid iterations: every sampled model was degenerate");
    return Object.freeze({
      iterations: plan.iterations,
      validIterations: 0,
      seed: plan.seed,
      mean: null,
      median: null,
      std: null,
      min: null,
      max: null,
      percentile5: null,
      percentile95: null,
      percentiles: null,
      histogram: [],
      warnings,
    });
  }

  if (skipped > 0) {
    warnings.push(`${skipped} of ${plan.iterations} iterations were degenerate and skipped`);
  }

  const sorted = [...values].sort((a, b) => a - b);
  // sorted is non-empty here, so every percentile is defined
  const at = (p: number): number => percentileSorted(sorted, p) ?? sorted[0];
  const percentiles = {
    p5: at(5),
    p10: at(10),
    p25: at(25),
    p75: at(75),
    p90: at(90),
    p95: at(95),
  };

  return Object.freeze({
    iterations: plan.iterations,
    validIterations: values.length,
    seed: plan.seed,
    mean: mean(sorted) ?? null,
    median: at(50),
    std: populationStd(sorted) ?? null,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    percentile5: percentiles.p5,
    percentile95: percentiles.p95,
    percentiles,
    histogram: histogram(sorted, plan.binCount),
    warnings,
  });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run a Monte Carlo simulation synchronously.
 *
 * Deterministic for a given seed; an unseeded run draws a seed and reports
 * it in the result.
 */
export function monteCarloSimulation(
  company: Company,
  options: MonteCarloOptions = {},
): MonteCarloResult {
  const plan = planSimulation(company, options);
  const chunks: ChunkOutcome[] = [];
  for (let i = 0; i < chunkCount(plan); i++) {
    chunks.push(runChunk(plan, i));
  }
  return assembleResult(plan, chunks);
}

/**
 * Same result as monteCarloSimulation. Chunks run one after another on
 * the calling thread with an event-loop yield before each, so a large
 * simulation does not hold up other work.
 */
export async function monteCarloSimulationAsync(
  company: Company,
  options: MonteCarloOptions = {},
): Promise<MonteCarloResult> {
  const plan = planSimulation(company, options);
  const chunks: ChunkOutcome[] = [];
  for (let i = 0; i < chunkCount(plan); i++) {
    await yieldToEventLoop();
    chunks.push(runChunk(plan, i));
  }
  return assembleResult(plan, chunks);
}
