/**
 * Stress Engine — Default Assumptions
 *
 * Shock levels, Monte Carlo distributions and parameter domains. Passed
 * explicitly into every call; callers override per request.
 */

import { z } from "zod";
import { ValuationError } from "@/lib/valuationModel/errors";
import type {
  MonteCarloDistributions,
  MonteCarloLimits,
  ParameterDomain,
  SimulatedParameter,
  StressAssumptions,
} from "./types";

// ---------------------------------------------------------------------------
// Discrete shocks
// ---------------------------------------------------------------------------

export const DEFAULT_STRESS_ASSUMPTIONS: Readonly<StressAssumptions> = Object.freeze({
  revenueShocks: [-0.3, -0.2, -0.1],
  marginCompressions: [0.05, 0.1, 0.15],
  waccShocks: [0.01, 0.02, 0.03],
  growthSlowdownFactors: [0.3, 0.5, 0.7],
  crash: {
    revenueShock: -0.4,
    marginCompression: 0.1,
    waccShock: 0.03,
  },
});

const shockList = (schema: z.ZodNumber) => z.array(schema);

const StressAssumptionsSchema = z.object({
  revenueShocks: shockList(z.number().finite().min(-1)),
  marginCompressions: shockList(z.number().finite().min(0)),
  waccShocks: shockList(z.number().finite()),
  growthSlowdownFactors: shockList(z.number().finite().min(0)),
  crash: z.object({
    revenueShock: z.number().finite().min(-1),
    marginCompression: z.number().finite().min(0),
    waccShock: z.number().finite(),
  }),
});

/** Merge caller overrides onto the defaults and validate the result. */
export function resolveStressAssumptions(
  overrides: Partial<StressAssumptions> = {},
): StressAssumptions {
  const parsed = StressAssumptionsSchema.safeParse({ ...DEFAULT_STRESS_ASSUMPTIONS, ...overrides });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    }));
    throw new ValuationError(
      "INVALID_INPUT",
      `Invalid stress assumptions: ${issues.map((i) => `${i.path}: ${i.message}`).join("; ")}`,
      { parameter: issues[0]?.path, issues },
    );
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Monte Carlo
// ---------------------------------------------------------------------------

export const DEFAULT_MONTE_CARLO_ITERATIONS = 1000;

export const DEFAULT_MONTE_CARLO_DISTRIBUTIONS: Readonly<MonteCarloDistributions> = Object.freeze({
  growthRate: { kind: "normal", std: 0.05 },
  operatingMargin: { kind: "normal", std: 0.03 },
  wacc: { kind: "normal", std: 0.01 },
  terminalGrowthRate: null,
});

/** Sampled values are clamped into these ranges before valuation. */
export const PARAMETER_DOMAINS: Readonly<Record<SimulatedParameter, ParameterDomain>> =
  Object.freeze({
    growthRate: { min: -0.5, max: 1 },
    operatingMargin: { min: 0, max: 0.99 },
    wacc: { min: 0.01, max: 0.5 },
    terminalGrowthRate: { min: -0.02, max: 0.06 },
  });

export const DEFAULT_MONTE_CARLO_LIMITS: Readonly<MonteCarloLimits> = Object.freeze({
  maxIterations: 100_000,
  chunkSize: 1000,
});

export const DistributionSpecSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("normal"), std: z.number().finite().min(0) }),
  z.object({ kind: z.literal("uniform"), halfWidth: z.number().finite().min(0) }),
]);
