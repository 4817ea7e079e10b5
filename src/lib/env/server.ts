import { z } from "zod";
import { DEFAULT_HISTOGRAM_BINS } from "@/lib/statistics";
import { DEFAULT_MONTE_CARLO_LIMITS } from "@/lib/stressEngine/assumptions";
import type { MonteCarloLimits } from "@/lib/stressEngine/types";
import { DEFAULT_TUSHARE_API_URL } from "@/lib/marketData/tushare";

const positiveInt = z.coerce.number().int().positive().optional();

const ServerEnvSchema = z.object({
  // Tushare (optional: comparables are fetched only when a token is set)
  TUSHARE_TOKEN: z.string().min(1).optional(),
  TUSHARE_API_URL: z.string().url().optional(),

  // Supabase (optional: valuation history is persisted only when both are set)
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),

  // Monte Carlo bounds
  VALUATION_MC_MAX_ITERATIONS: positiveInt,
  VALUATION_MC_CHUNK_SIZE: positiveInt,
  VALUATION_HISTOGRAM_BINS: positiveInt,

  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export interface EngineConfig {
  tushare: { token: string; apiUrl: string } | null;
  supabase: { url: string; serviceRoleKey: string } | null;
  monteCarloLimits: MonteCarloLimits;
  histogramBins: number;
}

export function serverEnv(env: NodeJS.ProcessEnv = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(env);
  if (!parsed.success) {
    console.error("❌ Invalid server env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid server environment variables (see logs).");
  }
  return parsed.data;
}

/**
 * Map validated env onto the explicit config the engine takes. The engine
 * never reads process.env itself.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const e = serverEnv(env);

  return {
    tushare: e.TUSHARE_TOKEN
      ? { token: e.TUSHARE_TOKEN, apiUrl: e.TUSHARE_API_URL ?? DEFAULT_TUSHARE_API_URL }
      : null,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : null,
    monteCarloLimits: {
      maxIterations: e.VALUATION_MC_MAX_ITERATIONS ?? DEFAULT_MONTE_CARLO_LIMITS.maxIterations,
      chunkSize: e.VALUATION_MC_CHUNK_SIZE ?? DEFAULT_MONTE_CARLO_LIMITS.chunkSize,
    },
    histogramBins: e.VALUATION_HISTOGRAM_BINS ?? DEFAULT_HISTOGRAM_BINS,
  };
}
