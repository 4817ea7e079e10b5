/**
 * Company Valuation CLI
 *
 * Values one company from a JSON file and prints the result as JSON.
 *
 * Exit codes:
 *   0  valuation succeeded
 *   1  invalid arguments, unreadable input, or a failed valuation
 *
 * Usage:
 *   npx tsx scripts/valuate.ts --company scripts/fixtures/company.json
 *   npx tsx scripts/valuate.ts --company c.json --comparables peers.json --no-risk
 *   npx tsx scripts/valuate.ts --company c.json --quick auto
 *   npx tsx scripts/valuate.ts --help
 *
 * Optional env vars:
 *   TUSHARE_TOKEN                                comparables from Tushare when --comparables is absent
 *   SUPABASE_URL + SUPABASE_SERVICE_ROLE_KEY     save each full valuation to valuation_history
 *   VALUATION_MC_* / VALUATION_HISTOGRAM_BINS    Monte Carlo limits
 */

import { readFileSync } from "node:fs";
import { loadEngineConfig } from "@/lib/env/server";
import { createSupabaseAdmin } from "@/lib/supabase/admin";
import { parseComparables } from "@/lib/valuationModel/company";
import { CompanyInputSchema } from "@/lib/valuationModel/schemas";
import type { Comparable } from "@/lib/valuationModel/types";
import { TushareMarketDataSource } from "@/lib/marketData";
import { SupabaseValuationHistoryStore } from "@/lib/valuationHistory";
import { fullValuation, quickValuation, type QuickMethod } from "@/lib/valuationEngine";

// ── CLI arg parsing ─────────────────────────────────────────────────────────

const QUICK_METHODS: readonly QuickMethod[] = ["auto", "DCF", "PE", "PS", "PB", "EV_EBITDA", "VC"];

interface CliArgs {
  company: string | null;
  comparables: string | null;
  quick: QuickMethod | null;
  risk: boolean;
  seed: number | null;
  help: boolean;
}

function isQuickMethod(value: string): value is QuickMethod {
  return QUICK_METHODS.some((m) => m === value);
}

function fail(message: string): never {
  console.error(`[valuate] ${message}`);
  process.exit(1);
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { company: null, comparables: null, quick: null, risk: true, seed: null, help: false };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const next = argv[i + 1];
    if (flag === "--help" || flag === "-h") {
      args.help = true;
    } else if (flag === "--no-risk") {
      args.risk = false;
    } else if (flag === "--company" || flag === "--comparables") {
      if (!next) fail(`Missing path after ${flag}`);
      args[flag === "--company" ? "company" : "comparables"] = next;
      i++;
    } else if (flag === "--quick") {
      if (!next || !isQuickMethod(next)) {
        fail(`Invalid --quick value: ${next} (expected one of ${QUICK_METHODS.join(", ")})`);
      }
      args.quick = next;
      i++;
    } else if (flag === "--seed") {
      const val = parseInt(next ?? "", 10);
      if (isNaN(val)) fail(`Invalid --seed value: ${next}`);
      args.seed = val;
      i++;
    } else {
      fail(`Unknown argument: ${flag}`);
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
Company Valuation
=================
Runs relative valuation, DCF and (unless --no-risk) scenario, stress and
sensitivity analysis, then prints the bundle as JSON.

Usage:
  npx tsx scripts/valuate.ts --company <file> [options]

Options:
  --company FILE       Company JSON (required)
  --comparables FILE   Comparable companies JSON array
  --quick METHOD       Single method: ${QUICK_METHODS.join(" | ")}
  --no-risk            Skip scenario, stress and sensitivity analysis
  --seed N             Monte Carlo seed
  --help               Show this help text
`);
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch (e) {
    fail(`Cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

// ── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (!args.company) fail("--company is required (see --help)");

  const parsed = CompanyInputSchema.safeParse(readJson(args.company));
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      console.error(`  ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    }
    fail(`Invalid company in ${args.company}`);
  }
  const input = parsed.data;
  const comparables: Comparable[] | undefined = args.comparables
    ? parseComparables(readJson(args.comparables))
    : undefined;

  if (args.quick) {
    const result = quickValuation(input, args.quick, comparables);
    console.log(JSON.stringify(result, null, 2));
    process.exit(result.ok ? 0 : 1);
  }

  const config = loadEngineConfig();
  const marketData = config.tushare
    ? new TushareMarketDataSource({ token: config.tushare.token, apiUrl: config.tushare.apiUrl })
    : undefined;
  const history = config.supabase
    ? new SupabaseValuationHistoryStore(createSupabaseAdmin(config.supabase))
    : undefined;

  const result = await fullValuation(input, {
    comparables,
    marketData,
    history,
    config,
    enableRiskAnalysis: args.risk,
    monteCarlo: args.seed !== null ? { seed: args.seed } : undefined,
  });

  console.log(JSON.stringify(result, null, 2));
  process.exit(result.ok ? 0 : 1);
}

main().catch((e: unknown) => {
  console.error("\n[valuate] FATAL:", e instanceof Error ? e.message : e);
  process.exit(1);
});
