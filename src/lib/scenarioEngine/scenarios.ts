/**
 * Scenario Engine - Scenario Definitions
 *
 * Built-in base / bull / bear cases. Adjustments are additive deltas on
 * the company's own assumptions.
 */

import { ValuationError } from "@/lib/valuationModel/errors";
import type { ScenarioConfig } from "@/lib/valuationModel/types";
import type { BuiltInScenarioName } from "./types";

// ---------------------------------------------------------------------------
// Scenario Definitions
// ---------------------------------------------------------------------------

const BASE: ScenarioConfig = {
  name: "base",
  revenueGrowthAdj: 0,
  marginAdj: 0,
  waccAdj: 0,
  terminalGrowthAdj: 0,
};

const BULL: ScenarioConfig = {
  name: "bull",
  revenueGrowthAdj: 0.2,
  marginAdj: 0.05,
  waccAdj: -0.01,
  terminalGrowthAdj: 0.005,
};

const BEAR: ScenarioConfig = {
  name: "bear",
  revenueGrowthAdj: -0.2,
  marginAdj: -0.05,
  waccAdj: 0.02,
  terminalGrowthAdj: -0.005,
};

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const BUILT_IN_SCENARIOS: readonly ScenarioConfig[] = Object.freeze([BASE, BULL, BEAR]);

export function getScenario(name: BuiltInScenarioName): ScenarioConfig {
  const found = BUILT_IN_SCENARIOS.find((s) => s.name === name);
  if (!found) {
    throw new ValuationError("INVALID_INPUT", `Unknown scenario: ${name}`, {
      parameter: "scenario",
    });
  }
  return found;
}
