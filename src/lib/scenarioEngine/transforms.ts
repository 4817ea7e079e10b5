/**
 * Scenario Engine - Assumption Transforms
 *
 * Maps a ScenarioConfig onto DCF overrides. The company is never modified.
 */

import type { Company, ScenarioConfig } from "@/lib/valuationModel/types";
import type { DcfOverrides } from "@/lib/dcfEngine/types";

/** Upper bound for an adjusted operating margin */
export const MAX_SCENARIO_MARGIN = 0.99;

/**
 * - growth:          max(0, g + adj)
 * - margin:          clamp(m + adj, 0, MAX_SCENARIO_MARGIN)
 * - terminal growth: g + adj, floored at 0 when adj is negative
 * - wacc:            additive adjustment on the computed WACC
 */
export function scenarioOverrides(company: Company, scenario: ScenarioConfig): DcfOverrides {
  const terminalAdj = scenario.terminalGrowthAdj ?? 0;
  const terminal = company.terminalGrowthRate + terminalAdj;

  return {
    growthRate: Math.max(0, company.growthRate + scenario.revenueGrowthAdj),
    operatingMargin: Math.min(
      MAX_SCENARIO_MARGIN,
      Math.max(0, company.operatingMargin + scenario.marginAdj),
    ),
    terminalGrowthRate: terminalAdj < 0 ? Math.max(0, terminal) : terminal,
    waccAdjustment: scenario.waccAdj,
  };
}
