/**
 * Scenario Engine - Scenario Runner
 *
 * Runs scenarios through the DCF kernel, compares them and computes a
 * probability-weighted expected value.
 */

import { ValuationError, toEngineFailure } from "@/lib/valuationModel/errors";
import { createValuationResult } from "@/lib/valuationModel/results";
import type { Company, ScenarioConfig } from "@/lib/valuationModel/types";
import { summarize } from "@/lib/statistics";
import { dcfValuation } from "@/lib/dcfEngine";
import type { DcfOptions, DcfResult } from "@/lib/dcfEngine/types";
import { BUILT_IN_SCENARIOS } from "./scenarios";
import { scenarioOverrides } from "./transforms";
import {
  RESERVED_SCENARIO_NAME,
  type ProbabilityWeightedResult,
  type ScenarioComparison,
  type ScenarioContribution,
  type ScenarioFailure,
  type ScenarioValuation,
  type WeightedScenario,
} from "./types";

/**
 * Value the company under a single scenario.
 *
 * Pure function — deterministic, no side effects.
 */
export function runScenario(
  company: Company,
  scenario: ScenarioConfig,
  options: DcfOptions = {},
): DcfResult {
  const result = dcfValuation(company, scenarioOverrides(company, scenario), options);
  return createValuationResult({
    ...result,
    assumptions: { ...result.assumptions, scenario: scenario.name },
  });
}

function assertScenarioNames(scenarios: readonly ScenarioConfig[]): void {
  const seen = new Set<string>();
  for (const s of scenarios) {
    if (s.name === RESERVED_SCENARIO_NAME) {
      throw new ValuationError(
        "INVALID_INPUT",
        `"${RESERVED_SCENARIO_NAME}" is a reserved scenario name`,
        { parameter: "scenario.name" },
      );
    }
    if (seen.has(s.name)) {
      throw new ValuationError("INVALID_INPUT", `Duplicate scenario name: ${s.name}`, {
        parameter: "scenario.name",
      });
    }
    seen.add(s.name);
  }
}

/**
 * Value every scenario (default base / bull / bear) and summarise the
 * spread. A scenario whose model is degenerate is recorded in `failures`
 * and excluded from the statistics.
 */
export function compareScenarios(
  company: Company,
  scenarios: readonly ScenarioConfig[] = BUILT_IN_SCENARIOS,
  options: DcfOptions = {},
): ScenarioComparison {
  assertScenarioNames(scenarios);

  const results: Record<string, ScenarioValuation> = {};
  const failures: ScenarioFailure[] = [];
  const values: number[] = [];

  for (const config of scenarios) {
    try {
      const valuation = runScenario(company, config, options);
      results[config.name] = { config, valuation, value: valuation.value };
      values.push(valuation.value);
    } catch (e) {
      failures.push({ scenario: config.name, error: toEngineFailure(e) });
    }
  }

  const s = summarize(values);
  return {
    scenarios: results,
    statistics: s
      ? {
          mean: s.mean,
          median: s.median,
          std: s.std,
          min: s.min,
          max: s.max,
          spread: s.max - s.min,
          count: s.count,
        }
      : null,
    failures,
  };
}

/**
 * Expected value across scenarios weighted by probability, normalised by
 * the total probability so weights need not sum to 1.
 */
export function scenarioProbabilityAnalysis(
  company: Company,
  weighted: readonly WeightedScenario[],
  options: DcfOptions = {},
): ProbabilityWeightedResult {
  if (weighted.length === 0) {
    throw new ValuationError("INVALID_INPUT", "At least one scenario is required", {
      parameter: "scenarios",
    });
  }
  for (const w of weighted) {
    if (!Number.isFinite(w.probability) || w.probability < 0) {
      throw new ValuationError(
        "INVALID_INPUT",
        `Probability for ${w.scenario.name} must be a finite number >= 0`,
        { parameter: "probability" },
      );
    }
  }
  const totalProbability = weighted.reduce((s, w) => s + w.probability, 0);
  if (totalProbability <= 0) {
    throw new ValuationError("INVALID_INPUT", "Total probability must be > 0", {
      parameter: "probability",
    });
  }

  const scenarioValues: ScenarioContribution[] = weighted.map((w) => {
    const value = runScenario(company, w.scenario, options).value;
    return {
      scenario: w.scenario.name,
      probability: w.probability,
      value,
      contribution: value * w.probability,
    };
  });

  const expected = scenarioValues.reduce((s, v) => s + v.contribution, 0) / totalProbability;

  return createValuationResult({
    method: "SCENARIO_WEIGHTED",
    value: expected,
    valueLow: Math.min(...scenarioValues.map((v) => v.value)),
    valueHigh: Math.max(...scenarioValues.map((v) => v.value)),
    details: { scenarioValues, totalProbability },
    assumptions: { scenarioCount: scenarioValues.length, totalProbability },
  });
}
