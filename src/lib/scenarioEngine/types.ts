/**
 * Scenario Engine - Types
 */

import type { EngineFailure } from "@/lib/valuationModel/errors";
import type { ScenarioConfig, ValuationResult } from "@/lib/valuationModel/types";
import type { DcfResult } from "@/lib/dcfEngine/types";

export type BuiltInScenarioName = "base" | "bull" | "bear";

/** Name reserved for the statistics block of a comparison. */
export const RESERVED_SCENARIO_NAME = "statistics";

export interface ScenarioValuation {
  config: ScenarioConfig;
  valuation: DcfResult;
  value: number;
}

export interface ScenarioStatistics {
  mean: number;
  median: number;
  std: number;
  min: number;
  max: number;
  /** max - min */
  spread: number;
  count: number;
}

export interface ScenarioFailure {
  scenario: string;
  error: EngineFailure;
}

export interface ScenarioComparison {
  scenarios: Record<string, ScenarioValuation>;
  /** null when every scenario failed */
  statistics: ScenarioStatistics | null;
  failures: ScenarioFailure[];
}

export interface WeightedScenario {
  scenario: ScenarioConfig;
  probability: number;
}

export interface ScenarioContribution {
  scenario: string;
  probability: number;
  value: number;
  contribution: number;
}

export interface ProbabilityWeightedDetails {
  scenarioValues: ScenarioContribution[];
  totalProbability: number;
}

export type ProbabilityWeightedResult = ValuationResult<ProbabilityWeightedDetails>;
