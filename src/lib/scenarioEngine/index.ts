/**
 * Scenario Engine - Public API
 *
 * Base / bull / bear and custom scenarios valued through the DCF kernel.
 */

export type {
  BuiltInScenarioName,
  ScenarioValuation,
  ScenarioStatistics,
  ScenarioFailure,
  ScenarioComparison,
  WeightedScenario,
  ScenarioContribution,
  ProbabilityWeightedDetails,
  ProbabilityWeightedResult,
} from "./types";
export { RESERVED_SCENARIO_NAME } from "./types";

export { BUILT_IN_SCENARIOS, getScenario } from "./scenarios";
export { scenarioOverrides, MAX_SCENARIO_MARGIN } from "./transforms";
export { runScenario, compareScenarios, scenarioProbabilityAnalysis } from "./runner";
