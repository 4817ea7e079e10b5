/**
 * Sensitivity Engine — Public API
 *
 * One-way, two-way, tornado and comprehensive sensitivity over the DCF
 * kernel, plus multiple sensitivity for relative valuation.
 */

// Re-export types
export type {
  SensitivityParameter,
  SweepOptions,
  OneWayOptions,
  SensitivityPoint,
  OneWaySensitivity,
  TwoWayOptions,
  TwoWaySensitivity,
  TornadoEntry,
  ParameterImpact,
  ComprehensiveSensitivity,
  MultipleSensitivityOptions,
  MultipleSensitivityPoint,
  MultipleSensitivity,
} from "./types";
export {
  SENSITIVITY_PARAMETERS,
  DEFAULT_SENSITIVITY_STEPS,
  DEFAULT_SPREAD_PCT,
  ZERO_BASE_HALF_WIDTH,
} from "./types";

// Re-export sub-modules
export { baseParameterValue, buildSweep } from "./sweep";
export { oneWaySensitivity } from "./oneWay";
export { twoWaySensitivity, twoWaySensitivityAsync } from "./twoWay";
export { tornadoChartData, comprehensiveSensitivity } from "./tornado";
export { multipleSensitivity } from "./multipleSensitivity";
