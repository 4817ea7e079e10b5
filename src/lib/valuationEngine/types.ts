/**
 * Valuation Engine — Types
 */

import type { EngineFailure, EngineResult } from "@/lib/valuationModel/errors";
import type {
  Comparable,
  CompanyStage,
  ValuationMethod,
  ValuationResult,
} from "@/lib/valuationModel/types";
import type { DcfResult } from "@/lib/dcfEngine/types";
import type {
  CompositeResult,
  MultipleMethod,
  RelativeValuationMap,
  RelativeValuationOptions,
} from "@/lib/relativeValuation/types";
import type { ScenarioComparison } from "@/lib/scenarioEngine/types";
import type { MonteCarloOptions, StressReport } from "@/lib/stressEngine/types";
import type { ComprehensiveSensitivity } from "@/lib/sensitivityEngine/types";
import type { MarketDataSource } from "@/lib/marketData/types";
import type { ValuationHistoryStore } from "@/lib/valuationHistory/types";
import type { EngineConfig } from "@/lib/env/server";

export type Confidence = "high" | "medium" | "low";

export type ValuationStep = "relative" | "dcf" | "scenario" | "stressTest" | "sensitivity";

export interface ValuationStepError {
  step: ValuationStep;
  error: EngineFailure;
}

export interface MethodValue {
  source: "relative" | "absolute";
  method: ValuationMethod;
  value: number;
  valueLow?: number;
  valueHigh?: number;
}

export interface Recommendation {
  /** Median of the positive method values */
  finalValue: number;
  /** [min * 0.9, max * 1.1] over the same values */
  valueRange: [number, number];
  confidence: Confidence;
  /** Population std / mean of the method values */
  coefficientOfVariation: number;
  methodsUsed: number;
  methodDetails: MethodValue[];
}

export interface RiskAnalysis {
  scenario?: ScenarioComparison;
  stressTest?: StressReport;
  sensitivity?: ComprehensiveSensitivity;
}

export interface ValuationBundle {
  company: string;
  industry: string;
  stage: CompanyStage;
  /** ISO-8601 */
  timestamp: string;
  comparablesUsed: number;
  valuationMethods: {
    relative: RelativeValuationMap;
    composite: CompositeResult | null;
    absolute: { DCF: DcfResult } | null;
  };
  riskAnalysis: RiskAnalysis;
  recommendation: Recommendation | null;
  /** Steps that failed; the rest of the bundle is still valid */
  errors: ValuationStepError[];
  /** Set when the bundle was persisted */
  historyId?: string;
}

export interface FullValuationOptions {
  comparables?: readonly Comparable[];
  /** Queried for comparables when none are supplied */
  marketData?: MarketDataSource;
  /** Industry keyword for the market-data query; defaults to company.industry */
  industry?: string;
  comparableLimit?: number;
  methods?: readonly MultipleMethod[];
  relative?: RelativeValuationOptions;
  enableRiskAnalysis?: boolean;
  /** Passed to the stress report's Monte Carlo run (iterations, seed, ...) */
  monteCarlo?: Omit<MonteCarloOptions, "limits">;
  history?: ValuationHistoryStore;
  config?: EngineConfig;
  clock?: () => Date;
}

export type QuickMethod = "auto" | "DCF" | MultipleMethod | "VC";

export type AnyValuationResult = ValuationResult<unknown>;

export interface BatchValuationOptions {
  comparables?: readonly Comparable[];
  config?: EngineConfig;
  /** Companies valued at once */
  concurrency?: number;
}

export interface BatchEntry {
  company: string;
  result: EngineResult<ValuationBundle>;
}
