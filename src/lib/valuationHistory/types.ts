/**
 * Valuation History — Types
 */

import type { Confidence, ValuationBundle } from "@/lib/valuationEngine/types";

export interface ValuationHistoryRecord {
  id: string;
  companyName: string;
  industry: string;
  stage: string;
  finalValue: number | null;
  valueLow: number | null;
  valueHigh: number | null;
  confidence: Confidence | null;
  methodsUsed: number;
  /** ISO-8601 */
  createdAt: string;
  /** The full bundle as stored; JSON round-tripped */
  payload: unknown;
}

export interface ListHistoryOptions {
  limit?: number;
}

export interface ValuationHistoryStore {
  /** Persist a bundle and return its id */
  save(bundle: ValuationBundle): Promise<string>;
  get(id: string): Promise<ValuationHistoryRecord | null>;
  /** Newest first */
  list(opts?: ListHistoryOptions): Promise<ValuationHistoryRecord[]>;
}
