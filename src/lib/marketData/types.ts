/**
 * Market Data — Types
 */

import type { Comparable } from "@/lib/valuationModel/types";

export interface ComparableQuery {
  /** Maximum comparables returned, largest market cap first */
  limit?: number;
  /** Inclusive market-cap bounds, same currency unit as Comparable.marketCap */
  marketCapRange?: readonly [number, number];
}

/** Latest reported figures for one listed company. Missing fields are unknown. */
export interface CompanyFinancials {
  tsCode: string;
  name?: string;
  industry?: string;
  revenue?: number;
  netIncome?: number;
  netAssets?: number;
  marketCap?: number;
  peRatio?: number;
  psRatio?: number;
  pbRatio?: number;
}

export interface MarketDataSource {
  getComparables(industry: string, query?: ComparableQuery): Promise<Comparable[]>;
  /** null when the code is unknown to the source */
  getCompanyFinancials(tsCode: string): Promise<CompanyFinancials | null>;
}
