/**
 * Market Data — In-Memory Source
 *
 * Serves a fixed set of comparables, e.g. loaded from a JSON file or
 * supplied by tests. Industry matching is a case-insensitive substring test.
 */

import type { Comparable } from "@/lib/valuationModel/types";
import { DEFAULT_COMPARABLE_LIMIT } from "./tushare";
import type { CompanyFinancials, ComparableQuery, MarketDataSource } from "./types";

export class InMemoryMarketDataSource implements MarketDataSource {
  private readonly comparables: readonly Comparable[];
  private readonly financials: ReadonlyMap<string, CompanyFinancials>;

  constructor(comparables: readonly Comparable[], financials: readonly CompanyFinancials[] = []) {
    this.comparables = comparables;
    this.financials = new Map(financials.map((f) => [f.tsCode, f]));
  }

  async getComparables(industry: string, query: ComparableQuery = {}): Promise<Comparable[]> {
    const needle = industry.trim().toLowerCase();
    const range = query.marketCapRange;

    return this.comparables
      .filter((c) => !needle || c.industry.toLowerCase().includes(needle))
      .filter((c) => {
        if (!range) return true;
        return c.marketCap != null && c.marketCap >= range[0] && c.marketCap <= range[1];
      })
      .slice(0, query.limit ?? DEFAULT_COMPARABLE_LIMIT)
      .map((c) => ({ ...c }));
  }

  async getCompanyFinancials(tsCode: string): Promise<CompanyFinancials | null> {
    const f = this.financials.get(tsCode);
    return f ? { ...f } : null;
  }
}
