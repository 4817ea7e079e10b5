/**
 * Market Data — Public API
 */

export type { MarketDataSource, ComparableQuery, CompanyFinancials } from "./types";
export type { FetchLike, TushareConfig } from "./tushare";
export {
  TushareMarketDataSource,
  TushareApiError,
  relatedIndustries,
  DEFAULT_TUSHARE_API_URL,
  DEFAULT_COMPARABLE_LIMIT,
} from "./tushare";
export { InMemoryMarketDataSource } from "./inMemory";
