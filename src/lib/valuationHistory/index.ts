/**
 * Valuation History — Public API
 */

export type { ValuationHistoryRecord, ValuationHistoryStore, ListHistoryOptions } from "./types";
export type { HistoryInsertRow, HistoryRow } from "./rows";
export {
  VALUATION_HISTORY_TABLE,
  DEFAULT_HISTORY_LIMIT,
  HistoryRowSchema,
  toHistoryRow,
  fromHistoryRow,
} from "./rows";
export { SupabaseValuationHistoryStore } from "./supabase";
export { InMemoryValuationHistoryStore } from "./inMemory";
