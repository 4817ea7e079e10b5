/**
 * Valuation History — In-Memory Store
 */

import { randomUUID } from "node:crypto";
import type { ValuationBundle } from "@/lib/valuationEngine/types";
import { fromHistoryRow, resolveLimit, toHistoryRow, type HistoryRow } from "./rows";
import type { ListHistoryOptions, ValuationHistoryRecord, ValuationHistoryStore } from "./types";

export class InMemoryValuationHistoryStore implements ValuationHistoryStore {
  private readonly rows: HistoryRow[] = [];

  async save(bundle: ValuationBundle): Promise<string> {
    const id = randomUUID();
    this.rows.push({ ...toHistoryRow(bundle), id });
    return id;
  }

  async get(id: string): Promise<ValuationHistoryRecord | null> {
    const row = this.rows.find((r) => r.id === id);
    return row ? fromHistoryRow(row) : null;
  }

  async list(opts: ListHistoryOptions = {}): Promise<ValuationHistoryRecord[]> {
    const limit = resolveLimit(opts.limit);
    // Newest first; equal timestamps keep reverse insertion order
    return [...this.rows]
      .reverse()
      .sort((a, b) => (a.created_at < b.created_at ? 1 : a.created_at > b.created_at ? -1 : 0))
      .slice(0, limit)
      .map(fromHistoryRow);
  }
}
