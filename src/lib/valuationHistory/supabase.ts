/**
 * Valuation History — Supabase Store
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ValuationBundle } from "@/lib/valuationEngine/types";
import {
  HistoryRowSchema,
  VALUATION_HISTORY_TABLE,
  fromHistoryRow,
  resolveLimit,
  toHistoryRow,
} from "./rows";
import type { ListHistoryOptions, ValuationHistoryRecord, ValuationHistoryStore } from "./types";

const InsertedSchema = z.array(z.object({ id: z.string() }));
const RowsSchema = z.array(HistoryRowSchema);

export class SupabaseValuationHistoryStore implements ValuationHistoryStore {
  private readonly client: SupabaseClient;

  constructor(client: SupabaseClient) {
    this.client = client;
  }

  async save(bundle: ValuationBundle): Promise<string> {
    const { data, error } = await this.client
      .from(VALUATION_HISTORY_TABLE)
      .insert(toHistoryRow(bundle))
      .select("id");

    if (error) throw new Error(`[valuationHistory] insert failed: ${error.message}`);

    const inserted = InsertedSchema.parse(data)[0];
    if (!inserted) throw new Error("[valuationHistory] insert returned no id");
    return inserted.id;
  }

  async get(id: string): Promise<ValuationHistoryRecord | null> {
    const { data, error } = await this.client
      .from(VALUATION_HISTORY_TABLE)
      .select("*")
      .eq("id", id)
      .limit(1);

    if (error) throw new Error(`[valuationHistory] get failed: ${error.message}`);

    const row = RowsSchema.parse(data)[0];
    return row ? fromHistoryRow(row) : null;
  }

  async list(opts: ListHistoryOptions = {}): Promise<ValuationHistoryRecord[]> {
    const { data, error } = await this.client
      .from(VALUATION_HISTORY_TABLE)
      .select("*")
      .order("created_at", { ascending: false })
      .limit(resolveLimit(opts.limit));

    if (error) throw new Error(`[valuationHistory] list failed: ${error.message}`);

    return RowsSchema.parse(data).map(fromHistoryRow);
  }
}
