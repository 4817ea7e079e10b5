/**
 * Valuation History — Row Mapping
 *
 * valuation_history keeps summary columns for listing plus the full bundle
 * as jsonb in `payload`.
 */

import { z } from "zod";
import type { Confidence, ValuationBundle } from "@/lib/valuationEngine/types";
import type { ValuationHistoryRecord } from "./types";

export const VALUATION_HISTORY_TABLE = "valuation_history";
export const DEFAULT_HISTORY_LIMIT = 20;

export interface HistoryInsertRow {
  company_name: string;
  industry: string;
  stage: string;
  final_value: number | null;
  value_low: number | null;
  value_high: number | null;
  confidence: Confidence | null;
  methods_used: number;
  payload: unknown;
  created_at: string;
}

export const HistoryRowSchema = z.object({
  id: z.string(),
  company_name: z.string(),
  industry: z.string(),
  stage: z.string(),
  final_value: z.number().nullable(),
  value_low: z.number().nullable(),
  value_high: z.number().nullable(),
  confidence: z.enum(["high", "medium", "low"]).nullable(),
  methods_used: z.number().int(),
  payload: z.unknown(),
  created_at: z.string(),
});

export type HistoryRow = z.infer<typeof HistoryRowSchema>;

export function toHistoryRow(bundle: ValuationBundle): HistoryInsertRow {
  const rec = bundle.recommendation;
  return {
    company_name: bundle.company,
    industry: bundle.industry,
    stage: bundle.stage,
    final_value: rec?.finalValue ?? null,
    value_low: rec?.valueRange[0] ?? null,
    value_high: rec?.valueRange[1] ?? null,
    confidence: rec?.confidence ?? null,
    methods_used: rec?.methodsUsed ?? 0,
    payload: JSON.parse(JSON.stringify(bundle)),
    created_at: bundle.timestamp,
  };
}

export function fromHistoryRow(row: HistoryRow): ValuationHistoryRecord {
  return {
    id: row.id,
    companyName: row.company_name,
    industry: row.industry,
    stage: row.stage,
    finalValue: row.final_value,
    valueLow: row.value_low,
    valueHigh: row.value_high,
    confidence: row.confidence,
    methodsUsed: row.methods_used,
    createdAt: row.created_at,
    payload: row.payload,
  };
}

export function resolveLimit(limit: number | undefined): number {
  const n = limit ?? DEFAULT_HISTORY_LIMIT;
  if (!Number.isInteger(n) || n < 1) {
    throw new Error(`[valuationHistory] limit must be a positive integer, got ${n}`);
  }
  return n;
}
