/**
 * Stress Engine — Model Transforms
 *
 * Pure functions that turn a stress shock into DCF overrides.
 * The company is never mutated; every transform returns a new object.
 */

import type { Company } from "@/lib/valuationModel/types";
import type { DcfOverrides } from "@/lib/dcfEngine/types";

// ---------------------------------------------------------------------------
// Revenue Shock
// ---------------------------------------------------------------------------

/**
 * Scale the base revenue level.
 *
 * - shock = -0.30 → revenue reduced by 30%
 * - Growth, margin and WACC are untouched
 */
export function applyRevenueShock(company: Company, shock: number): DcfOverrides {
  return { revenue: company.revenue * (1 + shock) };
}

// ---------------------------------------------------------------------------
// Margin Compression
// ---------------------------------------------------------------------------

/** Remove `compression` points of operating margin, floored at 0. */
export function applyMarginCompression(company: Company, compression: number): DcfOverrides {
  return { operatingMargin: Math.max(0, company.operatingMargin - compression) };
}

// ---------------------------------------------------------------------------
// WACC Shock
// ---------------------------------------------------------------------------

/** Add `shock` to the computed WACC. */
export function applyWaccShock(shock: number): DcfOverrides {
  return { waccAdjustment: shock };
}

// ---------------------------------------------------------------------------
// Growth Slowdown
// ---------------------------------------------------------------------------

/** Multiply the growth rate by `factor` (0.5 halves growth). */
export function applyGrowthSlowdown(company: Company, factor: number): DcfOverrides {
  return { growthRate: company.growthRate * factor };
}

/** Combine override sets; later sets win per field. */
export function combineOverrides(...sets: DcfOverrides[]): DcfOverrides {
  return sets.reduce<DcfOverrides>((acc, s) => ({ ...acc, ...s }), {});
}
