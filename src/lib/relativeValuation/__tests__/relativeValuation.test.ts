/**
 * Relative Valuation — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { parseCompany, parseComparables } from "@/lib/valuationModel/company";
import { ValuationError } from "@/lib/valuationModel/errors";
import {
  extractMultiples,
  analyzeComparableStatistics,
  peValuation,
  evEbitdaValuation,
  autoComparableAnalysis,
  compositeRelativeValuation,
  relativeValuationCoverage,
  valueFromMultiple,
} from "../index";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const TARGET = parseCompany({
  name: "Target Tech",
  industry: "software",
  stage: "growth",
  revenue: 5000,
  netIncome: 800,
  netAssets: 3000,
  ebitda: 1200,
  totalDebt: 500,
  cashAndEquivalents: 200,
  growthRate: 0.2,
});

const LOSS_MAKER = parseCompany({
  name: "Burn Inc",
  industry: "software",
  stage: "early",
  revenue: 2000,
  netIncome: -100,
  ebitda: -50,
});

const COMPARABLES = parseComparables([
  { name: "Alpha", peRatio: 20, psRatio: 3, pbRatio: 2.5, evEbitda: 12 },
  { name: "Beta", peRatio: 30, psRatio: 4, pbRatio: null, evEbitda: 15 },
  // P/E derived from market cap: 10000 / 400 = 25
  { name: "Gamma", marketCap: 10000, netIncome: 400, psRatio: 5, pbRatio: 3.5, evEbitda: -5 },
  { name: "Delta", peRatio: -10, psRatio: null, pbRatio: 3, evEbitda: 10 },
]);

const NO_MULTIPLES = parseComparables([
  { name: "Empty A" },
  { name: "Empty B", peRatio: 0, psRatio: -2, evEbitda: null },
]);

function approx(actual: number | undefined, expected: number, tol = 1e-6): void {
  assert.ok(
    actual !== undefined && Math.abs(actual - expected) < tol,
    `expected ${expected}, got ${actual}`,
  );
}

// ---------------------------------------------------------------------------
// Multiples
// ---------------------------------------------------------------------------

describe("extractMultiples", () => {
  it("drops null, non-positive and missing multiples and derives from market cap", () => {
    assert.deepEqual(extractMultiples(COMPARABLES, "PE"), [20, 30, 25]);
    assert.deepEqual(extractMultiples(COMPARABLES, "EV_EBITDA"), [12, 15, 10]);
  });

  it("reports per-method statistics", () => {
    const stats = analyzeComparableStatistics(COMPARABLES);
    assert.equal(stats.PS?.median, 4);
    assert.equal(stats.PB?.count, 3);
    assert.equal(stats.PB?.min, 2.5);
  });
});

// ---------------------------------------------------------------------------
// Per-method valuation
// ---------------------------------------------------------------------------

describe("peValuation", () => {
  it("applies the median multiple with a min/max range", () => {
    const r = peValuation(TARGET, COMPARABLES);
    assert.equal(r.method, "PE");
    approx(r.value, 20000);
    approx(r.valueLow, 16000);
    approx(r.valueHigh, 24000);
    assert.equal(r.details.statistics.median, 25);
  });

  it("uses forward earnings when requested", () => {
    const r = peValuation(TARGET, COMPARABLES, { useForwardMetrics: true });
    approx(r.details.metric, 960);
    approx(r.value, 24000);
    assert.equal(r.details.isForward, true);
  });

  it("applies illiquidity discount and control premium", () => {
    const r = peValuation(TARGET, COMPARABLES, { illiquidityDiscount: 0.2, controlPremium: 0.1 });
    approx(r.details.adjustmentFactor, 0.9);
    approx(r.value, 18000);
  });

  it("rejects a non-positive metric", () => {
    assert.throws(
      () => peValuation(LOSS_MAKER, COMPARABLES),
      (e: unknown) => e instanceof ValuationError && e.code === "UNSUPPORTED_METHOD",
    );
  });

  it("raises MISSING_DATA with no valid multiples", () => {
    assert.throws(
      () => peValuation(TARGET, NO_MULTIPLES),
      (e: unknown) => e instanceof ValuationError && e.code === "MISSING_DATA",
    );
  });
});

describe("evEbitdaValuation", () => {
  it("bridges enterprise value to equity", () => {
    const r = evEbitdaValuation(TARGET, COMPARABLES);
    approx(r.details.enterpriseValue, 14400);
    approx(r.details.netDebt, 300);
    approx(r.value, 14100);
    approx(r.valueLow, 11700);
    approx(r.valueHigh, 17700);
  });
});

describe("valueFromMultiple", () => {
  it("values P/S at an arbitrary multiple", () => {
    approx(valueFromMultiple(TARGET, "PS", 2), 10000);
  });
});

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------

describe("autoComparableAnalysis", () => {
  it("runs all four methods by default", () => {
    const r = autoComparableAnalysis(TARGET, COMPARABLES);
    assert.deepEqual(Object.keys(r).sort(), ["EV_EBITDA", "PB", "PE", "PS"]);
    approx(r.PS?.value, 20000);
    approx(r.PB?.value, 9000);
  });

  it("returns an empty mapping when no comparable is usable", () => {
    assert.deepEqual(autoComparableAnalysis(TARGET, NO_MULTIPLES), {});
    assert.deepEqual(autoComparableAnalysis(TARGET, []), {});
  });

  it("skips methods whose company metric is not positive", () => {
    const r = autoComparableAnalysis(LOSS_MAKER, COMPARABLES);
    assert.equal(r.PE, undefined);
    assert.equal(r.EV_EBITDA, undefined);
    assert.ok(r.PS);
  });

  it("runs only the requested methods", () => {
    const r = autoComparableAnalysis(TARGET, COMPARABLES, { methods: ["PB"] });
    assert.deepEqual(Object.keys(r), ["PB"]);
  });

  it("rejects invalid options instead of skipping", () => {
    assert.throws(
      () => autoComparableAnalysis(TARGET, COMPARABLES, { illiquidityDiscount: 1.5 }),
      (e: unknown) => e instanceof ValuationError && e.code === "INVALID_INPUT",
    );
  });
});

describe("compositeRelativeValuation", () => {
  it("weights the four methods 0.3 / 0.3 / 0.2 / 0.2", () => {
    const composite = compositeRelativeValuation(autoComparableAnalysis(TARGET, COMPARABLES));
    assert.ok(composite);
    // 20000*.3 + 20000*.3 + 9000*.2 + 14100*.2
    approx(composite.value, 16620);
    approx(composite.valueLow, 7500);
    approx(composite.valueHigh, 25000);
    assert.deepEqual(composite.details.methodsUsed, ["PE", "PS", "PB", "EV_EBITDA"]);
  });

  it("renormalises weights over the available methods", () => {
    const r = autoComparableAnalysis(TARGET, COMPARABLES, { methods: ["PE", "PB"] });
    const composite = compositeRelativeValuation(r);
    assert.ok(composite);
    // 20000 * 0.6 + 9000 * 0.4
    approx(composite.value, 15600);
    approx(composite.details.normalizedWeights.PE, 0.6);
  });

  it("returns undefined for fewer than two methods", () => {
    const r = autoComparableAnalysis(TARGET, COMPARABLES, { methods: ["PE"] });
    assert.equal(compositeRelativeValuation(r), undefined);
  });
});

describe("relativeValuationCoverage", () => {
  it("explains why each unusable method is skipped", () => {
    const coverage = relativeValuationCoverage(LOSS_MAKER, COMPARABLES);
    assert.deepEqual(
      coverage.map((c) => [c.method, c.usable, c.reason ?? null]),
      [
        ["PE", false, "NON_POSITIVE_METRIC"],
        ["PS", true, null],
        ["PB", false, "NON_POSITIVE_METRIC"],
        ["EV_EBITDA", false, "NON_POSITIVE_METRIC"],
      ],
    );
  });

  it("flags methods without valid multiples", () => {
    const coverage = relativeValuationCoverage(TARGET, NO_MULTIPLES);
    assert.ok(coverage.every((c) => c.reason === "NO_VALID_MULTIPLES"));
  });
});
