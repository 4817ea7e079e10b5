/**
 * Multi-Product DCF — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { parseCompany } from "@/lib/valuationModel/company";
import { ValuationError } from "@/lib/valuationModel/errors";
import { explicitGrowthSchedule, multiProductDcf, type ProductSegment } from "../index";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

/** WACC 10%: all-equity, beta 1, rf 3%, MRP 7% */
const HOLDCO = parseCompany({
  name: "Segmented Co",
  industry: "software",
  stage: "growth",
  revenue: 1500,
  netIncome: 200,
  taxRate: 0.25,
  beta: 1,
  riskFreeRate: 0.03,
  marketRiskPremium: 0.07,
  targetDebtRatio: 0,
  totalDebt: 100,
  cashAndEquivalents: 50,
});

const CLOUD: ProductSegment = {
  name: "Cloud",
  revenue: 1000,
  revenueWeight: 0.6,
  growthPath: [0.1],
  terminalGrowthRate: 0.02,
  operatingMargin: 0.2,
};

/** Zero growth, depreciation equal to capex: FCF is flat at 75 */
const LICENSES: ProductSegment = {
  name: "Licenses",
  revenue: 500,
  revenueWeight: 0.4,
  growthPath: [0],
  terminalGrowthRate: 0,
  operatingMargin: 0.2,
  reinvestment: { capexRatio: 0.04, depreciationRatio: 0.04 },
};

function approx(actual: number, expected: number, tol = 1e-9): void {
  assert.ok(Math.abs(actual - expected) < tol, `expected ${expected}, got ${actual}`);
}

function isInvalid(parameter: string) {
  return (e: unknown) =>
    e instanceof ValuationError && e.code === "INVALID_INPUT" && e.parameter === parameter;
}

// ---------------------------------------------------------------------------
// Growth path
// ---------------------------------------------------------------------------

describe("explicitGrowthSchedule", () => {
  it("falls back to terminal growth after the path ends", () => {
    assert.deepEqual(explicitGrowthSchedule([0.2, 0.1], 0.03, 4), [0.2, 0.1, 0.03, 0.03]);
  });

  it("truncates a path longer than the horizon", () => {
    assert.deepEqual(explicitGrowthSchedule([0.2, 0.1, 0.05], 0.03, 2), [0.2, 0.1]);
  });
});

// ---------------------------------------------------------------------------
// multiProductDcf
// ---------------------------------------------------------------------------

describe("multiProductDcf", () => {
  const r = multiProductDcf(HOLDCO, [LICENSES, CLOUD], { projectionYears: 1 });

  it("values each segment as its own DCF", () => {
    const [licenses, cloud] = r.details.segments;
    // fcf 165; pv 150; TV 165*1.02/0.08 = 2103.75; pvTV 1912.5
    approx(cloud.pvForecasts, 150);
    approx(cloud.terminalValue, 2103.75);
    approx(cloud.enterpriseValue, 2062.5);
    approx(cloud.revenueCagr, 0.1);
    // fcf 75 forever at 10%
    approx(licenses.enterpriseValue, 750, 1e-6);
    approx(licenses.wacc, 0.1, 1e-12);
  });

  it("sums segment values and bridges to equity", () => {
    assert.equal(r.method, "MULTI_PRODUCT_DCF");
    approx(r.details.enterpriseValue, 2812.5, 1e-6);
    approx(r.details.netDebt, 50);
    approx(r.value, 2762.5, 1e-6);
    assert.equal(r.details.totalRevenue, 1500);
    assert.equal(r.assumptions.segmentCount, 2);
  });

  it("ranks contributions largest first", () => {
    assert.deepEqual(
      r.details.contributions.map((c) => c.name),
      ["Cloud", "Licenses"],
    );
    approx(r.details.contributions[0].share, 2062.5 / 2812.5, 1e-9);
  });

  it("consolidates cash flows by year", () => {
    const [year1] = r.details.consolidatedForecasts;
    assert.equal(year1.year, 1);
    approx(year1.revenue, 1600);
    approx(year1.fcf, 240);
    approx(year1.capex, 20);
  });

  it("discounts a segment at its own beta", () => {
    const own = multiProductDcf(HOLDCO, [CLOUD, { ...LICENSES, beta: 1.5 }], {
      projectionYears: 1,
    });
    const licenses = own.details.segments[1];
    approx(licenses.wacc, 0.135, 1e-12);
    approx(licenses.enterpriseValue, 75 / 0.135, 1e-6);
    approx(own.details.wacc, 0.1, 1e-12);
  });

  it("follows the explicit growth path", () => {
    const paths = multiProductDcf(
      HOLDCO,
      [{ ...CLOUD, growthPath: [0.2, 0.1], terminalGrowthRate: 0.03 }, LICENSES],
      { projectionYears: 4 },
    );
    assert.deepEqual(
      paths.details.segments[0].forecasts.map((f) => f.growthRate),
      [0.2, 0.1, 0.03, 0.03],
    );
    assert.equal(paths.details.consolidatedForecasts.length, 4);
  });

  it("accepts a segment above WACC under the exit-multiple method", () => {
    const exit = multiProductDcf(HOLDCO, [{ ...CLOUD, terminalGrowthRate: 0.12 }, LICENSES], {
      projectionYears: 1,
      terminalMethod: "exitMultiple",
    });
    approx(exit.details.segments[0].terminalValue, 1650);
  });

  it("raises DEGENERATE_MODEL naming the segment whose WACC does not clear growth", () => {
    assert.throws(
      () => multiProductDcf(HOLDCO, [{ ...CLOUD, terminalGrowthRate: 0.12 }, LICENSES]),
      (e: unknown) =>
        e instanceof ValuationError &&
        e.code === "DEGENERATE_MODEL" &&
        e.parameter === "wacc" &&
        e.message.startsWith('Segment "Cloud"'),
    );
  });

  it("rejects weights that do not sum to 1", () => {
    assert.throws(
      () => multiProductDcf(HOLDCO, [CLOUD, { ...LICENSES, revenueWeight: 0.3 }]),
      isInvalid("segments"),
    );
  });

  it("rejects an empty segment list", () => {
    assert.throws(() => multiProductDcf(HOLDCO, []), isInvalid("segments"));
  });

  it("rejects growth outside [-50%, 100%]", () => {
    assert.throws(
      () => multiProductDcf(HOLDCO, [{ ...CLOUD, growthPath: [1.5] }, LICENSES]),
      isInvalid("segments.0.growthPath.0"),
    );
  });

  it("rejects duplicate segment names", () => {
    assert.throws(
      () => multiProductDcf(HOLDCO, [{ ...CLOUD, revenueWeight: 0.5 }, { ...CLOUD, revenueWeight: 0.5 }]),
      isInvalid("segments.1.name"),
    );
  });
});
