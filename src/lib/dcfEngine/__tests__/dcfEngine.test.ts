/**
 * DCF Engine — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { parseCompany } from "@/lib/valuationModel/company";
import { ValuationError } from "@/lib/valuationModel/errors";
import {
  calculateWacc,
  calculateWaccBreakdown,
  growthSchedule,
  forecastFreeCashFlows,
  calculateTerminalValue,
  dcfValuation,
  dcfSensitivityAnalysis,
} from "../index";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const ACME = parseCompany({
  name: "Acme Software",
  industry: "software",
  stage: "growth",
  revenue: 1000,
  netIncome: 100,
  growthRate: 0.1,
  operatingMargin: 0.2,
  taxRate: 0.25,
  beta: 1.2,
  riskFreeRate: 0.03,
  marketRiskPremium: 0.07,
  targetDebtRatio: 0,
  terminalGrowthRate: 0.02,
});

const LEVERED = parseCompany({
  name: "Levered Co",
  industry: "manufacturing",
  stage: "mature",
  revenue: 1000,
  netIncome: 80,
  totalDebt: 200,
  cashAndEquivalents: 50,
  growthRate: 0.05,
  terminalGrowthRate: 0.02,
});

function approx(actual: number, expected: number, tol = 1e-9): void {
  assert.ok(
    Math.abs(actual - expected) < tol,
    `expected ${expected}, got ${actual}`,
  );
}

// ---------------------------------------------------------------------------
// WACC
// ---------------------------------------------------------------------------

describe("calculateWacc", () => {
  it("equals CAPM cost of equity for an all-equity company", () => {
    approx(calculateWacc(ACME), 0.114, 1e-12);
  });

  it("weights after-tax cost of debt by the target debt ratio", () => {
    // ke = 0.03 + 1.0 * 0.07 = 0.10; kd' = 0.05 * 0.75 = 0.0375
    const b = calculateWaccBreakdown(LEVERED);
    approx(b.costOfEquity, 0.1, 1e-12);
    approx(b.afterTaxCostOfDebt, 0.0375, 1e-12);
    approx(b.wacc, 0.1 * 0.7 + 0.0375 * 0.3, 1e-12);
  });
});

// ---------------------------------------------------------------------------
// Forecast
// ---------------------------------------------------------------------------

describe("growthSchedule", () => {
  it("fades linearly from growth to terminal growth", () => {
    const s = growthSchedule(0.1, 0.02, 5);
    assert.equal(s.length, 5);
    [0.1, 0.08, 0.06, 0.04, 0.02].forEach((g, i) => approx(s[i], g, 1e-12));
  });

  it("uses the growth rate for a single-year horizon", () => {
    assert.deepEqual(growthSchedule(0.3, 0.02, 1), [0.3]);
  });
});

describe("forecastFreeCashFlows", () => {
  it("returns exactly projectionYears records", () => {
    const f = forecastFreeCashFlows(ACME, { projectionYears: 7 });
    assert.equal(f.length, 7);
    assert.deepEqual(
      f.map((r) => r.year),
      [1, 2, 3, 4, 5, 6, 7],
    );
  });

  it("computes year-one NOPAT-based FCF without reinvestment", () => {
    const [y1] = forecastFreeCashFlows(ACME);
    approx(y1.revenue, 1100);
    approx(y1.operatingProfit, 220);
    approx(y1.nopat, 165);
    approx(y1.fcf, 165);
  });

  it("subtracts capex and working capital and adds back depreciation", () => {
    const company = parseCompany({
      name: "Capex Heavy",
      industry: "industrial",
      stage: "mature",
      revenue: 1000,
      netIncome: 50,
      growthRate: 0.1,
      operatingMargin: 0.2,
      taxRate: 0.25,
      reinvestment: { capexRatio: 0.05, workingCapitalRatio: 0.02, depreciationRatio: 0.03 },
    });
    const [y1] = forecastFreeCashFlows(company);
    // 165 + 33 - 55 - 22
    approx(y1.fcf, 121);
  });

  it("rejects a non-integer horizon", () => {
    assert.throws(
      () => forecastFreeCashFlows(ACME, { projectionYears: 2.5 }),
      (e: unknown) => e instanceof ValuationError && e.code === "INVALID_INPUT",
    );
  });
});

// ---------------------------------------------------------------------------
// Terminal value
// ---------------------------------------------------------------------------

describe("calculateTerminalValue", () => {
  it("uses the Gordon growth formula by default", () => {
    approx(calculateTerminalValue(100, 0.1, 0.02), 1275);
  });

  it("supports an exit multiple", () => {
    assert.equal(calculateTerminalValue(100, 0.1, 0.02, "exitMultiple"), 1000);
    assert.equal(calculateTerminalValue(100, 0.1, 0.02, "exitMultiple", 8), 800);
  });

  it("rejects WACC at or within the minimum spread of terminal growth", () => {
    for (const wacc of [0.02, 0.0205, 0.01]) {
      assert.throws(
        () => calculateTerminalValue(100, wacc, 0.02),
        (e: unknown) =>
          e instanceof ValuationError && e.code === "DEGENERATE_MODEL" && e.parameter === "wacc",
      );
    }
  });
});

// ---------------------------------------------------------------------------
// DCF valuation
// ---------------------------------------------------------------------------

describe("dcfValuation", () => {
  it("values a one-year horizon exactly", () => {
    const r = dcfValuation(ACME, { wacc: 0.1 }, { projectionYears: 1 });
    // fcf 165; pv 150; TV 165*1.02/0.08 = 2103.75; pvTV 1912.5
    approx(r.details.pvForecasts, 150);
    approx(r.details.terminalValue, 2103.75);
    approx(r.details.pvTerminal, 1912.5);
    approx(r.value, 2062.5);
    assert.equal(r.method, "DCF");
  });

  it("keeps pvForecasts + pvTerminal equal to enterprise value", () => {
    const r = dcfValuation(ACME);
    const { pvForecasts, pvTerminal, enterpriseValue } = r.details;
    assert.ok(Math.abs(pvForecasts + pvTerminal - enterpriseValue) / enterpriseValue < 1e-6);
  });

  it("bridges enterprise value to equity with debt and cash", () => {
    const r = dcfValuation(LEVERED);
    approx(r.details.netDebt, 150);
    approx(r.value, r.details.enterpriseValue - 150);
  });

  it("is non-increasing in WACC", () => {
    const values = [0.06, 0.08, 0.1, 0.12, 0.14, 0.16].map(
      (wacc) => dcfValuation(ACME, { wacc }).value,
    );
    for (let i = 1; i < values.length; i++) {
      assert.ok(values[i] <= values[i - 1]);
    }
  });

  it("adds waccAdjustment to the computed WACC", () => {
    const r = dcfValuation(ACME, { waccAdjustment: 0.01 });
    approx(r.details.wacc, 0.124, 1e-12);
  });

  it("applies a revenue override to the base level only", () => {
    const r = dcfValuation(ACME, { revenue: 500 });
    approx(r.details.forecasts[0].revenue, 550);
  });

  it("does not modify the company", () => {
    dcfValuation(ACME, { growthRate: 0.5, operatingMargin: 0.4 });
    assert.equal(ACME.growthRate, 0.1);
    assert.equal(ACME.operatingMargin, 0.2);
  });

  it("raises DEGENERATE_MODEL when WACC does not clear terminal growth", () => {
    assert.throws(
      () => dcfValuation(ACME, { wacc: 0.015 }),
      (e: unknown) =>
        e instanceof ValuationError && e.code === "DEGENERATE_MODEL" && e.parameter === "wacc",
    );
  });

  it("raises INVALID_INPUT for an out-of-domain override", () => {
    assert.throws(
      () => dcfValuation(ACME, { operatingMargin: 1.2 }),
      (e: unknown) =>
        e instanceof ValuationError &&
        e.code === "INVALID_INPUT" &&
        e.parameter === "operatingMargin",
    );
  });

  it("supports the exit-multiple terminal method", () => {
    const r = dcfValuation(ACME, {}, { terminalMethod: "exitMultiple", exitMultiple: 12 });
    const finalFcf = r.details.forecasts[r.details.forecasts.length - 1].fcf;
    approx(r.details.terminalValue, finalFcf * 12);
    assert.equal(r.details.terminalMethod, "exitMultiple");
  });

  it("does not require the WACC spread for the exit-multiple method", () => {
    const r = dcfValuation(
      ACME,
      { wacc: 0.01 },
      { terminalMethod: "exitMultiple", exitMultiple: 10, projectionYears: 1 },
    );
    // fcf 165; pv 165/1.01; TV 1650; pvTV 1650/1.01
    approx(r.details.terminalValue, 1650);
    approx(r.value, 1815 / 1.01, 1e-6);
  });

  it("still rejects a WACC at or below -100% for the exit-multiple method", () => {
    assert.throws(
      () => dcfValuation(ACME, { wacc: -1 }, { terminalMethod: "exitMultiple" }),
      (e: unknown) =>
        e instanceof ValuationError && e.code === "DEGENERATE_MODEL" && e.parameter === "wacc",
    );
  });

  it("keeps the spread check for the perpetuity method", () => {
    assert.throws(
      () => dcfValuation(ACME, { wacc: 0.01 }, { projectionYears: 1 }),
      (e: unknown) =>
        e instanceof ValuationError && e.code === "DEGENERATE_MODEL" && e.parameter === "wacc",
    );
  });
});

describe("dcfSensitivityAnalysis", () => {
  it("records null for degenerate points", () => {
    const r = dcfSensitivityAnalysis(ACME, "wacc", [0.01, 0.1]);
    assert.equal(r.points[0].value, null);
    assert.ok(r.points[1].value !== null && r.points[1].value > 0);
  });

  it("matches direct DCF evaluation", () => {
    const r = dcfSensitivityAnalysis(ACME, "growthRate", [0.05]);
    approx(r.points[0].value ?? Number.NaN, dcfValuation(ACME, { growthRate: 0.05 }).value);
  });
});
