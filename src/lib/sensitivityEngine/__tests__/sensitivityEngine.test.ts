/**
 * Sensitivity Engine — Tests
 *
 * Uses node:test + node:assert/strict.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { parseCompany, parseComparables } from "@/lib/valuationModel/company";
import { ValuationError } from "@/lib/valuationModel/errors";
import { dcfValuation } from "@/lib/dcfEngine";
import {
  SENSITIVITY_PARAMETERS,
  buildSweep,
  oneWaySensitivity,
  twoWaySensitivity,
  twoWaySensitivityAsync,
  tornadoChartData,
  comprehensiveSensitivity,
  multipleSensitivity,
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

const TARGET = parseCompany({
  name: "Target Tech",
  industry: "software",
  stage: "growth",
  revenue: 5000,
  netIncome: 800,
  netAssets: 3000,
  totalDebt: 500,
  cashAndEquivalents: 200,
});

const LOSS_MAKER = parseCompany({
  name: "Burn Inc",
  industry: "software",
  stage: "early",
  revenue: 2000,
  netIncome: -100,
});

const COMPARABLES = parseComparables([
  { name: "Alpha", peRatio: 20 },
  { name: "Beta", peRatio: 30 },
  { name: "Gamma", peRatio: 25 },
]);

function approx(actual: number | null | undefined, expected: number, tol = 1e-9): void {
  assert.ok(
    actual !== null && actual !== undefined && Math.abs(actual - expected) < tol,
    `expected ${expected}, got ${actual}`,
  );
}

function isCode(code: string) {
  return (e: unknown) => e instanceof ValuationError && e.code === code;
}

// ---------------------------------------------------------------------------
// Sweeps
// ---------------------------------------------------------------------------

describe("buildSweep", () => {
  it("spreads around the base value by default", () => {
    const s = buildSweep(0.2, { steps: 3 });
    assert.equal(s.length, 3);
    approx(s[0], 0.16);
    approx(s[1], 0.2);
    approx(s[2], 0.24);
  });

  it("uses an absolute half-width when the base is zero", () => {
    assert.deepEqual(buildSweep(0, { steps: 3 }), [-0.01, 0, 0.01]);
  });

  it("keeps a negative base in ascending order", () => {
    const s = buildSweep(-0.1, { steps: 2 });
    approx(s[0], -0.12);
    approx(s[1], -0.08);
  });

  it("prefers explicit points over a range", () => {
    assert.deepEqual(buildSweep(0.1, { points: [0.3, 0.1], range: [0, 1] }), [0.3, 0.1]);
  });

  it("rejects fewer than two steps and inverted ranges", () => {
    assert.throws(() => buildSweep(0.1, { steps: 1 }), isCode("INVALID_INPUT"));
    assert.throws(() => buildSweep(0.1, { range: [0.2, 0.1] }), isCode("INVALID_INPUT"));
  });
});

// ---------------------------------------------------------------------------
// One-way
// ---------------------------------------------------------------------------

describe("oneWaySensitivity", () => {
  it("reports a range equal to the spread of valid values", () => {
    const r = oneWaySensitivity(ACME, "operatingMargin");
    assert.equal(r.points.length, 11);
    const first = r.points[0].value;
    const last = r.points[r.points.length - 1].value;
    assert.ok(first !== null && last !== null);
    approx(r.valuationRange, last - first, 1e-6);
    approx(r.baseValue, dcfValuation(ACME).value, 1e-9);
  });

  it("has unit elasticity for operating margin without reinvestment", () => {
    const r = oneWaySensitivity(ACME, "operatingMargin");
    approx(r.elasticity, 1, 1e-9);
    approx(r.impactPercentage, 0.4, 1e-9);
  });

  it("records degenerate WACC points as null and excludes them", () => {
    const r = oneWaySensitivity(ACME, "wacc", { range: [0, 0.1], steps: 11 });
    assert.deepEqual(
      r.points.slice(0, 4).map((p) => p.value === null),
      [true, true, true, false],
    );
    const valid = r.points.flatMap((p) => (p.value === null ? [] : [p.value]));
    approx(r.maxValue, Math.max(...valid), 1e-9);
    approx(r.minValue, Math.min(...valid), 1e-9);
  });

  it("is non-increasing along a WACC sweep", () => {
    const r = oneWaySensitivity(ACME, "wacc");
    const values = r.points.flatMap((p) => (p.value === null ? [] : [p.value]));
    for (let i = 1; i < values.length; i++) {
      assert.ok(values[i] <= values[i - 1]);
    }
  });
});

// ---------------------------------------------------------------------------
// Two-way
// ---------------------------------------------------------------------------

describe("twoWaySensitivity", () => {
  const OPTIONS = {
    row: { steps: 3 },
    column: { range: [0.01, 0.1] as const, steps: 4 },
  };

  it("builds a rows x columns grid matching direct evaluation", () => {
    const r = twoWaySensitivity(ACME, "growthRate", "wacc", OPTIONS);
    assert.equal(r.values.length, 3);
    assert.ok(r.values.every((row) => row.length === 4));
    approx(
      r.values[1][2],
      dcfValuation(ACME, { growthRate: r.rowValues[1], wacc: r.columnValues[2] }).value,
      1e-9,
    );
  });

  it("leaves degenerate cells null", () => {
    const r = twoWaySensitivity(ACME, "growthRate", "wacc", OPTIONS);
    assert.deepEqual(
      r.values.map((row) => row[0]),
      [null, null, null],
    );
  });

  it("requires two distinct parameters", () => {
    assert.throws(() => twoWaySensitivity(ACME, "wacc", "wacc"), isCode("INVALID_INPUT"));
  });

  it("produces the same grid asynchronously", async () => {
    const sync = twoWaySensitivity(ACME, "operatingMargin", "terminalGrowthRate");
    const scheduled = await twoWaySensitivityAsync(ACME, "operatingMargin", "terminalGrowthRate");
    assert.deepEqual(scheduled, sync);
  });

  it("rejects identical parameters asynchronously", async () => {
    await assert.rejects(
      twoWaySensitivityAsync(ACME, "growthRate", "growthRate"),
      isCode("INVALID_INPUT"),
    );
  });
});

// ---------------------------------------------------------------------------
// Tornado / comprehensive
// ---------------------------------------------------------------------------

describe("tornadoChartData", () => {
  it("ranks all four parameters by descending range", () => {
    const t = tornadoChartData(ACME);
    assert.equal(t.length, 4);
    assert.equal(t[0].parameter, "wacc");
    assert.equal(t[1].parameter, "operatingMargin");
    for (let i = 1; i < t.length; i++) {
      assert.ok((t[i].valuationRange ?? -Infinity) <= (t[i - 1].valuationRange ?? -Infinity));
    }
  });
});

describe("comprehensiveSensitivity", () => {
  it("reports every parameter with the shared base value", () => {
    const r = comprehensiveSensitivity(ACME, { steps: 5 });
    assert.deepEqual(Object.keys(r.parameters).sort(), [...SENSITIVITY_PARAMETERS].sort());
    approx(r.baseValue, dcfValuation(ACME).value, 1e-9);
    assert.equal(r.parameters.wacc.baseValue, r.baseValue);
    assert.equal(r.tornado.length, 4);
    assert.equal(r.tornado[0].valuationRange, r.parameters.wacc.valuationRange);
  });
});

// ---------------------------------------------------------------------------
// Multiple sensitivity
// ---------------------------------------------------------------------------

describe("multipleSensitivity", () => {
  it("sweeps the median multiple", () => {
    const r = multipleSensitivity(TARGET, COMPARABLES, "PE", { steps: 5 });
    assert.equal(r.baseMultiple, 25);
    approx(r.baseValue, 20000, 1e-6);
    assert.equal(r.points.length, 5);
    approx(r.points[0].multiple, 20, 1e-9);
    approx(r.points[0].value, 16000, 1e-6);
    approx(r.points[4].value, 24000, 1e-6);
    approx(r.valuationRange, 8000, 1e-6);
  });

  it("propagates unsupported and missing-data errors", () => {
    assert.throws(() => multipleSensitivity(LOSS_MAKER, COMPARABLES, "PE"), isCode("UNSUPPORTED_METHOD"));
    assert.throws(() => multipleSensitivity(TARGET, COMPARABLES, "PS"), isCode("MISSING_DATA"));
  });

  it("rejects a spread outside (0, 1)", () => {
    assert.throws(
      () => multipleSensitivity(TARGET, COMPARABLES, "PE", { spreadPct: 1 }),
      isCode("INVALID_INPUT"),
    );
  });
});
