/**
 * Market Data — Tests
 *
 * Tushare calls are answered by an in-process fetch stub keyed on api_name.
 */

import { describe, it, mock } from "node:test";
import assert from "node:assert/strict";
import { z } from "zod";

import { parseComparables } from "@/lib/valuationModel/company";
import {
  InMemoryMarketDataSource,
  TushareApiError,
  TushareMarketDataSource,
  relatedIndustries,
  type FetchLike,
} from "../index";

// ---------------------------------------------------------------------------
// Fetch stub
// ---------------------------------------------------------------------------

const RequestSchema = z.object({
  api_name: z.string(),
  token: z.string(),
  params: z.record(z.union([z.string(), z.number()])),
  fields: z.string(),
});
type TushareRequest = z.infer<typeof RequestSchema>;

type Table = { fields: string[]; items: unknown[][] } | { code: number; msg: string };
type Handler = (params: TushareRequest["params"]) => Table;

function stubFetch(handlers: Record<string, Handler>, calls: TushareRequest[] = []): FetchLike {
  return async (_url, init) => {
    const req = RequestSchema.parse(JSON.parse(init.body));
    calls.push(req);
    const handler = handlers[req.api_name];
    const table: Table = handler ? handler(req.params) : { fields: [], items: [] };
    const body =
      "code" in table
        ? { code: table.code, msg: table.msg, data: null }
        : { code: 0, msg: "", data: table };
    return { ok: true, status: 200, json: async () => body };
  };
}

const STOCK_BASIC: Handler = () => ({
  fields: ["ts_code", "name", "industry"],
  items: [
    ["000001.SZ", "Alpha Soft", "计算机"],
    ["000002.SZ", "Beta Chips", "电子"],
    ["000003.SZ", "Gamma Bank", "银行"],
    ["000004.SZ", "Delta Telecom", "通信"],
  ],
});

const TRADE_CAL: Handler = () => ({
  fields: ["exchange", "cal_date", "is_open"],
  items: [
    ["SSE", "20240102", 1],
    ["SSE", "20240105", 1],
    ["SSE", "20240103", 1],
  ],
});

const DAILY_BASIC: Handler = () => ({
  fields: ["ts_code", "trade_date", "total_mv", "pe_ttm", "ps_ttm", "pb"],
  items: [
    ["000001.SZ", "20240105", 300, 25, 4, 3],
    ["000002.SZ", "20240105", 500, 30, null, 2.5],
    ["000003.SZ", "20240105", 900, 6, 2, 0.7],
    ["000004.SZ", "20240105", 100, 18, 1.5, 1.8],
  ],
});

const INCOME: Handler = (params) => ({
  fields: ["ts_code", "ann_date", "revenue", "n_income"],
  items: [[params.ts_code, "20231030", 1_000_000, 120_000]],
});

const BALANCE: Handler = (params) => ({
  fields: ["ts_code", "ann_date", "total_hldr_eqy_exc_min_int"],
  items: [[params.ts_code, "20231030", 800_000]],
});

const HANDLERS: Record<string, Handler> = {
  stock_basic: STOCK_BASIC,
  trade_cal: TRADE_CAL,
  daily_basic: DAILY_BASIC,
  income: INCOME,
  balancesheet: BALANCE,
};

function source(handlers: Record<string, Handler>, calls?: TushareRequest[]) {
  return new TushareMarketDataSource({
    token: "test-secret",
    fetch: stubFetch(handlers, calls),
    now: () => new Date("2024-01-08T00:00:00Z"),
  });
}

// ---------------------------------------------------------------------------
// Tushare
// ---------------------------------------------------------------------------

describe("relatedIndustries", () => {
  it("expands a sector keyword to its Tushare industries", () => {
    assert.deepEqual(relatedIndustries("科技"), ["计算机", "电子", "通信"]);
    assert.deepEqual(relatedIndustries("unknown"), []);
  });
});

describe("TushareMarketDataSource.getComparables", () => {
  it("returns the largest matching companies with statements and multiples", async () => {
    const calls: TushareRequest[] = [];
    const comps = await source(HANDLERS, calls).getComparables("科技", { limit: 2 });

    assert.deepEqual(
      comps.map((c) => c.tsCode),
      ["000002.SZ", "000001.SZ"],
    );
    const beta = comps[0];
    assert.equal(beta.name, "Beta Chips");
    assert.equal(beta.industry, "电子");
    assert.equal(beta.marketCap, 5_000_000);
    assert.equal(beta.peRatio, 30);
    assert.equal(beta.psRatio, null);
    assert.equal(beta.revenue, 1_000_000);
    assert.equal(beta.netIncome, 120_000);
    assert.equal(beta.netAssets, 800_000);

    const daily = calls.find((c) => c.api_name === "daily_basic");
    assert.equal(daily?.params.trade_date, "20240105");
    assert.equal(daily?.token, "test-secret");
    assert.equal(daily?.fields, "ts_code,trade_date,total_mv,pe_ttm,ps_ttm,pb");
  });

  it("filters by market cap range", async () => {
    const comps = await source(HANDLERS).getComparables("科技", {
      marketCapRange: [1_000_000, 4_000_000],
    });
    assert.deepEqual(
      comps.map((c) => c.tsCode),
      ["000001.SZ", "000004.SZ"],
    );
  });

  it("skips a company whose statements fail", async () => {
    const warn = mock.method(console, "warn", () => undefined);
    try {
      const comps = await source({
        ...HANDLERS,
        income: (params) =>
          params.ts_code === "000001.SZ"
            ? { code: 40203, msg: "rate limited" }
            : INCOME(params),
      }).getComparables("科技", { limit: 2 });

      assert.deepEqual(
        comps.map((c) => c.tsCode),
        ["000002.SZ"],
      );
      assert.equal(warn.mock.callCount(), 1);
    } finally {
      warn.mock.restore();
    }
  });

  it("falls back to today when the trade calendar fails", async () => {
    const warn = mock.method(console, "warn", () => undefined);
    try {
      const calls: TushareRequest[] = [];
      await source({ ...HANDLERS, trade_cal: () => ({ code: -1, msg: "down" }) }, calls).getComparables(
        "计算机",
      );
      const daily = calls.find((c) => c.api_name === "daily_basic");
      assert.equal(daily?.params.trade_date, "20240108");
    } finally {
      warn.mock.restore();
    }
  });

  it("rejects when the listing call fails", async () => {
    await assert.rejects(
      source({ ...HANDLERS, stock_basic: () => ({ code: 2002, msg: "no permission" }) }).getComparables(
        "科技",
      ),
      (e: unknown) => e instanceof TushareApiError && e.apiName === "stock_basic" && e.code === 2002,
    );
  });
});

describe("TushareMarketDataSource.getCompanyFinancials", () => {
  it("combines listing, statements and daily multiples", async () => {
    const f = await source({
      ...HANDLERS,
      stock_basic: () => ({
        fields: ["ts_code", "name", "industry"],
        items: [["000001.SZ", "Alpha Soft", "计算机"]],
      }),
      daily_basic: () => ({
        fields: ["ts_code", "trade_date", "total_mv", "pe_ttm", "ps_ttm", "pb"],
        items: [["000001.SZ", "20240105", 300, 25, null, 3]],
      }),
    }).getCompanyFinancials("000001.SZ");

    assert.deepEqual(f, {
      tsCode: "000001.SZ",
      name: "Alpha Soft",
      industry: "计算机",
      revenue: 1_000_000,
      netIncome: 120_000,
      netAssets: 800_000,
      marketCap: 3_000_000,
      peRatio: 25,
      pbRatio: 3,
    });
  });

  it("returns null for an unknown code", async () => {
    const f = await source({ trade_cal: TRADE_CAL }).getCompanyFinancials("999999.SZ");
    assert.equal(f, null);
  });
});

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

describe("InMemoryMarketDataSource", () => {
  const COMPS = parseComparables([
    { name: "Alpha", industry: "Software", marketCap: 500, peRatio: 20 },
    { name: "Beta", industry: "software services", marketCap: 50, peRatio: 25 },
    { name: "Gamma", industry: "Banking", marketCap: 900, peRatio: 8 },
  ]);

  it("matches industry case-insensitively and honours the limit", async () => {
    const src = new InMemoryMarketDataSource(COMPS);
    const all = await src.getComparables("software");
    assert.deepEqual(
      all.map((c) => c.name),
      ["Alpha", "Beta"],
    );
    const one = await src.getComparables("SOFTWARE", { limit: 1 });
    assert.deepEqual(
      one.map((c) => c.name),
      ["Alpha"],
    );
  });

  it("serves stored financials by code", async () => {
    const src = new InMemoryMarketDataSource([], [{ tsCode: "X.SZ", revenue: 10 }]);
    assert.deepEqual(await src.getCompanyFinancials("X.SZ"), { tsCode: "X.SZ", revenue: 10 });
    assert.equal(await src.getCompanyFinancials("Y.SZ"), null);
  });
});
