/**
 * Market Data — Tushare Source
 *
 * Comparable listed companies from the Tushare Pro HTTP API. Every call is a
 * JSON POST of { api_name, token, params, fields }; the reply carries a
 * status code and a column-major table { fields, items }.
 *
 * Per-company lookups run through p-limit. A company whose statements
 * cannot be fetched is logged and skipped; a failed listing call rejects.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import pLimit from "p-limit";
import type { Comparable } from "@/lib/valuationModel/types";
import type { CompanyFinancials, ComparableQuery, MarketDataSource } from "./types";

export const DEFAULT_TUSHARE_API_URL = "http://api.tushare.pro";
export const DEFAULT_COMPARABLE_LIMIT = 20;

/** Tushare quotes total_mv in units of 10,000 CNY; statements are in CNY. */
const MARKET_CAP_UNIT = 10_000;

export type FetchLike = (
  url: string,
  init: {
    method: "POST";
    headers: Record<string, string>;
    body: string;
    signal?: AbortSignal;
  },
) => Promise<Pick<Response, "ok" | "status" | "json">>;

export interface TushareConfig {
  token: string;
  apiUrl?: string;
  timeoutMs?: number;
  /** Per-company statement lookups in flight at once */
  concurrency?: number;
  fetch?: FetchLike;
  now?: () => Date;
}

export class TushareApiError extends Error {
  readonly apiName: string;
  readonly code?: number;

  constructor(apiName: string, message: string, code?: number) {
    super(`[tushare] ${apiName}: ${message}`);
    this.name = "TushareApiError";
    this.apiName = apiName;
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Wire schemas
// ---------------------------------------------------------------------------

const TushareResponseSchema = z.object({
  code: z.number(),
  msg: z.string().nullish(),
  data: z
    .object({
      fields: z.array(z.string()),
      items: z.array(z.array(z.unknown())),
    })
    .nullish(),
});

const num = z.number().finite().nullish();

const TradeCalRow = z.object({
  cal_date: z.string(),
  is_open: z.union([z.number(), z.string()]),
});

const StockBasicRow = z.object({
  ts_code: z.string(),
  name: z.string(),
  industry: z.string().nullish(),
});
type StockBasic = z.infer<typeof StockBasicRow>;

const DailyBasicRow = z.object({
  ts_code: z.string(),
  total_mv: num,
  pe_ttm: num,
  ps_ttm: num,
  pb: num,
});
type DailyBasic = z.infer<typeof DailyBasicRow>;

const IncomeRow = z.object({
  ts_code: z.string(),
  revenue: num,
  n_income: num,
});

const BalanceSheetRow = z.object({
  ts_code: z.string(),
  total_hldr_eqy_exc_min_int: num,
});

const DAILY_BASIC_FIELDS = ["ts_code", "trade_date", "total_mv", "pe_ttm", "ps_ttm", "pb"];
const INCOME_FIELDS = ["ts_code", "ann_date", "revenue", "n_income"];
const BALANCE_FIELDS = ["ts_code", "ann_date", "total_hldr_eqy_exc_min_int"];

// ---------------------------------------------------------------------------
// Industry aliases
// ---------------------------------------------------------------------------

const IndustryAliasesSchema = z.record(z.array(z.string()));

let _aliases: Record<string, string[]> | null = null;

function industryAliases(): Record<string, string[]> {
  if (_aliases) return _aliases;
  const raw: unknown = JSON.parse(
    readFileSync(new URL("./industryAliases.json", import.meta.url), "utf8"),
  );
  _aliases = IndustryAliasesSchema.parse(raw);
  return _aliases;
}

/** Tushare industry names grouped under a sector keyword, e.g. 科技 → 计算机, 电子, 通信. */
export function relatedIndustries(industry: string): string[] {
  return industryAliases()[industry] ?? [];
}

function matchesIndustry(row: StockBasic, industry: string, related: ReadonlySet<string>): boolean {
  if (!industry) return true;
  if (!row.industry) return false;
  return row.industry.includes(industry) || related.has(row.industry);
}

function formatTradeDate(d: Date): string {
  return d.toISOString().slice(0, 10).replace(/-/g, "");
}

function toMarketCap(totalMv: number | null | undefined): number | undefined {
  return totalMv == null ? undefined : totalMv * MARKET_CAP_UNIT;
}

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

export class TushareMarketDataSource implements MarketDataSource {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(cfg: TushareConfig) {
    if (!cfg.token) throw new Error("Tushare token is required");
    this.token = cfg.token;
    this.apiUrl = cfg.apiUrl ?? DEFAULT_TUSHARE_API_URL;
    this.timeoutMs = cfg.timeoutMs ?? 15_000;
    this.concurrency = cfg.concurrency ?? 4;
    this.fetchImpl = cfg.fetch ?? ((url, init) => fetch(url, init));
    this.now = cfg.now ?? (() => new Date());
  }

  private async query<S extends z.ZodTypeAny>(
    apiName: string,
    params: Record<string, string | number>,
    fields: readonly string[],
    rowSchema: S,
  ): Promise<z.infer<S>[]> {
    const res = await this.fetchImpl(this.apiUrl, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ api_name: apiName, token: this.token, params, fields: fields.join(",") }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) throw new TushareApiError(apiName, `http ${res.status}`);

    const body: unknown = await res.json();
    const parsed = TushareResponseSchema.safeParse(body);
    if (!parsed.success) throw new TushareApiError(apiName, "malformed response");

    const { code, msg, data } = parsed.data;
    if (code !== 0) throw new TushareApiError(apiName, msg || `code ${code}`, code);
    if (!data) return [];

    const rows = data.items.map((item) =>
      Object.fromEntries(data.fields.map((f, i) => [f, item[i]])),
    );
    const typed = z.array(rowSchema).safeParse(rows);
    if (!typed.success) {
      throw new TushareApiError(
        apiName,
        `unexpected row shape (${typed.error.issues[0]?.path.join(".") ?? "?"})`,
      );
    }
    return typed.data;
  }

  /** Most recent open SSE trading day up to today; today when the calendar is unavailable. */
  async latestTradeDate(): Promise<string> {
    const today = formatTradeDate(this.now());
    try {
      const days = await this.query(
        "trade_cal",
        { exchange: "SSE", is_open: "1", end_date: today },
        ["exchange", "cal_date", "is_open"],
        TradeCalRow,
      );
      const open = days.filter((d) => Number(d.is_open) === 1).map((d) => d.cal_date);
      if (open.length === 0) return today;
      return open.reduce((latest, d) => (d > latest ? d : latest));
    } catch (e) {
      console.warn("[tushare] trade calendar unavailable, using today", {
        today,
        error: e instanceof Error ? e.message : String(e),
      });
      return today;
    }
  }

  async getComparables(industry: string, query: ComparableQuery = {}): Promise<Comparable[]> {
    const limit = query.limit ?? DEFAULT_COMPARABLE_LIMIT;

    const basics = await this.query(
      "stock_basic",
      { exchange: "", list_status: "L" },
      ["ts_code", "name", "industry"],
      StockBasicRow,
    );
    const related = new Set(relatedIndustries(industry));
    const matched = basics.filter((b) => matchesIndustry(b, industry, related));
    if (matched.length === 0) return [];

    const tradeDate = await this.latestTradeDate();
    const daily = await this.query(
      "daily_basic",
      { trade_date: tradeDate },
      DAILY_BASIC_FIELDS,
      DailyBasicRow,
    );
    const dailyByCode = new Map(daily.map((d) => [d.ts_code, d]));

    const candidates = matched
      .flatMap((basic) => {
        const d = dailyByCode.get(basic.ts_code);
        return d ? [{ basic, daily: d, marketCap: toMarketCap(d.total_mv) }] : [];
      })
      .filter((c) => {
        if (!query.marketCapRange) return true;
        const [min, max] = query.marketCapRange;
        return c.marketCap !== undefined && c.marketCap >= min && c.marketCap <= max;
      })
      .sort((a, b) => (b.marketCap ?? -Infinity) - (a.marketCap ?? -Infinity))
      .slice(0, limit);

    const limiter = pLimit(this.concurrency);
    const comparables = await Promise.all(
      candidates.map((c) =>
        limiter(async () => {
          try {
            return await this.buildComparable(c.basic, c.daily);
          } catch (e) {
            console.warn("[tushare] comparable skipped", {
              tsCode: c.basic.ts_code,
              error: e instanceof Error ? e.message : String(e),
            });
            return null;
          }
        }),
      ),
    );

    const found = comparables.filter((c): c is Comparable => c !== null);
    console.info("[tushare] comparables fetched", {
      industry,
      tradeDate,
      matched: matched.length,
      returned: found.length,
    });
    return found;
  }

  private async latestStatements(tsCode: string) {
    const [income, balance] = await Promise.all([
      this.query("income", { ts_code: tsCode, limit: 1 }, INCOME_FIELDS, IncomeRow),
      this.query("balancesheet", { ts_code: tsCode, limit: 1 }, BALANCE_FIELDS, BalanceSheetRow),
    ]);
    return { income: income[0], balance: balance[0] };
  }

  private async buildComparable(basic: StockBasic, daily: DailyBasic): Promise<Comparable | null> {
    const { income, balance } = await this.latestStatements(basic.ts_code);
    if (!income || !balance) return null;

    return {
      name: basic.name,
      tsCode: basic.ts_code,
      industry: basic.industry ?? "",
      revenue: income.revenue ?? 0,
      netIncome: income.n_income ?? 0,
      netAssets: balance.total_hldr_eqy_exc_min_int ?? 0,
      marketCap: toMarketCap(daily.total_mv) ?? null,
      peRatio: daily.pe_ttm ?? null,
      psRatio: daily.ps_ttm ?? null,
      pbRatio: daily.pb ?? null,
    };
  }

  async getCompanyFinancials(tsCode: string): Promise<CompanyFinancials | null> {
    const tradeDate = await this.latestTradeDate();
    const [basics, statements, daily] = await Promise.all([
      this.query("stock_basic", { ts_code: tsCode }, ["ts_code", "name", "industry"], StockBasicRow),
      this.latestStatements(tsCode),
      this.query(
        "daily_basic",
        { ts_code: tsCode, trade_date: tradeDate },
        DAILY_BASIC_FIELDS,
        DailyBasicRow,
      ),
    ]);

    const basic = basics[0];
    const { income, balance } = statements;
    const d = daily[0];
    if (!basic && !income && !balance && !d) return null;

    const f: CompanyFinancials = { tsCode };
    if (basic) {
      f.name = basic.name;
      if (basic.industry) f.industry = basic.industry;
    }
    if (income?.revenue != null) f.revenue = income.revenue;
    if (income?.n_income != null) f.netIncome = income.n_income;
    if (balance?.total_hldr_eqy_exc_min_int != null) {
      f.netAssets = balance.total_hldr_eqy_exc_min_int;
    }
    if (d) {
      const marketCap = toMarketCap(d.total_mv);
      if (marketCap !== undefined) f.marketCap = marketCap;
      if (d.pe_ttm != null) f.peRatio = d.pe_ttm;
      if (d.ps_ttm != null) f.psRatio = d.ps_ttm;
      if (d.pb != null) f.pbRatio = d.pb;
    }
    return f;
  }
}
