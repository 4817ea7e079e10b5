/**
 * Valuation History — Tests
 *
 * The Supabase store runs against a real client whose fetch is an
 * in-process PostgREST stub.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { createSupabaseAdmin } from "@/lib/supabase/admin";
import type { ValuationBundle } from "@/lib/valuationEngine/types";
import {
  InMemoryValuationHistoryStore,
  SupabaseValuationHistoryStore,
  toHistoryRow,
  type HistoryRow,
} from "../index";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function bundle(company: string, timestamp: string): ValuationBundle {
  return {
    company,
    industry: "software",
    stage: "growth",
    timestamp,
    comparablesUsed: 3,
    valuationMethods: { relative: {}, composite: null, absolute: null },
    riskAnalysis: {},
    recommendation: {
      finalValue: 100,
      valueRange: [90, 121],
      confidence: "high",
      coefficientOfVariation: 0.05,
      methodsUsed: 2,
      methodDetails: [],
    },
    errors: [],
  };
}

const ACME = bundle("Acme", "2026-01-02T00:00:00.000Z");

const STORED_ROW: HistoryRow = {
  ...toHistoryRow(ACME),
  id: "row-1",
};

interface SeenRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

function stubPostgrest(
  respond: (req: SeenRequest) => { status: number; body: unknown },
  seen: SeenRequest[],
): typeof fetch {
  return async (input, init) => {
    const href = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const req: SeenRequest = {
      method: init?.method ?? "GET",
      url: new URL(href),
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    };
    seen.push(req);
    const { status, body } = respond(req);
    return new Response(JSON.stringify(body), {
      status,
      headers: { "content-type": "application/json" },
    });
  };
}

function supabaseStore(respond: Parameters<typeof stubPostgrest>[0], seen: SeenRequest[]) {
  const client = createSupabaseAdmin({
    url: "http://localhost:54321",
    serviceRoleKey: "test-secret",
    fetch: stubPostgrest(respond, seen),
  });
  return new SupabaseValuationHistoryStore(client);
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

describe("toHistoryRow", () => {
  it("lifts the recommendation into summary columns", () => {
    const row = toHistoryRow(ACME);
    assert.equal(row.company_name, "Acme");
    assert.equal(row.final_value, 100);
    assert.equal(row.value_low, 90);
    assert.equal(row.value_high, 121);
    assert.equal(row.confidence, "high");
    assert.equal(row.methods_used, 2);
    assert.equal(row.created_at, "2026-01-02T00:00:00.000Z");
  });

  it("leaves summary columns null without a recommendation", () => {
    const row = toHistoryRow({ ...ACME, recommendation: null });
    assert.equal(row.final_value, null);
    assert.equal(row.confidence, null);
    assert.equal(row.methods_used, 0);
  });
});

// ---------------------------------------------------------------------------
// In-memory
// ---------------------------------------------------------------------------

describe("InMemoryValuationHistoryStore", () => {
  it("saves, fetches and lists newest first", async () => {
    const store = new InMemoryValuationHistoryStore();
    const first = await store.save(bundle("Older", "2026-01-01T00:00:00.000Z"));
    const second = await store.save(bundle("Newer", "2026-02-01T00:00:00.000Z"));

    const got = await store.get(first);
    assert.equal(got?.companyName, "Older");
    assert.equal(await store.get("missing"), null);

    const listed = await store.list();
    assert.deepEqual(
      listed.map((r) => r.id),
      [second, first],
    );
    assert.equal((await store.list({ limit: 1 })).length, 1);
  });

  it("rejects a non-positive limit", async () => {
    await assert.rejects(new InMemoryValuationHistoryStore().list({ limit: 0 }), /limit/);
  });
});

// ---------------------------------------------------------------------------
// Supabase
// ---------------------------------------------------------------------------

describe("SupabaseValuationHistoryStore", () => {
  it("inserts the mapped row and returns its id", async () => {
    const seen: SeenRequest[] = [];
    const store = supabaseStore(() => ({ status: 201, body: [{ id: "row-1" }] }), seen);

    assert.equal(await store.save(ACME), "row-1");

    const [req] = seen;
    assert.equal(req.method, "POST");
    assert.equal(req.url.pathname, "/rest/v1/valuation_history");
    assert.equal(req.url.searchParams.get("select"), "id");
    assert.equal(req.headers.get("apikey"), "test-secret");
    const body = toHistoryRow(ACME);
    assert.deepEqual(req.body, body);
  });

  it("lists newest first with a limit", async () => {
    const seen: SeenRequest[] = [];
    const store = supabaseStore(() => ({ status: 200, body: [STORED_ROW] }), seen);

    const records = await store.list({ limit: 5 });
    assert.equal(records.length, 1);
    assert.equal(records[0].id, "row-1");
    assert.equal(records[0].finalValue, 100);
    assert.equal(seen[0].url.searchParams.get("order"), "created_at.desc");
    assert.equal(seen[0].url.searchParams.get("limit"), "5");
  });

  it("returns null for an unknown id", async () => {
    const seen: SeenRequest[] = [];
    const store = supabaseStore(() => ({ status: 200, body: [] }), seen);

    assert.equal(await store.get("nope"), null);
    assert.equal(seen[0].url.searchParams.get("id"), "eq.nope");
  });

  it("surfaces PostgREST errors", async () => {
    const store = supabaseStore(
      () => ({ status: 400, body: { message: "boom", code: "PGRST100", details: null, hint: null } }),
      [],
    );
    await assert.rejects(store.save(ACME), /insert failed: boom/);
  });
});
