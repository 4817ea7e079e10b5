// src/lib/supabase/admin.ts
import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export interface SupabaseAdminConfig {
  url: string;
  serviceRoleKey: string;
  /** Replaces global fetch; tests route requests to an in-process stub */
  fetch?: typeof fetch;
}

/**
 * Service-role client for server-side persistence. Sessions are never
 * persisted or refreshed: the key is static.
 */
export function createSupabaseAdmin(cfg: SupabaseAdminConfig): SupabaseClient {
  if (!cfg.url || !cfg.serviceRoleKey) {
    throw new Error(
      "Missing Supabase admin credentials. Set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.",
    );
  }

  return createClient(cfg.url, cfg.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(cfg.fetch ? { global: { fetch: cfg.fetch } } : {}),
  });
}
