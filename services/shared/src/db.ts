/**
 * Tradeflow — Supabase Client Factory
 */
import { createClient, type SupabaseClient } from "@supabase/supabase-js";

/** Server-side client: no session persistence, no token refresh. */
export function createDb(url: string, key: string): SupabaseClient {
  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

// ─── Typed table names ──────────────────────────────────────────────────

export type TableName =
  | "service_records"
  | "trading_cycles"
  | "phase_executions"
  | "workflow_events"
  | "schedule_config"
  | "config"
  | "cycle_lock"
  | "_migrations";

export const TABLES: readonly TableName[] = [
  "service_records",
  "trading_cycles",
  "phase_executions",
  "workflow_events",
  "schedule_config",
  "config",
  "cycle_lock",
  "_migrations",
];
