/**
 * CoordinationStore — durable state for the coordinator, on Supabase.
 *
 * The single source of truth for every component. Two writes carry the
 * single-flight guarantee and are always conditional updates:
 *   - the `cycle_lock` row (claimed only while its cycle_id IS NULL)
 *   - `trading_cycles.status` (moved only from an expected status)
 * Any database error surfaces as a PersistenceError; callers fail fast.
 */
import type { SupabaseClient } from "@supabase/supabase-js";
import type { z } from "zod";
import { createLogger } from "../../shared/src/logger.js";
import { PersistenceError } from "../../shared/src/errors.js";
import type { TableName } from "../../shared/src/db.js";
import type {
  CycleLock,
  CycleStatus,
  PhaseExecution,
  ServiceRecord,
  ServiceStatus,
  TradingCycle,
  WorkflowEvent,
  WorkflowEventType,
} from "../../shared/src/types.js";
import type { ScheduleConfig } from "../../shared/src/schedule-config.js";
import { runMigrations, type MigrationReport } from "../../../infra/db/migrate.js";
import {
  cycleRowSchema,
  eventRowSchema,
  lockRowSchema,
  phaseRowSchema,
  serviceRowSchema,
} from "./rows.js";

const log = createLogger("store");

const LOCK_ROW_ID = 1;
const SCHEDULE_ROW_ID = 1;
export const SCHEDULE_CONFIG_KEY = "schedule_config";

export type LockClaim =
  | { acquired: true }
  | { acquired: false; holder: CycleLock };

export interface ServiceHealthPatch {
  status: ServiceStatus;
  consecutive_failures: number;
  last_heartbeat?: string;
}

export type CycleMetricsPatch = Partial<
  Pick<
    TradingCycle,
    | "securities_scanned"
    | "patterns_found"
    | "signals_generated"
    | "trades_executed"
    | "error_count"
    | "success_rate"
    | "end_time"
    | "error_message"
  >
>;

function parseRow<S extends z.ZodTypeAny>(schema: S, table: TableName, data: unknown): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new PersistenceError(
      `Malformed row in ${table}: ${result.error.issues.map((i) => i.message).join("; ")}`,
      table,
      result.error.issues
    );
  }
  return result.data;
}

function parseRows<S extends z.ZodTypeAny>(schema: S, table: TableName, data: unknown): z.infer<S>[] {
  if (!Array.isArray(data)) return [];
  return data.map((row) => parseRow(schema, table, row));
}

export class CoordinationStore {
  constructor(private readonly db: SupabaseClient) {}

  // ─── Schema ─────────────────────────────────────────────────────────

  /** Idempotent: CREATE … IF NOT EXISTS migrations plus the lock row. */
  async ensureSchema(): Promise<MigrationReport> {
    const report = await runMigrations(this.db);

    const { error } = await this.db
      .from("cycle_lock")
      .upsert(
        { id: LOCK_ROW_ID, cycle_id: null, locked_at: null },
        { onConflict: "id", ignoreDuplicates: true }
      );
    if (error) throw PersistenceError.fromDb("upsert", "cycle_lock", error);

    log.info("Schema ready", { applied: report.applied, rpcAvailable: report.rpcAvailable });
    return report;
  }

  // ─── Service records ────────────────────────────────────────────────

  async upsertService(record: ServiceRecord): Promise<ServiceRecord> {
    const { data, error } = await this.db
      .from("service_records")
      .upsert({ ...record, updated_at: new Date().toISOString() }, { onConflict: "name" })
      .select()
      .single();

    if (error) throw PersistenceError.fromDb("upsert", "service_records", error);
    return parseRow(serviceRowSchema, "service_records", data);
  }

  async getService(name: string): Promise<ServiceRecord | null> {
    const { data, error } = await this.db
      .from("service_records")
      .select("*")
      .eq("name", name)
      .maybeSingle();

    if (error) throw PersistenceError.fromDb("select", "service_records", error);
    return data ? parseRow(serviceRowSchema, "service_records", data) : null;
  }

  async listServices(): Promise<ServiceRecord[]> {
    const { data, error } = await this.db
      .from("service_records")
      .select("*")
      .order("name", { ascending: true });

    if (error) throw PersistenceError.fromDb("select", "service_records", error);
    return parseRows(serviceRowSchema, "service_records", data);
  }

  async updateServiceHealth(name: string, patch: ServiceHealthPatch): Promise<ServiceRecord | null> {
    const { data, error } = await this.db
      .from("service_records")
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq("name", name)
      .select()
      .maybeSingle();

    if (error) throw PersistenceError.fromDb("update", "service_records", error);
    return data ? parseRow(serviceRowSchema, "service_records", data) : null;
  }

  // ─── Current-cycle marker ───────────────────────────────────────────

  async readCycleLock(): Promise<CycleLock> {
    const { data, error } = await this.db
      .from("cycle_lock")
      .select("cycle_id, locked_at")
      .eq("id", LOCK_ROW_ID)
      .maybeSingle();

    if (error) throw PersistenceError.fromDb("select", "cycle_lock", error);
    if (!data) throw new PersistenceError("cycle_lock row is missing; run migrations", "cycle_lock");
    return parseRow(lockRowSchema, "cycle_lock", data);
  }

  /** Compare-and-set: NULL → cycleId. Exactly one concurrent caller wins. */
  async acquireCycleLock(cycleId: string, lockedAt: string): Promise<LockClaim> {
    const { data, error } = await this.db
      .from("cycle_lock")
      .update({ cycle_id: cycleId, locked_at: lockedAt })
      .eq("id", LOCK_ROW_ID)
      .is("cycle_id", null)
      .select("cycle_id");

    if (error) throw PersistenceError.fromDb("update", "cycle_lock", error);
    if (Array.isArray(data) && data.length === 1) return { acquired: true };

    return { acquired: false, holder: await this.readCycleLock() };
  }

  /** Compare-and-set on holder: moves locked_at forward. False when the lock is no longer ours. */
  async refreshCycleLock(holder: string, lockedAt: string): Promise<boolean> {
    const { data, error } = await this.db
      .from("cycle_lock")
      .update({ locked_at: lockedAt })
      .eq("id", LOCK_ROW_ID)
      .eq("cycle_id", holder)
      .select("cycle_id");

    if (error) throw PersistenceError.fromDb("update", "cycle_lock", error);
    return Array.isArray(data) && data.length === 1;
  }

  /** Compare-and-set: holder → NULL. False when someone else holds it. */
  async releaseCycleLock(holder: string): Promise<boolean> {
    const { data, error } = await this.db
      .from("cycle_lock")
      .update({ cycle_id: null, locked_at: null })
      .eq("id", LOCK_ROW_ID)
      .eq("cycle_id", holder)
      .select("cycle_id");

    if (error) throw PersistenceError.fromDb("update", "cycle_lock", error);
    return Array.isArray(data) && data.length === 1;
  }

  // ─── Trading cycles ─────────────────────────────────────────────────

  async insertCycle(cycle: TradingCycle): Promise<TradingCycle> {
    const { data, error } = await this.db
      .from("trading_cycles")
      .insert(cycle)
      .select()
      .single();

    if (error) throw PersistenceError.fromDb("insert", "trading_cycles", error);
    return parseRow(cycleRowSchema, "trading_cycles", data);
  }

  /**
   * Compare-and-set on status. Returns the updated row, or null when the
   * cycle is not in any of the expected statuses (terminal rows never move).
   */
  async transitionCycle(
    cycleId: string,
    from: CycleStatus | CycleStatus[],
    to: CycleStatus,
    patch: CycleMetricsPatch & { start_time?: string } = {}
  ): Promise<TradingCycle | null> {
    const expected = Array.isArray(from) ? from : [from];
    const { data, error } = await this.db
      .from("trading_cycles")
      .update({ ...patch, status: to })
      .eq("cycle_id", cycleId)
      .in("status", expected)
      .select()
      .maybeSingle();

    if (error) throw PersistenceError.fromDb("update", "trading_cycles", error);
    return data ? parseRow(cycleRowSchema, "trading_cycles", data) : null;
  }

  /** Running totals; only touches a cycle that is still running. */
  async updateCycleMetrics(cycleId: string, patch: CycleMetricsPatch): Promise<void> {
    const { error } = await this.db
      .from("trading_cycles")
      .update(patch)
      .eq("cycle_id", cycleId)
      .eq("status", "running");

    if (error) throw PersistenceError.fromDb("update", "trading_cycles", error);
  }

  async getCycle(cycleId: string): Promise<TradingCycle | null> {
    const { data, error } = await this.db
      .from("trading_cycles")
      .select("*")
      .eq("cycle_id", cycleId)
      .maybeSingle();

    if (error) throw PersistenceError.fromDb("select", "trading_cycles", error);
    return data ? parseRow(cycleRowSchema, "trading_cycles", data) : null;
  }

  async listCycles(limit = 20): Promise<TradingCycle[]> {
    const { data, error } = await this.db
      .from("trading_cycles")
      .select("*")
      .order("start_time", { ascending: false })
      .limit(limit);

    if (error) throw PersistenceError.fromDb("select", "trading_cycles", error);
    return parseRows(cycleRowSchema, "trading_cycles", data);
  }

  // ─── Phase executions (append-only) ─────────────────────────────────

  async appendPhaseExecution(execution: PhaseExecution): Promise<PhaseExecution> {
    const { data, error } = await this.db
      .from("phase_executions")
      .insert(execution)
      .select()
      .single();

    if (error) throw PersistenceError.fromDb("insert", "phase_executions", error);
    return parseRow(phaseRowSchema, "phase_executions", data);
  }

  async listPhaseExecutions(cycleId: string): Promise<PhaseExecution[]> {
    const { data, error } = await this.db
      .from("phase_executions")
      .select("*")
      .eq("cycle_id", cycleId)
      .order("sequence", { ascending: true });

    if (error) throw PersistenceError.fromDb("select", "phase_executions", error);
    return parseRows(phaseRowSchema, "phase_executions", data);
  }

  async listRecentPhaseExecutions(limit = 500): Promise<PhaseExecution[]> {
    const { data, error } = await this.db
      .from("phase_executions")
      .select("*")
      .order("end_time", { ascending: false })
      .limit(limit);

    if (error) throw PersistenceError.fromDb("select", "phase_executions", error);
    return parseRows(phaseRowSchema, "phase_executions", data);
  }

  // ─── Workflow events (insert-only) ──────────────────────────────────

  async appendEvent(event: WorkflowEvent): Promise<void> {
    const { error } = await this.db.from("workflow_events").insert(event);
    if (error) throw PersistenceError.fromDb("insert", "workflow_events", error);
  }

  async listEvents(cycleId: string): Promise<WorkflowEvent[]> {
    const { data, error } = await this.db
      .from("workflow_events")
      .select("*")
      .eq("cycle_id", cycleId)
      .order("id", { ascending: true });

    if (error) throw PersistenceError.fromDb("select", "workflow_events", error);
    return parseRows(eventRowSchema, "workflow_events", data);
  }

  async hasEvent(cycleId: string, eventType: WorkflowEventType): Promise<boolean> {
    const { data, error } = await this.db
      .from("workflow_events")
      .select("id")
      .eq("cycle_id", cycleId)
      .eq("event_type", eventType)
      .limit(1);

    if (error) throw PersistenceError.fromDb("select", "workflow_events", error);
    return Array.isArray(data) && data.length > 0;
  }

  // ─── Schedule config ────────────────────────────────────────────────

  /**
   * Raw stored config, unvalidated: the key/value blob when present,
   * the relational row otherwise, null on a fresh database.
   */
  async loadScheduleConfig(): Promise<unknown> {
    const { data: blob, error: blobError } = await this.db
      .from("config")
      .select("value")
      .eq("key", SCHEDULE_CONFIG_KEY)
      .maybeSingle();

    if (blobError) throw PersistenceError.fromDb("select", "config", blobError);
    if (blob && blob.value !== null && blob.value !== undefined) return blob.value;

    const { data: row, error } = await this.db
      .from("schedule_config")
      .select(
        "enabled, interval_minutes, market_hours_only, start_time, end_time, timezone, excluded_days, last_run"
      )
      .eq("id", SCHEDULE_ROW_ID)
      .maybeSingle();

    if (error) throw PersistenceError.fromDb("select", "schedule_config", error);
    return row ?? null;
  }

  /** Relational row first, then the blob cache. */
  async saveScheduleConfig(config: ScheduleConfig): Promise<void> {
    const updatedAt = new Date().toISOString();

    const { error: rowError } = await this.db
      .from("schedule_config")
      .upsert({ id: SCHEDULE_ROW_ID, ...config, updated_at: updatedAt }, { onConflict: "id" });
    if (rowError) throw PersistenceError.fromDb("upsert", "schedule_config", rowError);

    const { error: blobError } = await this.db
      .from("config")
      .upsert({ key: SCHEDULE_CONFIG_KEY, value: config, updated_at: updatedAt }, { onConflict: "key" });
    if (blobError) throw PersistenceError.fromDb("upsert", "config", blobError);
  }
}
