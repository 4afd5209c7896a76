/**
 * Tradeflow — Shared Type Definitions
 * Every component imports its domain shapes from here.
 */

// ─── Service Registry ─────────────────────────────────────────────────

export type ServiceStatus = "starting" | "active" | "degraded" | "unreachable";

export interface ServiceRecord {
  name: string;
  host: string;
  port: number;
  status: ServiceStatus;
  last_heartbeat: string | null;
  registered_at: string;
  consecutive_failures: number;
}

export interface ServiceSnapshotEntry extends ServiceRecord {
  url: string;
  registered: boolean;
  stale: boolean;
}

export interface ServiceEndpoint {
  name: string;
  baseUrl: string;
  status: ServiceStatus | "unregistered";
}

// ─── Trading Cycles ───────────────────────────────────────────────────

export type CycleStatus = "pending" | "running" | "completed" | "failed" | "partial";
export type TerminalCycleStatus = Extract<CycleStatus, "completed" | "failed" | "partial">;
export type CycleTrigger = "manual" | "scheduler";

export const PIPELINE = [
  "scan",
  "pattern_analysis",
  "technical_analysis",
  "signal_generation",
  "trade_execution",
] as const;

export type Phase = (typeof PIPELINE)[number];
export type PhaseStatus = "completed" | "failed" | "skipped";

export interface CycleMetrics {
  securities_scanned: number;
  patterns_found: number;
  signals_generated: number;
  trades_executed: number;
  error_count: number;
  success_rate: number;
}

export interface TradingCycle extends CycleMetrics {
  cycle_id: string;
  status: CycleStatus;
  trigger: CycleTrigger;
  start_time: string | null;
  end_time: string | null;
  error_message: string | null;
}

export interface PhaseExecution {
  cycle_id: string;
  sequence: number;
  phase: Phase;
  status: PhaseStatus;
  start_time: string;
  end_time: string;
  duration_seconds: number;
  items_processed: number;
  items_succeeded: number;
  items_failed: number;
  retry_count: number;
  error_message: string | null;
}

export type WorkflowEventType =
  | "cycle_started"
  | "phase_started"
  | "phase_retry"
  | "phase_completed"
  | "phase_failed"
  | "phase_skipped"
  | "trades_dispatched"
  | "cycle_finalized"
  | "cycle_recovered";

export interface WorkflowEvent {
  cycle_id: string;
  phase: Phase | "cycle";
  event_type: WorkflowEventType;
  payload: Record<string, unknown>;
  timestamp: string;
}

export interface CycleLock {
  cycle_id: string | null;
  locked_at: string | null;
}

export interface PhaseSummary {
  phase: Phase;
  status: PhaseStatus;
  duration_seconds: number;
  items_processed: number;
  items_succeeded: number;
  items_failed: number;
  retry_count: number;
  error_message: string | null;
}

export interface CycleSummary {
  cycle_id: string;
  status: CycleStatus;
  trigger: CycleTrigger;
  start_time: string | null;
  end_time: string | null;
  duration_seconds: number | null;
  metrics: CycleMetrics;
  phases: PhaseSummary[];
  error_message: string | null;
}

export interface CycleDetail {
  cycle: CycleSummary;
  events: WorkflowEvent[];
}

export interface PhaseStats {
  phase: Phase;
  total_runs: number;
  success_rate: number;
  avg_duration_seconds: number;
  min_duration_seconds: number;
  max_duration_seconds: number;
  avg_items_processed: number;
}

// ─── Schedule ─────────────────────────────────────────────────────────

export type Weekday =
  | "Sunday"
  | "Monday"
  | "Tuesday"
  | "Wednesday"
  | "Thursday"
  | "Friday"
  | "Saturday";

export interface ScheduleStatus {
  enabled: boolean;
  interval_minutes: number;
  next_run: string | null;
  last_run: string | null;
}
