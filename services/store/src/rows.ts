/**
 * Row schemas — every row read back from Postgres is checked against
 * these before it reaches the rest of the coordinator.
 */
import { z } from "zod";
import { PIPELINE } from "../../shared/src/types.js";

const timestamp = z.string();
const count = z.number().int().min(0);

export const serviceRowSchema = z.object({
  name: z.string(),
  host: z.string(),
  port: z.number().int(),
  status: z.enum(["starting", "active", "degraded", "unreachable"]),
  last_heartbeat: timestamp.nullable(),
  registered_at: timestamp,
  consecutive_failures: count,
});

export const cycleRowSchema = z.object({
  cycle_id: z.string(),
  status: z.enum(["pending", "running", "completed", "failed", "partial"]),
  trigger: z.enum(["manual", "scheduler"]),
  start_time: timestamp.nullable(),
  end_time: timestamp.nullable(),
  securities_scanned: count,
  patterns_found: count,
  signals_generated: count,
  trades_executed: count,
  error_count: count,
  success_rate: z.number(),
  error_message: z.string().nullable(),
});

export const phaseRowSchema = z.object({
  cycle_id: z.string(),
  sequence: z.number().int(),
  phase: z.enum(PIPELINE),
  status: z.enum(["completed", "failed", "skipped"]),
  start_time: timestamp,
  end_time: timestamp,
  duration_seconds: z.number(),
  items_processed: count,
  items_succeeded: count,
  items_failed: count,
  retry_count: count,
  error_message: z.string().nullable(),
});

export const eventRowSchema = z.object({
  cycle_id: z.string(),
  phase: z.enum([...PIPELINE, "cycle"] as const),
  event_type: z.enum([
    "cycle_started",
    "phase_started",
    "phase_retry",
    "phase_completed",
    "phase_failed",
    "phase_skipped",
    "trades_dispatched",
    "cycle_finalized",
    "cycle_recovered",
  ]),
  payload: z.record(z.unknown()),
  timestamp,
});

export const lockRowSchema = z.object({
  cycle_id: z.string().nullable(),
  locked_at: timestamp.nullable(),
});
