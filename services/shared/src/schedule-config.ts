/**
 * Tradeflow — Schedule Config
 *
 * Canonical shape, validation and safe defaults for the scheduler's
 * configuration. Used by:
 *   - Scheduler (load, hot-reload, last_run bookkeeping)
 *   - Store (persisted row + key/value blob)
 *   - API (GET/POST /schedule/config)
 */
import { z } from "zod";
import type { Weekday } from "./types.js";

export const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const satisfies readonly Weekday[];

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

export function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

/** "09:30" → 570 */
export function parseClock(hhmm: string): number {
  const [h = "0", m = "0"] = hhmm.split(":");
  return Number(h) * 60 + Number(m);
}

// ─── Zod Schema ──────────────────────────────────────────────────────────

const scheduleFields = z.object({
  enabled: z.boolean(),
  interval_minutes: z.number().int().min(1).max(1440),
  market_hours_only: z.boolean(),
  start_time: z.string().regex(HHMM, "start_time must be HH:MM"),
  end_time: z.string().regex(HHMM, "end_time must be HH:MM"),
  timezone: z.string().refine(isValidTimeZone, "timezone must be an IANA zone"),
  excluded_days: z.array(z.enum(WEEKDAYS)).max(7),
  last_run: z.string().datetime({ offset: true }).nullable(),
});

export const scheduleConfigSchema = scheduleFields.refine(
  (c) => parseClock(c.start_time) < parseClock(c.end_time),
  { message: "start_time must be earlier than end_time", path: ["start_time"] }
);

export type ScheduleConfig = z.infer<typeof scheduleFields>;

/** Fields an operator may change; last_run belongs to the scheduler. */
export const scheduleConfigPatchSchema = scheduleFields.omit({ last_run: true }).partial();
export type ScheduleConfigPatch = z.infer<typeof scheduleConfigPatchSchema>;

export const SCHEDULE_KEYS = scheduleFields.keyof().options;

// ─── Defaults ────────────────────────────────────────────────────────────

/** Safe fallback: disabled, so a broken config can never start trading. */
export const DEFAULT_SCHEDULE_CONFIG: ScheduleConfig = {
  enabled: false,
  interval_minutes: 30,
  market_hours_only: true,
  start_time: "09:30",
  end_time: "16:00",
  timezone: "America/New_York",
  excluded_days: ["Saturday", "Sunday"],
  last_run: null,
};

// ─── Helpers ─────────────────────────────────────────────────────────────

/**
 * Validate a config object. Returns parsed config or throws.
 */
export function validateScheduleConfig(raw: unknown): ScheduleConfig {
  return scheduleConfigSchema.parse(raw);
}

/**
 * Safe validate — returns result object, never throws.
 */
export function safeValidateScheduleConfig(
  raw: unknown
): z.SafeParseReturnType<unknown, ScheduleConfig> {
  return scheduleConfigSchema.safeParse(raw);
}

/**
 * Compute a diff between two configs.
 * Returns only the changed keys with their old/new values.
 */
export function scheduleConfigDiff(
  prev: ScheduleConfig,
  next: ScheduleConfig
): Record<string, { old: unknown; new: unknown }> {
  const diffs: Record<string, { old: unknown; new: unknown }> = {};
  for (const key of SCHEDULE_KEYS) {
    if (JSON.stringify(prev[key]) !== JSON.stringify(next[key])) {
      diffs[key] = { old: prev[key], new: next[key] };
    }
  }
  return diffs;
}
