/**
 * Tradeflow — Market Session Awareness
 * Decides whether a moment falls inside the configured trading window.
 * Wall-clock checks run in the schedule's own IANA timezone.
 */
import type { Weekday } from "./types.js";
import { WEEKDAYS, parseClock, type ScheduleConfig } from "./schedule-config.js";

export interface ZonedTime {
  date: string;       // YYYY-MM-DD in the zone
  weekday: Weekday;
  minutes: number;    // minutes since local midnight
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      weekday: "long",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function zonedTime(date: Date, timeZone: string): ZonedTime {
  const parts = formatterFor(timeZone).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";

  const weekdayName = part("weekday");
  const weekday = WEEKDAYS.find((d) => d === weekdayName);
  if (!weekday) throw new Error(`Unrecognized weekday '${weekdayName}' for zone ${timeZone}`);

  return {
    date: `${part("year")}-${part("month")}-${part("day")}`,
    weekday,
    minutes: Number(part("hour")) * 60 + Number(part("minute")),
  };
}

export function isExcludedDay(config: ScheduleConfig, date: Date = new Date()): boolean {
  const { weekday } = zonedTime(date, config.timezone);
  return config.excluded_days.includes(weekday);
}

/** Window is [start_time, end_time) in the schedule's timezone. */
export function isWithinMarketHours(config: ScheduleConfig, date: Date = new Date()): boolean {
  const { minutes } = zonedTime(date, config.timezone);
  return minutes >= parseClock(config.start_time) && minutes < parseClock(config.end_time);
}

export type ScheduleSkipReason =
  | "disabled"
  | "interval_not_elapsed"
  | "outside_market_hours"
  | "excluded_day";

export type ScheduleEligibility =
  | { eligible: true }
  | { eligible: false; reason: ScheduleSkipReason };

export function minutesSinceLastRun(config: ScheduleConfig, now: Date): number | null {
  if (!config.last_run) return null;
  return (now.getTime() - Date.parse(config.last_run)) / 60_000;
}

export function evaluateSchedule(config: ScheduleConfig, now: Date = new Date()): ScheduleEligibility {
  if (!config.enabled) return { eligible: false, reason: "disabled" };

  const elapsed = minutesSinceLastRun(config, now);
  if (elapsed !== null && elapsed < config.interval_minutes) {
    return { eligible: false, reason: "interval_not_elapsed" };
  }

  if (config.market_hours_only && !isWithinMarketHours(config, now)) {
    return { eligible: false, reason: "outside_market_hours" };
  }

  if (isExcludedDay(config, now)) return { eligible: false, reason: "excluded_day" };

  return { eligible: true };
}

/**
 * Earliest instant at or after max(now, last_run + interval) that sits
 * inside the window on a non-excluded day. Null when disabled.
 * Jumps are computed in local minutes, so across a DST change the first
 * landing can be an hour off; the loop re-checks until it settles.
 */
export function nextRunTime(config: ScheduleConfig, now: Date = new Date()): Date | null {
  if (!config.enabled) return null;

  const intervalMs = config.interval_minutes * 60_000;
  const due = config.last_run ? Date.parse(config.last_run) + intervalMs : now.getTime();
  let candidate = new Date(Math.max(now.getTime(), due));

  const start = config.market_hours_only ? parseClock(config.start_time) : 0;
  const end = config.market_hours_only ? parseClock(config.end_time) : 24 * 60;

  for (let i = 0; i < 32; i++) {
    const local = zonedTime(candidate, config.timezone);
    let jump: number;

    if (config.excluded_days.includes(local.weekday)) {
      jump = 24 * 60 - local.minutes + start;
    } else if (local.minutes < start) {
      jump = start - local.minutes;
    } else if (local.minutes >= end) {
      jump = 24 * 60 - local.minutes + start;
    } else {
      return candidate;
    }

    const floored = Math.floor(candidate.getTime() / 60_000) * 60_000;
    candidate = new Date(floored + jump * 60_000);
  }

  return candidate;
}
