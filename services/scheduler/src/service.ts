/**
 * TradingScheduler — timer-driven cycle trigger.
 *
 * Every tick evaluates the schedule (interval, market-hours window,
 * timezone, excluded weekdays) and, when eligible, asks the orchestrator
 * for a cycle. A concurrency conflict is an ordinary skip. Errors are
 * logged and the next tick tries again; the loop never stops on its own.
 */
import { createLogger } from "../../shared/src/logger.js";
import { ConfigurationError, ValidationError, errorMessage } from "../../shared/src/errors.js";
import {
  DEFAULT_SCHEDULE_CONFIG,
  safeValidateScheduleConfig,
  scheduleConfigDiff,
  scheduleConfigPatchSchema,
  type ScheduleConfig,
  type ScheduleConfigPatch,
} from "../../shared/src/schedule-config.js";
import {
  evaluateSchedule,
  nextRunTime,
  type ScheduleSkipReason,
} from "../../shared/src/market-session.js";
import type { CycleStatus, ScheduleStatus } from "../../shared/src/types.js";
import type { CoordinationStore } from "../../store/src/index.js";
import type {
  CycleStartedListener,
  TriggerResult,
} from "../../orchestrator/src/index.js";

const log = createLogger("scheduler");

export interface SchedulerConfig {
  tickIntervalMs: number;
}

const DEFAULT_CONFIG: SchedulerConfig = {
  tickIntervalMs: 30_000,
};

/** What the scheduler needs from the orchestrator. */
export interface CycleSource {
  triggerCycle(trigger: "scheduler"): Promise<TriggerResult>;
  onCycleStarted(listener: CycleStartedListener): void;
}

export type TickOutcome =
  | { action: "idle"; reason: ScheduleSkipReason }
  | { action: "skipped"; reason: "tick_in_progress" }
  | { action: "triggered"; cycleId: string; status: CycleStatus }
  | { action: "conflict"; activeCycleId: string | null }
  | { action: "error"; error: string };

export interface SchedulerDeps {
  clock?: () => Date;
}

export class TradingScheduler {
  private settings: SchedulerConfig;
  private config: ScheduleConfig = { ...DEFAULT_SCHEDULE_CONFIG };
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;
  private writes: Promise<unknown> = Promise.resolve();
  private readonly clock: () => Date;

  constructor(
    private readonly store: CoordinationStore,
    private readonly orchestrator: CycleSource,
    settings: Partial<SchedulerConfig> = {},
    deps: SchedulerDeps = {}
  ) {
    this.settings = { ...DEFAULT_CONFIG, ...settings };
    this.clock = deps.clock ?? (() => new Date());

    // Manual and scheduled cycles both count toward the interval.
    this.orchestrator.onCycleStarted((event) => this.recordRun(event.startedAt));
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /** Loads the persisted schedule; anything invalid falls back to the disabled defaults. */
  async load(): Promise<ScheduleConfig> {
    const raw = await this.store.loadScheduleConfig();
    if (raw === null) {
      this.config = { ...DEFAULT_SCHEDULE_CONFIG };
      log.info("No stored schedule, using defaults", { enabled: false });
      return this.getConfig();
    }

    const parsed = safeValidateScheduleConfig(raw);
    if (parsed.success) {
      this.config = parsed.data;
      log.info("Schedule loaded", { enabled: this.config.enabled, interval: this.config.interval_minutes });
    } else {
      const err = new ConfigurationError(
        "Stored schedule config is invalid; falling back to disabled defaults",
        parsed.error.issues
      );
      log.error(err.message, {
        code: err.code,
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
      this.config = { ...DEFAULT_SCHEDULE_CONFIG };
    }
    return this.getConfig();
  }

  start(): void {
    if (this.tickTimer) {
      log.warn("Scheduler already running");
      return;
    }

    this.tickTimer = setInterval(() => {
      this.tick().catch((e) => log.error("Tick error", { error: errorMessage(e) }));
    }, this.settings.tickIntervalMs);

    log.info("Scheduler started", {
      tickIntervalMs: this.settings.tickIntervalMs,
      enabled: this.config.enabled,
    });
  }

  stop(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
      log.info("Scheduler stopped");
    }
  }

  isRunning(): boolean {
    return this.tickTimer !== null;
  }

  // ─── Main Tick ──────────────────────────────────────────────────────

  async tick(): Promise<TickOutcome> {
    if (this.ticking) return { action: "skipped", reason: "tick_in_progress" };

    this.ticking = true;
    try {
      const eligibility = evaluateSchedule(this.config, this.clock());
      if (!eligibility.eligible) {
        log.debug("Tick idle", { reason: eligibility.reason });
        return { action: "idle", reason: eligibility.reason };
      }

      log.info("Schedule due, triggering cycle");
      const result = await this.orchestrator.triggerCycle("scheduler");

      if (result.kind === "conflict") {
        log.info("Cycle already running, scheduled trigger skipped", {
          activeCycleId: result.activeCycleId,
        });
        return { action: "conflict", activeCycleId: result.activeCycleId };
      }

      return { action: "triggered", cycleId: result.summary.cycle_id, status: result.summary.status };
    } catch (e) {
      log.error("Scheduled cycle failed", { error: errorMessage(e) });
      return { action: "error", error: errorMessage(e) };
    } finally {
      this.ticking = false;
    }
  }

  // ─── Run bookkeeping ────────────────────────────────────────────────

  /** Held in memory even if the write fails, so a flaky store cannot cause back-to-back cycles. */
  async recordRun(at: Date): Promise<void> {
    this.config = { ...this.config, last_run: at.toISOString() };
    try {
      await this.serialize(() => this.store.saveScheduleConfig(this.getConfig()));
    } catch (e) {
      log.error("Failed to persist last_run", { lastRun: this.config.last_run, error: errorMessage(e) });
    }
  }

  // ─── Configuration ──────────────────────────────────────────────────

  getConfig(): ScheduleConfig {
    return { ...this.config, excluded_days: [...this.config.excluded_days] };
  }

  getStatus(): ScheduleStatus {
    const next = nextRunTime(this.config, this.clock());
    return {
      enabled: this.config.enabled,
      interval_minutes: this.config.interval_minutes,
      next_run: next ? next.toISOString() : null,
      last_run: this.config.last_run,
    };
  }

  /**
   * Validates the merged config, persists it, and only then applies it.
   * A rejected or unpersisted update leaves the previous config in force.
   * Updates queue behind earlier writes and merge onto their result.
   */
  async updateConfig(patch: unknown): Promise<ScheduleConfig> {
    const parsedPatch = scheduleConfigPatchSchema.safeParse(patch);
    if (!parsedPatch.success) {
      throw ValidationError.fromIssues("Invalid schedule config", parsedPatch.error.issues);
    }
    const changes = parsedPatch.data;

    return this.serialize(async () => {
      const merged = safeValidateScheduleConfig({ ...this.config, ...changes });
      if (!merged.success) {
        throw ValidationError.fromIssues("Invalid schedule config", merged.error.issues);
      }

      await this.store.saveScheduleConfig(merged.data);

      // A cycle may have started while the save was in flight; its last_run is newer.
      const next = { ...merged.data, last_run: this.config.last_run };
      const diff = scheduleConfigDiff(this.config, next);
      this.config = next;
      log.info("Schedule config updated", { changed: diff });
      return this.getConfig();
    });
  }

  async enable(
    patch: Pick<ScheduleConfigPatch, "interval_minutes" | "market_hours_only"> = {}
  ): Promise<ScheduleConfig> {
    return this.updateConfig({ ...patch, enabled: true });
  }

  async disable(): Promise<ScheduleConfig> {
    return this.updateConfig({ enabled: false });
  }

  /** Runs store writes one at a time, in call order. A failure reaches its caller, not the next write. */
  private serialize<T>(write: () => Promise<T>): Promise<T> {
    const run = this.writes.then(write);
    this.writes = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
