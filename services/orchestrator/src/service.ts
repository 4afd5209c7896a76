/**
 * TradingCycleOrchestrator — runs one trading cycle at a time.
 *
 * Lifecycle of a cycle:
 *   claim cycle_lock (CAS) → insert pending → running → five phases in
 *   order → completed | partial | failed → release cycle_lock
 *
 * Every status change goes through a compare-and-set in the store, so a
 * second process sharing the database can never run a concurrent cycle
 * or move a finished one.
 */
import { randomUUID } from "node:crypto";
import { createLogger } from "../../shared/src/logger.js";
import {
  ConfigurationError,
  NotFoundError,
  PersistenceError,
  errorMessage,
  type ConcurrencyConflict,
} from "../../shared/src/errors.js";
import { withRetry, defaultSleep, worstCaseDurationMs } from "../../shared/src/retry.js";
import type { FetchFn } from "../../shared/src/http.js";
import {
  PIPELINE,
  type CycleLock,
  type CycleMetrics,
  type CycleStatus,
  type CycleSummary,
  type CycleDetail,
  type CycleTrigger,
  type Phase,
  type PhaseExecution,
  type PhaseStats,
  type PhaseStatus,
  type ServiceEndpoint,
  type TerminalCycleStatus,
  type TradingCycle,
  type WorkflowEventType,
} from "../../shared/src/types.js";
import type { CoordinationStore } from "../../store/src/index.js";
import { StageClient } from "./stage-client.js";
import {
  PHASE_ROUTES,
  countItems,
  metricContribution,
  type ItemCounts,
  type PhaseOutput,
} from "./phases.js";

const log = createLogger("orchestrator");

export interface OrchestratorConfig {
  maxCycleDurationMs: number;
  lockGraceMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  stageTimeoutMs: number;
  tradeTimeoutMs: number;
}

const DEFAULT_CONFIG: OrchestratorConfig = {
  maxCycleDurationMs: 600_000,
  lockGraceMs: 60_000,
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 15_000,
  stageTimeoutMs: 30_000,
  tradeTimeoutMs: 60_000,
};

/** Longest one phase can hold the pipeline between two lock refreshes. */
export function phaseBudgetMs(config: OrchestratorConfig): number {
  return worstCaseDurationMs(config, Math.max(config.stageTimeoutMs, config.tradeTimeoutMs));
}

/** What the orchestrator needs from the registry. */
export interface EndpointResolver {
  resolve(name: string): ServiceEndpoint;
}

export interface OrchestratorDeps {
  fetchImpl?: FetchFn;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  /** Suffix of generated cycle ids; 8 hex chars by default. */
  newId?: () => string;
}

export type TriggerResult = { kind: "completed"; summary: CycleSummary } | ConcurrencyConflict;

export type BeginResult =
  | { kind: "started"; cycleId: string; completion: Promise<CycleSummary> }
  | ConcurrencyConflict;

export interface CycleStartedEvent {
  cycleId: string;
  trigger: CycleTrigger;
  startedAt: Date;
}

export type CycleStartedListener = (event: CycleStartedEvent) => void | Promise<void>;

export interface CurrentCycleView {
  cycle_id: string;
  trigger: CycleTrigger;
  start_time: string;
  current_phase: Phase | null;
  completed_phases: Phase[];
}

interface CycleContext {
  cycleId: string;
  trigger: CycleTrigger;
  startedAt: Date;
  deadline: number;
  metrics: CycleMetrics;
  processed: number;
  succeeded: number;
  executions: PhaseExecution[];
  errorMessage: string | null;
  view: CurrentCycleView;
}

type PhaseOutcome = { status: "completed"; output: PhaseOutput } | { status: "failed"; error: string };

const ZERO_METRICS: CycleMetrics = {
  securities_scanned: 0,
  patterns_found: 0,
  signals_generated: 0,
  trades_executed: 0,
  error_count: 0,
  success_rate: 0,
};

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `cycle_YYYYMMDD_HHMMSS_<suffix>`, UTC. */
export function formatCycleId(at: Date, suffix: string): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `cycle_${date}_${time}_${suffix}`;
}

function secondsBetween(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}

export function summarizeCycle(cycle: TradingCycle, phases: PhaseExecution[]): CycleSummary {
  const duration =
    cycle.start_time && cycle.end_time
      ? secondsBetween(new Date(cycle.start_time), new Date(cycle.end_time))
      : null;

  return {
    cycle_id: cycle.cycle_id,
    status: cycle.status,
    trigger: cycle.trigger,
    start_time: cycle.start_time,
    end_time: cycle.end_time,
    duration_seconds: duration,
    metrics: {
      securities_scanned: cycle.securities_scanned,
      patterns_found: cycle.patterns_found,
      signals_generated: cycle.signals_generated,
      trades_executed: cycle.trades_executed,
      error_count: cycle.error_count,
      success_rate: cycle.success_rate,
    },
    phases: [...phases]
      .sort((a, b) => a.sequence - b.sequence)
      .map((p) => ({
        phase: p.phase,
        status: p.status,
        duration_seconds: p.duration_seconds,
        items_processed: p.items_processed,
        items_succeeded: p.items_succeeded,
        items_failed: p.items_failed,
        retry_count: p.retry_count,
        error_message: p.error_message,
      })),
    error_message: cycle.error_message,
  };
}

export class TradingCycleOrchestrator {
  private config: OrchestratorConfig;
  private readonly client: StageClient;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly newId: () => string;
  private current: CycleContext | null = null;
  private startedListeners: CycleStartedListener[] = [];

  constructor(
    private readonly store: CoordinationStore,
    private readonly registry: EndpointResolver,
    config: Partial<OrchestratorConfig> = {},
    deps: OrchestratorDeps = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    const budget = phaseBudgetMs(this.config);
    if (this.config.maxCycleDurationMs + this.config.lockGraceMs <= budget) {
      throw new ConfigurationError(
        `maxCycleDurationMs + lockGraceMs (${this.config.maxCycleDurationMs + this.config.lockGraceMs}ms) ` +
          `must exceed the longest single phase (${budget}ms)`
      );
    }
    this.client = new StageClient(deps.fetchImpl);
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
    this.newId = deps.newId ?? (() => randomUUID().replace(/-/g, "").slice(0, 8));
  }

  // ─── Event Hooks ────────────────────────────────────────────────────

  onCycleStarted(listener: CycleStartedListener): void {
    this.startedListeners.push(listener);
  }

  // ─── Triggering ─────────────────────────────────────────────────────

  /** Runs a full cycle and resolves with its summary, or reports the cycle already running. */
  async triggerCycle(trigger: CycleTrigger): Promise<TriggerResult> {
    const begun = await this.beginCycle(trigger);
    if (begun.kind === "conflict") return begun;
    return { kind: "completed", summary: await begun.completion };
  }

  /**
   * Claims the lock and starts the cycle; the pipeline keeps running on
   * the returned `completion` promise.
   */
  async beginCycle(trigger: CycleTrigger): Promise<BeginResult> {
    const startedAt = this.clock();
    const cycleId = formatCycleId(startedAt, this.newId());

    const conflict = await this.claimLock(cycleId, startedAt);
    if (conflict) {
      log.info("Cycle already running, trigger skipped", {
        trigger,
        activeCycleId: conflict.activeCycleId,
      });
      return conflict;
    }

    const ctx: CycleContext = {
      cycleId,
      trigger,
      startedAt,
      deadline: startedAt.getTime() + this.config.maxCycleDurationMs,
      metrics: { ...ZERO_METRICS },
      processed: 0,
      succeeded: 0,
      executions: [],
      errorMessage: null,
      view: {
        cycle_id: cycleId,
        trigger,
        start_time: startedAt.toISOString(),
        current_phase: null,
        completed_phases: [],
      },
    };

    try {
      await this.store.insertCycle({
        cycle_id: cycleId,
        status: "pending",
        trigger,
        start_time: startedAt.toISOString(),
        end_time: null,
        error_message: null,
        ...ZERO_METRICS,
      });
      await this.store.transitionCycle(cycleId, "pending", "running");
      await this.event(cycleId, "cycle", "cycle_started", { trigger });
    } catch (e) {
      await this.abandon(ctx, e);
      throw e;
    }

    this.current = ctx;
    log.audit("cycle_started", { cycleId, trigger });
    this.notifyStarted({ cycleId, trigger, startedAt });

    const completion = this.runPipeline(ctx).finally(() => {
      if (this.current === ctx) this.current = null;
    });
    return { kind: "started", cycleId, completion };
  }

  private notifyStarted(event: CycleStartedEvent): void {
    for (const listener of this.startedListeners) {
      Promise.resolve()
        .then(() => listener(event))
        .catch((e) => log.error("cycle-started listener failed", { error: errorMessage(e) }));
    }
  }

  // ─── Current-cycle marker ───────────────────────────────────────────

  private isStale(holder: CycleLock, now: Date): boolean {
    if (!holder.locked_at) return false;
    const age = now.getTime() - new Date(holder.locked_at).getTime();
    return age > this.config.maxCycleDurationMs + this.config.lockGraceMs;
  }

  /** Null when the lock is ours; the conflict otherwise. */
  private async claimLock(cycleId: string, now: Date): Promise<ConcurrencyConflict | null> {
    const lockedAt = now.toISOString();
    let claim = await this.store.acquireCycleLock(cycleId, lockedAt);
    if (claim.acquired) return null;

    const holder = claim.holder;
    const runningHere = holder.cycle_id !== null && holder.cycle_id === this.current?.cycleId;
    if (holder.cycle_id !== null && !runningHere && this.isStale(holder, now)) {
      await this.recoverStaleLock(holder.cycle_id, holder.locked_at, cycleId);
      claim = await this.store.acquireCycleLock(cycleId, lockedAt);
    } else if (holder.cycle_id === null) {
      // Released between our update and the read-back.
      claim = await this.store.acquireCycleLock(cycleId, lockedAt);
    }

    if (claim.acquired) return null;
    return { kind: "conflict", activeCycleId: claim.holder.cycle_id, lockedAt: claim.holder.locked_at };
  }

  private async recoverStaleLock(holder: string, lockedAt: string | null, recoveredBy: string): Promise<void> {
    const now = this.clock().toISOString();
    const failed = await this.store.transitionCycle(holder, ["pending", "running"], "failed", {
      end_time: now,
      error_message: `Cycle exceeded maximum duration of ${this.config.maxCycleDurationMs}ms; lock recovered`,
    });
    await this.event(holder, "cycle", "cycle_recovered", {
      locked_at: lockedAt,
      recovered_by: recoveredBy,
      marked_failed: failed !== null,
    });
    await this.store.releaseCycleLock(holder);
    log.audit("stale_lock_recovered", { cycleId: holder, lockedAt, recoveredBy });
  }

  // ─── Pipeline ───────────────────────────────────────────────────────

  private async runPipeline(ctx: CycleContext): Promise<CycleSummary> {
    try {
      let input: unknown[] = [];
      let abortReason: string | null = null;

      for (const [index, phase] of PIPELINE.entries()) {
        const sequence = index + 1;

        if (abortReason) {
          await this.recordSkipped(ctx, phase, sequence, abortReason);
          continue;
        }

        if (this.clock().getTime() > ctx.deadline) {
          abortReason = `Cycle exceeded maximum duration of ${this.config.maxCycleDurationMs}ms before ${phase}`;
          ctx.errorMessage = abortReason;
          ctx.metrics.error_count++;
          log.warn("Cycle deadline exceeded", { cycleId: ctx.cycleId, phase });
          await this.recordSkipped(ctx, phase, sequence, abortReason);
          continue;
        }

        if (!(await this.store.refreshCycleLock(ctx.cycleId, this.clock().toISOString()))) {
          abortReason = "Cycle lock was taken over by another process";
          ctx.errorMessage = abortReason;
          ctx.metrics.error_count++;
          log.error("Cycle lock lost", { cycleId: ctx.cycleId, phase });
          await this.recordSkipped(ctx, phase, sequence, abortReason);
          continue;
        }

        if (phase === "trade_execution" && (await this.store.hasEvent(ctx.cycleId, "trades_dispatched"))) {
          log.warn("Trades already dispatched for cycle, not resending", { cycleId: ctx.cycleId });
          await this.recordSkipped(ctx, phase, sequence, "trades already dispatched for this cycle");
          continue;
        }

        const outcome = await this.runPhase(ctx, phase, sequence, input);
        if (outcome.status === "completed") {
          input = outcome.output.items;
        } else {
          input = [];
          if (phase === "scan") {
            abortReason = `scan failed: ${outcome.error}`;
            ctx.errorMessage = abortReason;
          }
        }
      }

      return await this.finalize(ctx, abortReason !== null ? "failed" : this.outcomeStatus(ctx));
    } catch (e) {
      log.error("Cycle aborted by persistence failure", { cycleId: ctx.cycleId, error: errorMessage(e) });
      await this.abandon(ctx, e);
      throw e;
    }
  }

  private outcomeStatus(ctx: CycleContext): TerminalCycleStatus {
    const failed = ctx.executions.filter((e) => e.status === "failed");
    if (failed.length === 0) return "completed";
    ctx.errorMessage = failed.map((e) => `${e.phase}: ${e.error_message ?? "failed"}`).join("; ");
    return "partial";
  }

  private timeoutFor(phase: Phase): number {
    return phase === "trade_execution" ? this.config.tradeTimeoutMs : this.config.stageTimeoutMs;
  }

  private endpointStatus(service: string): ServiceEndpoint["status"] | null {
    try {
      return this.registry.resolve(service).status;
    } catch {
      return null;
    }
  }

  private async runPhase(
    ctx: CycleContext,
    phase: Phase,
    sequence: number,
    input: unknown[]
  ): Promise<PhaseOutcome> {
    const route = PHASE_ROUTES[phase];
    const started = this.clock();
    const isTrade = phase === "trade_execution";
    const maxAttempts = this.endpointStatus(route.service) === "unreachable" ? 1 : this.config.maxAttempts;
    let retries = 0;

    ctx.view.current_phase = phase;
    await this.event(ctx.cycleId, phase, "phase_started", { items_in: input.length, max_attempts: maxAttempts });
    if (isTrade) {
      await this.event(ctx.cycleId, phase, "trades_dispatched", { signals: input.length });
    }

    try {
      const output = await withRetry(
        () =>
          this.client.call({
            cycleId: ctx.cycleId,
            phase,
            baseUrl: this.registry.resolve(route.service).baseUrl,
            items: input,
            timeoutMs: this.timeoutFor(phase),
            idempotencyKey: isTrade ? ctx.cycleId : undefined,
          }),
        {
          maxAttempts,
          baseDelayMs: this.config.baseDelayMs,
          maxDelayMs: this.config.maxDelayMs,
          sleep: this.sleep,
          onRetry: async (error, attempt, delayMs) => {
            retries++;
            log.warn("Phase attempt failed, retrying", {
              cycleId: ctx.cycleId,
              phase,
              attempt,
              delayMs,
              error: errorMessage(error),
            });
            await this.event(ctx.cycleId, phase, "phase_retry", {
              attempt,
              delay_ms: delayMs,
              error: errorMessage(error),
            });
          },
        }
      );

      const counts = countItems(output);
      await this.recordExecution(ctx, phase, sequence, "completed", started, counts, retries, null);

      const contribution = metricContribution(output);
      if (contribution) ctx.metrics[contribution.metric] = contribution.value;
      ctx.processed += counts.processed;
      ctx.succeeded += counts.succeeded;
      ctx.metrics.success_rate = ctx.processed === 0 ? 0 : ctx.succeeded / ctx.processed;
      await this.store.updateCycleMetrics(ctx.cycleId, { ...ctx.metrics });

      ctx.view.completed_phases.push(phase);
      await this.event(ctx.cycleId, phase, "phase_completed", { ...counts, retries });
      log.info("Phase completed", { cycleId: ctx.cycleId, phase, items: counts.processed, retries });
      return { status: "completed", output };
    } catch (e) {
      if (e instanceof PersistenceError) throw e;

      const message = errorMessage(e);
      ctx.metrics.error_count++;
      ctx.processed += input.length;
      ctx.metrics.success_rate = ctx.processed === 0 ? 0 : ctx.succeeded / ctx.processed;
      await this.recordExecution(
        ctx,
        phase,
        sequence,
        "failed",
        started,
        { processed: input.length, succeeded: 0, failed: input.length },
        retries,
        message
      );
      await this.store.updateCycleMetrics(ctx.cycleId, { ...ctx.metrics });
      await this.event(ctx.cycleId, phase, "phase_failed", { error: message, retries });
      log.error("Phase failed", { cycleId: ctx.cycleId, phase, retries, error: message });
      return { status: "failed", error: message };
    }
  }

  private async recordSkipped(ctx: CycleContext, phase: Phase, sequence: number, reason: string): Promise<void> {
    const at = this.clock();
    await this.recordExecution(ctx, phase, sequence, "skipped", at, { processed: 0, succeeded: 0, failed: 0 }, 0, reason);
    await this.event(ctx.cycleId, phase, "phase_skipped", { reason });
  }

  private async recordExecution(
    ctx: CycleContext,
    phase: Phase,
    sequence: number,
    status: PhaseStatus,
    started: Date,
    counts: ItemCounts,
    retries: number,
    error: string | null
  ): Promise<void> {
    const ended = this.clock();
    const execution: PhaseExecution = {
      cycle_id: ctx.cycleId,
      sequence,
      phase,
      status,
      start_time: started.toISOString(),
      end_time: ended.toISOString(),
      duration_seconds: secondsBetween(started, ended),
      items_processed: counts.processed,
      items_succeeded: counts.succeeded,
      items_failed: counts.failed,
      retry_count: retries,
      error_message: error,
    };
    await this.store.appendPhaseExecution(execution);
    ctx.executions.push(execution);
  }

  private async finalize(ctx: CycleContext, status: TerminalCycleStatus): Promise<CycleSummary> {
    const endedAt = this.clock().toISOString();
    const moved = await this.store.transitionCycle(ctx.cycleId, "running", status, {
      ...ctx.metrics,
      end_time: endedAt,
      error_message: ctx.errorMessage,
    });
    if (!moved) {
      log.warn("Cycle was no longer running at finalization", { cycleId: ctx.cycleId, status });
    }

    await this.event(ctx.cycleId, "cycle", "cycle_finalized", { status, ...ctx.metrics });
    await this.store.releaseCycleLock(ctx.cycleId);

    log.audit("cycle_finalized", {
      cycleId: ctx.cycleId,
      status,
      durationSeconds: secondsBetween(ctx.startedAt, new Date(endedAt)),
      ...ctx.metrics,
    });

    const finalStatus: CycleStatus = moved?.status ?? status;
    return summarizeCycle(
      {
        cycle_id: ctx.cycleId,
        status: finalStatus,
        trigger: ctx.trigger,
        start_time: ctx.startedAt.toISOString(),
        end_time: endedAt,
        error_message: ctx.errorMessage,
        ...ctx.metrics,
      },
      ctx.executions
    );
  }

  /** Best effort after a fatal error: mark the cycle failed and free the lock. */
  private async abandon(ctx: CycleContext, cause: unknown): Promise<void> {
    if (this.current === ctx) this.current = null;

    try {
      await this.store.transitionCycle(ctx.cycleId, ["pending", "running"], "failed", {
        end_time: this.clock().toISOString(),
        error_message: errorMessage(cause),
        error_count: ctx.metrics.error_count + 1,
      });
    } catch (e) {
      log.error("Could not mark abandoned cycle failed", { cycleId: ctx.cycleId, error: errorMessage(e) });
    }

    try {
      await this.store.releaseCycleLock(ctx.cycleId);
    } catch (e) {
      log.error("Could not release cycle lock; it will be recovered once stale", {
        cycleId: ctx.cycleId,
        error: errorMessage(e),
      });
    }
  }

  private async event(
    cycleId: string,
    phase: Phase | "cycle",
    type: WorkflowEventType,
    payload: Record<string, unknown>
  ): Promise<void> {
    await this.store.appendEvent({
      cycle_id: cycleId,
      phase,
      event_type: type,
      payload,
      timestamp: this.clock().toISOString(),
    });
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  getCurrentCycle(): CurrentCycleView | null {
    if (!this.current) return null;
    const view = this.current.view;
    return { ...view, completed_phases: [...view.completed_phases] };
  }

  async latestCycle(): Promise<CycleSummary | null> {
    const [latest] = await this.store.listCycles(1);
    if (!latest) return null;
    return summarizeCycle(latest, await this.store.listPhaseExecutions(latest.cycle_id));
  }

  async listCycles(limit = 20): Promise<TradingCycle[]> {
    return this.store.listCycles(limit);
  }

  async getCycleDetail(cycleId: string): Promise<CycleDetail> {
    const cycle = await this.store.getCycle(cycleId);
    if (!cycle) throw new NotFoundError("Cycle", cycleId);

    const [phases, events] = await Promise.all([
      this.store.listPhaseExecutions(cycleId),
      this.store.listEvents(cycleId),
    ]);
    return { cycle: summarizeCycle(cycle, phases), events };
  }

  /** Per-phase run statistics over recent executions; skipped phases are not runs. */
  async phaseStats(): Promise<PhaseStats[]> {
    const recent = await this.store.listRecentPhaseExecutions();

    return PIPELINE.map((phase) => {
      const runs = recent.filter((e) => e.phase === phase && e.status !== "skipped");
      if (runs.length === 0) {
        return {
          phase,
          total_runs: 0,
          success_rate: 0,
          avg_duration_seconds: 0,
          min_duration_seconds: 0,
          max_duration_seconds: 0,
          avg_items_processed: 0,
        };
      }

      const durations = runs.map((r) => r.duration_seconds);
      const completed = runs.filter((r) => r.status === "completed").length;
      return {
        phase,
        total_runs: runs.length,
        success_rate: completed / runs.length,
        avg_duration_seconds: durations.reduce((a, b) => a + b, 0) / runs.length,
        min_duration_seconds: Math.min(...durations),
        max_duration_seconds: Math.max(...durations),
        avg_items_processed: runs.reduce((a, r) => a + r.items_processed, 0) / runs.length,
      };
    });
  }
}
