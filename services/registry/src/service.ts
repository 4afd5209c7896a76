/**
 * ServiceRegistry — live view of the stage services.
 *
 * Status moves only on evidence:
 *   - heartbeat or successful probe → active, failure counter reset
 *   - failed probe → degraded, then unreachable at the failure threshold
 *
 * Nothing here blocks a cycle. `resolve()` answers from memory, and
 * persistence failures during polling are logged rather than thrown.
 */
import { createLogger } from "../../shared/src/logger.js";
import { NotFoundError, ValidationError, errorMessage } from "../../shared/src/errors.js";
import type { FetchFn } from "../../shared/src/http.js";
import type {
  ServiceEndpoint,
  ServiceRecord,
  ServiceSnapshotEntry,
  ServiceStatus,
} from "../../shared/src/types.js";
import type { CoordinationStore } from "../../store/src/index.js";
import { probeHealth, type ProbeResult } from "./health.js";

const log = createLogger("registry");

export const DEFAULT_SERVICE_PORTS: Readonly<Record<string, number>> = {
  scanner: 5001,
  pattern: 5002,
  technical: 5003,
  trading: 5005,
};

export interface RegistryConfig {
  defaultHost: string;
  pollIntervalMs: number;
  probeTimeoutMs: number;
  failureThreshold: number;
  staleAfterMs: number;
  defaultPorts: Readonly<Record<string, number>>;
}

const DEFAULT_CONFIG: RegistryConfig = {
  defaultHost: "localhost",
  pollIntervalMs: 30_000,
  probeTimeoutMs: 2_000,
  failureThreshold: 3,
  staleAfterMs: 90_000,
  defaultPorts: DEFAULT_SERVICE_PORTS,
};

export interface RegistryDeps {
  fetchImpl?: FetchFn;
  clock?: () => Date;
}

export interface PollReport {
  probed: number;
  healthy: number;
  transitions: Array<{ name: string; from: ServiceStatus; to: ServiceStatus }>;
}

export function serviceUrl(host: string, port: number): string {
  return `http://${host}:${port}`;
}

/** Status after one probe, given the failure count before it. */
export function nextHealth(
  failuresBefore: number,
  probeOk: boolean,
  threshold: number
): { status: ServiceStatus; consecutive_failures: number } {
  if (probeOk) return { status: "active", consecutive_failures: 0 };
  const failures = failuresBefore + 1;
  return { status: failures >= threshold ? "unreachable" : "degraded", consecutive_failures: failures };
}

export class ServiceRegistry {
  private config: RegistryConfig;
  private records = new Map<string, ServiceRecord>();
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private polling = false;
  private readonly fetchImpl: FetchFn | undefined;
  private readonly clock: () => Date;

  constructor(
    private readonly store: CoordinationStore,
    config: Partial<RegistryConfig> = {},
    deps: RegistryDeps = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.fetchImpl = deps.fetchImpl;
    this.clock = deps.clock ?? (() => new Date());
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  async load(): Promise<number> {
    const rows = await this.store.listServices();
    this.records = new Map(rows.map((r) => [r.name, r]));
    log.info("Registry loaded", { services: rows.length });
    return rows.length;
  }

  start(): void {
    if (this.pollTimer) {
      log.warn("Health poller already running");
      return;
    }

    this.pollTimer = setInterval(() => {
      this.healthPoll().catch((e) => log.error("Health poll error", { error: errorMessage(e) }));
    }, this.config.pollIntervalMs);

    log.info("Health poller started", { intervalMs: this.config.pollIntervalMs });
  }

  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
      log.info("Health poller stopped");
    }
  }

  // ─── Registration ───────────────────────────────────────────────────

  /**
   * Idempotent on name; a re-registration replaces host and port. Status
   * belongs to the health checks, so only a first registration sets it.
   */
  async register(name: string, host: string, port: number): Promise<ServiceRecord> {
    const trimmed = name.trim();
    if (!trimmed) throw new ValidationError("service name must not be empty");
    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
      throw new ValidationError(`invalid port for ${trimmed}: ${port}`);
    }

    const existing = this.records.get(trimmed);
    const saved = await this.store.upsertService({
      name: trimmed,
      host,
      port,
      status: existing?.status ?? "starting",
      last_heartbeat: existing?.last_heartbeat ?? null,
      registered_at: this.clock().toISOString(),
      consecutive_failures: existing?.consecutive_failures ?? 0,
    });

    this.records.set(saved.name, saved);
    log.info("Service registered", {
      service: saved.name,
      url: serviceUrl(saved.host, saved.port),
      reregistered: existing !== undefined,
    });
    return saved;
  }

  async heartbeat(name: string): Promise<ServiceRecord> {
    const current = this.records.get(name);
    if (!current) throw new NotFoundError("Service", name);

    const next: ServiceRecord = {
      ...current,
      status: "active",
      consecutive_failures: 0,
      last_heartbeat: this.clock().toISOString(),
    };
    this.records.set(name, next);

    const saved = await this.store.updateServiceHealth(name, {
      status: next.status,
      consecutive_failures: next.consecutive_failures,
      last_heartbeat: next.last_heartbeat ?? undefined,
    });
    if (current.status !== "active") {
      log.info("Service active", { service: name, from: current.status });
    }
    return saved ?? next;
  }

  // ─── Health polling ─────────────────────────────────────────────────

  /** Probes every registered service concurrently. Skipped while a poll is in flight. */
  async healthPoll(): Promise<PollReport> {
    const report: PollReport = { probed: 0, healthy: 0, transitions: [] };
    if (this.polling) {
      log.debug("Health poll still in flight, skipping");
      return report;
    }

    this.polling = true;
    try {
      const targets = [...this.records.values()];
      const results = await Promise.all(
        targets.map(async (record): Promise<[ServiceRecord, ProbeResult]> => [
          record,
          await probeHealth(
            serviceUrl(record.host, record.port),
            this.config.probeTimeoutMs,
            this.fetchImpl
          ),
        ])
      );

      for (const [probed, result] of results) {
        report.probed++;
        if (result.ok) report.healthy++;
        const transition = await this.applyProbe(probed.name, result);
        if (transition) report.transitions.push(transition);
      }
      return report;
    } finally {
      this.polling = false;
    }
  }

  private async applyProbe(
    name: string,
    result: ProbeResult
  ): Promise<{ name: string; from: ServiceStatus; to: ServiceStatus } | null> {
    // Re-read: a heartbeat may have landed while the probe was in flight.
    const current = this.records.get(name);
    if (!current) return null;

    const health = nextHealth(current.consecutive_failures, result.ok, this.config.failureThreshold);
    const next: ServiceRecord = {
      ...current,
      ...health,
      last_heartbeat: result.ok ? this.clock().toISOString() : current.last_heartbeat,
    };
    this.records.set(name, next);

    if (!result.ok) {
      log.warn("Health probe failed", {
        service: name,
        failures: next.consecutive_failures,
        status: next.status,
        error: result.error,
      });
    }

    try {
      await this.store.updateServiceHealth(name, {
        status: next.status,
        consecutive_failures: next.consecutive_failures,
        last_heartbeat: next.last_heartbeat ?? undefined,
      });
    } catch (e) {
      log.error("Failed to persist service health", { service: name, error: errorMessage(e) });
    }

    if (current.status === next.status) return null;
    log.info("Service status changed", { service: name, from: current.status, to: next.status });
    return { name, from: current.status, to: next.status };
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  snapshot(): ServiceSnapshotEntry[] {
    const now = this.clock().getTime();
    const entries: ServiceSnapshotEntry[] = [...this.records.values()].map((r) => ({
      ...r,
      url: serviceUrl(r.host, r.port),
      registered: true,
      stale:
        r.last_heartbeat === null ||
        now - new Date(r.last_heartbeat).getTime() > this.config.staleAfterMs,
    }));

    for (const [name, port] of Object.entries(this.config.defaultPorts)) {
      if (this.records.has(name)) continue;
      entries.push({
        name,
        host: this.config.defaultHost,
        port,
        status: "starting",
        last_heartbeat: null,
        registered_at: "",
        consecutive_failures: 0,
        url: serviceUrl(this.config.defaultHost, port),
        registered: false,
        stale: true,
      });
    }

    return entries.sort((a, b) => a.name.localeCompare(b.name));
  }

  resolve(name: string): ServiceEndpoint {
    const record = this.records.get(name);
    if (record) {
      return { name, baseUrl: serviceUrl(record.host, record.port), status: record.status };
    }

    const port = this.config.defaultPorts[name];
    if (port === undefined) throw new NotFoundError("Service", name);
    return { name, baseUrl: serviceUrl(this.config.defaultHost, port), status: "unregistered" };
  }

  get(name: string): ServiceRecord | undefined {
    return this.records.get(name);
  }
}
