/**
 * Wires the coordinator from validated configuration: store → registry →
 * orchestrator → scheduler → HTTP server.
 */
import type { FastifyInstance } from "fastify";
import type { SupabaseClient } from "@supabase/supabase-js";
import { createLogger } from "../../shared/src/logger.js";
import type { CoordinatorConfig } from "../../shared/src/config.js";
import { createDb } from "../../shared/src/db.js";
import type { FetchFn } from "../../shared/src/http.js";
import { CoordinationStore } from "../../store/src/index.js";
import { ServiceRegistry } from "../../registry/src/index.js";
import { TradingCycleOrchestrator } from "../../orchestrator/src/index.js";
import { TradingScheduler } from "../../scheduler/src/index.js";
import { buildServer } from "./server.js";

const log = createLogger("coordinator");

export interface CoordinatorOverrides {
  db?: SupabaseClient;
  fetchImpl?: FetchFn;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface Coordinator {
  store: CoordinationStore;
  registry: ServiceRegistry;
  orchestrator: TradingCycleOrchestrator;
  scheduler: TradingScheduler;
  server: FastifyInstance;
  /** Migrate, load state, start background loops, listen. Resolves with the bound address. */
  start(): Promise<string>;
  stop(): Promise<void>;
}

export function createCoordinator(config: CoordinatorConfig, overrides: CoordinatorOverrides = {}): Coordinator {
  const db = overrides.db ?? createDb(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY || config.SUPABASE_KEY);
  const store = new CoordinationStore(db);

  const registry = new ServiceRegistry(
    store,
    {
      defaultHost: config.STAGE_DEFAULT_HOST,
      pollIntervalMs: config.HEALTH_POLL_INTERVAL_MS,
      probeTimeoutMs: config.HEALTH_PROBE_TIMEOUT_MS,
      failureThreshold: config.HEALTH_FAILURE_THRESHOLD,
      staleAfterMs: config.HEARTBEAT_STALE_MS,
    },
    { fetchImpl: overrides.fetchImpl, clock: overrides.clock }
  );

  const orchestrator = new TradingCycleOrchestrator(
    store,
    registry,
    {
      maxCycleDurationMs: config.CYCLE_MAX_DURATION_MS,
      lockGraceMs: config.LOCK_GRACE_MS,
      maxAttempts: config.PHASE_MAX_ATTEMPTS,
      baseDelayMs: config.RETRY_BASE_DELAY_MS,
      maxDelayMs: config.RETRY_MAX_DELAY_MS,
      stageTimeoutMs: config.STAGE_TIMEOUT_MS,
      tradeTimeoutMs: config.TRADE_TIMEOUT_MS,
    },
    { fetchImpl: overrides.fetchImpl, clock: overrides.clock, sleep: overrides.sleep }
  );

  const scheduler = new TradingScheduler(
    store,
    orchestrator,
    { tickIntervalMs: config.SCHEDULER_TICK_MS },
    { clock: overrides.clock }
  );

  const server = buildServer({ orchestrator, scheduler, registry, clock: overrides.clock });

  return {
    store,
    registry,
    orchestrator,
    scheduler,
    server,

    async start() {
      await store.ensureSchema();
      await registry.load();
      await scheduler.load();
      registry.start();
      scheduler.start();

      const address = await server.listen({ port: config.PORT, host: config.HOST });
      log.info("Coordinator listening", { address, env: config.NODE_ENV });
      return address;
    },

    async stop() {
      scheduler.stop();
      registry.stop();
      await server.close();
      log.info("Coordinator stopped");
    },
  };
}
