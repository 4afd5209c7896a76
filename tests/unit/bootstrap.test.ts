/**
 * Tests for coordinator wiring from configuration
 */
import { describe, it, expect, vi, afterEach } from "vitest";

vi.mock("@supabase/supabase-js", async () => {
  const { FakeSupabase } = await import("../helpers/fake-supabase.js");
  return { createClient: () => new FakeSupabase() };
});

import { ManualClock, jsonResponse, stageFetch } from "../helpers/coordinator.js";
import { configSchema } from "../../services/shared/src/config.js";
import { createCoordinator, type Coordinator } from "../../services/api/src/index.js";

describe("createCoordinator", () => {
  let coordinator: Coordinator | null = null;

  afterEach(async () => {
    await coordinator?.stop();
    coordinator = null;
  });

  it("should wire the configured limits into a working coordinator", async () => {
    const config = configSchema.parse({
      SUPABASE_URL: "https://test.supabase.co",
      SUPABASE_KEY: "test-key",
      PHASE_MAX_ATTEMPTS: "1",
      STAGE_DEFAULT_HOST: "stages.internal",
    });
    const stage = stageFetch({
      "stages.internal:5001/scan_securities": () => jsonResponse({ error: "maintenance" }, 503),
    });
    coordinator = createCoordinator(config, {
      fetchImpl: stage.fetchImpl,
      clock: new ManualClock("2026-02-10T15:30:00.000Z").now,
      sleep: async () => {},
    });

    await coordinator.store.ensureSchema();
    expect(await coordinator.registry.load()).toBe(0);
    expect((await coordinator.scheduler.load()).enabled).toBe(false);

    const res = await coordinator.server.inject({ method: "POST", url: "/start_trading_cycle" });

    expect(res.statusCode).toBe(200);
    expect(res.json().summary).toMatchObject({
      status: "failed",
      error_message: "scan failed: scan stage answered 503: maintenance",
    });
    expect(stage.calls.map((c) => `${c.host}${c.path}`)).toEqual(["stages.internal:5001/scan_securities"]);
  });

  it("should apply defaults for unset environment", () => {
    const config = configSchema.parse({ SUPABASE_URL: "https://test.supabase.co", SUPABASE_KEY: "test-key" });

    expect(config).toMatchObject({
      PORT: 5000,
      CYCLE_MAX_DURATION_MS: 600_000,
      PHASE_MAX_ATTEMPTS: 3,
      SCHEDULER_TICK_MS: 30_000,
      LOG_LEVEL: "info",
    });
  });
});
