/**
 * Tests for ServiceRegistry: registration, heartbeats, health polling
 */
import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("@supabase/supabase-js", async () => {
  const { FakeSupabase } = await import("../helpers/fake-supabase.js");
  return { createClient: () => new FakeSupabase() };
});

import { ManualClock, jsonResponse, makeStore, stageFetch } from "../helpers/coordinator.js";
import type { FakeSupabase } from "../helpers/fake-supabase.js";
import type { CoordinationStore } from "../../services/store/src/index.js";
import { ServiceRegistry, nextHealth } from "../../services/registry/src/index.js";
import { NotFoundError, ValidationError } from "../../services/shared/src/errors.js";

const healthy = () => jsonResponse({ status: "healthy", service_name: "stage" });

describe("nextHealth", () => {
  it("should reset to active on success", () => {
    expect(nextHealth(2, true, 3)).toEqual({ status: "active", consecutive_failures: 0 });
  });

  it("should degrade below the threshold and go unreachable at it", () => {
    expect(nextHealth(0, false, 3)).toEqual({ status: "degraded", consecutive_failures: 1 });
    expect(nextHealth(1, false, 3)).toEqual({ status: "degraded", consecutive_failures: 2 });
    expect(nextHealth(2, false, 3)).toEqual({ status: "unreachable", consecutive_failures: 3 });
  });
});

describe("ServiceRegistry", () => {
  let store: CoordinationStore;
  let fake: FakeSupabase;
  let clock: ManualClock;

  beforeEach(async () => {
    ({ store, fake } = await makeStore());
    clock = new ManualClock("2026-02-10T15:00:00.000Z");
  });

  function makeRegistry(routes: Parameters<typeof stageFetch>[0] = {}) {
    const stage = stageFetch(routes);
    const registry = new ServiceRegistry(
      store,
      { defaultHost: "localhost", failureThreshold: 3, staleAfterMs: 90_000 },
      { fetchImpl: stage.fetchImpl, clock: clock.now }
    );
    return { registry, calls: stage.calls };
  }

  describe("register", () => {
    it("should upsert by name so re-registration updates in place", async () => {
      const { registry } = makeRegistry();
      await registry.register("scanner", "10.0.0.1", 5001);
      await registry.register("scanner", "10.0.0.2", 5011);

      const rows = await store.listServices();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({ name: "scanner", host: "10.0.0.2", port: 5011, status: "starting" });
      expect(registry.resolve("scanner").baseUrl).toBe("http://10.0.0.2:5011");
    });

    it("should keep the health-check status when a service re-registers", async () => {
      const { registry } = makeRegistry();
      await registry.register("scanner", "localhost", 5001);
      await registry.heartbeat("scanner");

      const active = await registry.register("scanner", "10.0.0.2", 5001);
      expect(active).toMatchObject({ status: "active", consecutive_failures: 0, host: "10.0.0.2" });

      await registry.register("pattern", "localhost", 5002);
      await registry.healthPoll();
      await registry.healthPoll();
      await registry.healthPoll();

      const unreachable = await registry.register("pattern", "localhost", 5002);
      expect(unreachable).toMatchObject({ status: "unreachable", consecutive_failures: 3 });
      expect((await store.getService("pattern"))?.status).toBe("unreachable");
    });

    it("should reject an invalid port", async () => {
      const { registry } = makeRegistry();
      await expect(registry.register("scanner", "localhost", 70_000)).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("heartbeat", () => {
    it("should reject unknown services", async () => {
      const { registry } = makeRegistry();
      await expect(registry.heartbeat("ghost")).rejects.toBeInstanceOf(NotFoundError);
    });

    it("should mark the service active and stamp the heartbeat", async () => {
      const { registry } = makeRegistry();
      await registry.register("scanner", "localhost", 5001);

      const record = await registry.heartbeat("scanner");

      expect(record.status).toBe("active");
      expect(record.last_heartbeat).toBe("2026-02-10T15:00:00.000Z");
      expect((await store.getService("scanner"))?.status).toBe("active");
    });
  });

  describe("healthPoll", () => {
    it("should mark answering services active", async () => {
      const { registry, calls } = makeRegistry({ "localhost:5001/health": healthy });
      await registry.register("scanner", "localhost", 5001);

      const report = await registry.healthPoll();

      expect(report).toEqual({
        probed: 1,
        healthy: 1,
        transitions: [{ name: "scanner", from: "starting", to: "active" }],
      });
      expect(calls[0]).toMatchObject({ host: "localhost:5001", path: "/health", method: "GET" });
      expect(registry.get("scanner")?.last_heartbeat).toBe("2026-02-10T15:00:00.000Z");
    });

    it("should degrade then mark unreachable after consecutive failures", async () => {
      const { registry } = makeRegistry();
      await registry.register("pattern", "localhost", 5002);

      await registry.healthPoll();
      expect(registry.get("pattern")).toMatchObject({ status: "degraded", consecutive_failures: 1 });

      await registry.healthPoll();
      expect(registry.get("pattern")).toMatchObject({ status: "degraded", consecutive_failures: 2 });

      await registry.healthPoll();
      expect(registry.get("pattern")).toMatchObject({ status: "unreachable", consecutive_failures: 3 });
      expect((await store.getService("pattern"))?.status).toBe("unreachable");
    });

    it("should treat a reported unhealthy status as a failure", async () => {
      const { registry } = makeRegistry({
        "localhost:5003/health": () => jsonResponse({ status: "unhealthy" }),
      });
      await registry.register("technical", "localhost", 5003);

      const report = await registry.healthPoll();

      expect(report.healthy).toBe(0);
      expect(registry.get("technical")?.status).toBe("degraded");
    });

    it("should recover to active after a success", async () => {
      let up = false;
      const { registry } = makeRegistry({
        "localhost:5005/health": () => (up ? healthy() : jsonResponse({ error: "down" }, 503)),
      });
      await registry.register("trading", "localhost", 5005);

      await registry.healthPoll();
      await registry.healthPoll();
      up = true;
      await registry.healthPoll();

      expect(registry.get("trading")).toMatchObject({ status: "active", consecutive_failures: 0 });
    });

    it("should not overlap a poll that is still in flight", async () => {
      const { registry } = makeRegistry({ "localhost:5001/health": healthy });
      await registry.register("scanner", "localhost", 5001);

      const [first, second] = await Promise.all([registry.healthPoll(), registry.healthPoll()]);

      expect(first.probed).toBe(1);
      expect(second.probed).toBe(0);
    });

    it("should log rather than throw when the store is unavailable", async () => {
      const { registry } = makeRegistry({ "localhost:5001/health": healthy });
      await registry.register("scanner", "localhost", 5001);
      fake.failOn("service_records");

      const report = await registry.healthPoll();

      expect(report.healthy).toBe(1);
      expect(registry.get("scanner")?.status).toBe("active");
    });
  });

  describe("snapshot and resolve", () => {
    it("should flag entries whose heartbeat is older than the stale window", async () => {
      const { registry } = makeRegistry();
      await registry.register("scanner", "localhost", 5001);
      await registry.heartbeat("scanner");

      clock.advance(60_000);
      expect(registry.snapshot().find((s) => s.name === "scanner")?.stale).toBe(false);

      clock.advance(31_000);
      expect(registry.snapshot().find((s) => s.name === "scanner")?.stale).toBe(true);
    });

    it("should list default endpoints for services that never registered", async () => {
      const { registry } = makeRegistry();
      await registry.register("scanner", "10.0.0.1", 5001);

      const snapshot = registry.snapshot();

      expect(snapshot.map((s) => s.name)).toEqual(["pattern", "scanner", "technical", "trading"]);
      expect(snapshot.find((s) => s.name === "pattern")).toMatchObject({
        url: "http://localhost:5002",
        registered: false,
      });
      expect(snapshot.find((s) => s.name === "scanner")).toMatchObject({
        url: "http://10.0.0.1:5001",
        registered: true,
      });
    });

    it("should fall back to the default port table", () => {
      const { registry } = makeRegistry();

      expect(registry.resolve("technical")).toEqual({
        name: "technical",
        baseUrl: "http://localhost:5003",
        status: "unregistered",
      });
      expect(() => registry.resolve("unknown")).toThrow(NotFoundError);
    });

    it("should rebuild its cache from the store", async () => {
      const { registry } = makeRegistry();
      await registry.register("trading", "10.0.0.9", 6005);

      const { registry: restarted } = makeRegistry();
      expect(await restarted.load()).toBe(1);
      expect(restarted.resolve("trading").baseUrl).toBe("http://10.0.0.9:6005");
    });
  });
});
