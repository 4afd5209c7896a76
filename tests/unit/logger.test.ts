/**
 * Tests for the structured JSON logger
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import {
  Logger,
  consoleSink,
  isLogLevel,
  resolveLogLevel,
  type LogLevel,
  type LogSink,
} from "../../services/shared/src/logger.js";

const clock = () => new Date("2026-02-10T15:30:00.000Z");

function capture(): { sink: LogSink; lines: Array<[LogLevel, string]> } {
  const lines: Array<[LogLevel, string]> = [];
  return { sink: (level, line) => lines.push([level, line]), lines };
}

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it("should drop entries below the minimum level", () => {
    const { sink, lines } = capture();
    const log = new Logger("scheduler", { minLevel: "warn", sink, clock });

    log.info("tick idle");
    log.warn("slow tick", { ms: 1200 });

    expect(lines).toEqual([
      [
        "warn",
        '{"timestamp":"2026-02-10T15:30:00.000Z","level":"warn","service":"scheduler","message":"slow tick","data":{"ms":1200}}',
      ],
    ]);
  });

  it("should tag audit entries with their action", () => {
    const { sink, lines } = capture();
    new Logger("orchestrator", { minLevel: "info", sink, clock }).audit("cycle_started", {
      cycleId: "cycle_a",
      trigger: "manual",
    });

    expect(lines).toEqual([
      [
        "info",
        '{"timestamp":"2026-02-10T15:30:00.000Z","level":"info","service":"orchestrator","message":"audit: cycle_started","audit":"cycle_started","data":{"cycleId":"cycle_a","trigger":"manual"}}',
      ],
    ]);
  });

  it("should leave out empty data", () => {
    const { sink, lines } = capture();
    new Logger("api", { minLevel: "debug", sink, clock }).debug("ready", {});

    expect(lines[0]?.[1]).toBe(
      '{"timestamp":"2026-02-10T15:30:00.000Z","level":"debug","service":"api","message":"ready"}'
    );
  });

  it("should keep the name and message of an Error in data", () => {
    const { sink, lines } = capture();
    new Logger("registry", { minLevel: "error", sink, clock }).error("Health check failed", {
      cause: new TypeError("fetch failed"),
    });

    expect(JSON.parse(lines[0]?.[1] ?? "null")).toEqual({
      timestamp: "2026-02-10T15:30:00.000Z",
      level: "error",
      service: "registry",
      message: "Health check failed",
      data: { cause: { name: "TypeError", message: "fetch failed" } },
    });
  });

  it("should take the minimum level from LOG_LEVEL when none is given", () => {
    vi.stubEnv("LOG_LEVEL", "error");
    const { sink, lines } = capture();
    const log = new Logger("store", { sink, clock });

    log.warn("slow query");
    log.error("connection lost");

    expect(lines.map(([level]) => level)).toEqual(["error"]);
  });

  it("should route console output by level", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const out = vi.spyOn(console, "log").mockImplementation(() => {});

    consoleSink("error", "e");
    consoleSink("warn", "w");
    consoleSink("info", "i");
    consoleSink("debug", "d");

    expect(err.mock.calls).toEqual([["e"]]);
    expect(warn.mock.calls).toEqual([["w"]]);
    expect(out.mock.calls).toEqual([["i"], ["d"]]);
  });
});

describe("log levels", () => {
  it("should recognise level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });

  it("should fall back to info for an unknown level", () => {
    expect(resolveLogLevel("warn")).toBe("warn");
    expect(resolveLogLevel("verbose")).toBe("info");
  });
});
