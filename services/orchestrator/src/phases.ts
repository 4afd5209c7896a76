/**
 * Phase contracts — where each phase is served and what it must return.
 * Stage responses are validated here and tagged with their phase, so the
 * rest of the orchestrator never inspects an untyped payload.
 */
import { z } from "zod";
import { ValidationError } from "../../shared/src/errors.js";
import type { CycleMetrics, Phase } from "../../shared/src/types.js";

export interface PhaseRoute {
  service: string;
  path: string;
}

export const PHASE_ROUTES: Readonly<Record<Phase, PhaseRoute>> = {
  scan: { service: "scanner", path: "/scan_securities" },
  pattern_analysis: { service: "pattern", path: "/analyze_patterns" },
  technical_analysis: { service: "technical", path: "/analyze_technical" },
  signal_generation: { service: "technical", path: "/generate_signals" },
  trade_execution: { service: "trading", path: "/execute_trades" },
};

// ─── Item schemas ─────────────────────────────────────────────────────

export const securitySchema = z.object({
  symbol: z.string().min(1),
  price: z.number().optional(),
  volume: z.number().optional(),
  change_percent: z.number().optional(),
  score: z.number().optional(),
});

export const patternResultSchema = z.object({
  symbol: z.string().min(1),
  patterns: z.array(
    z.object({
      name: z.string(),
      confidence: z.number(),
      direction: z.enum(["bullish", "bearish", "neutral"]).optional(),
    })
  ),
});

export const technicalResultSchema = z.object({
  symbol: z.string().min(1),
  signal: z.enum(["buy", "sell", "hold"]),
  confidence: z.number(),
  indicators: z.record(z.number()).default({}),
});

export const tradeSignalSchema = z.object({
  symbol: z.string().min(1),
  action: z.enum(["buy", "sell"]),
  confidence: z.number(),
  quantity: z.number().optional(),
  entry_price: z.number().optional(),
  stop_loss: z.number().optional(),
  take_profit: z.number().optional(),
});

export const tradeResultSchema = z.object({
  symbol: z.string().min(1),
  action: z.enum(["buy", "sell"]),
  status: z.enum(["filled", "submitted", "rejected", "failed"]),
  order_id: z.string().optional(),
  quantity: z.number().optional(),
  price: z.number().optional(),
  reason: z.string().optional(),
});

export type Security = z.infer<typeof securitySchema>;
export type PatternResult = z.infer<typeof patternResultSchema>;
export type TechnicalResult = z.infer<typeof technicalResultSchema>;
export type TradeSignal = z.infer<typeof tradeSignalSchema>;
export type TradeResult = z.infer<typeof tradeResultSchema>;

const metadataSchema = z.record(z.unknown()).default({});

function envelope<T extends z.ZodTypeAny>(item: T) {
  return z.object({ items: z.array(item), metadata: metadataSchema });
}

const responseSchemas = {
  scan: envelope(securitySchema),
  pattern_analysis: envelope(patternResultSchema),
  technical_analysis: envelope(technicalResultSchema),
  signal_generation: envelope(tradeSignalSchema),
  trade_execution: envelope(tradeResultSchema),
} as const;

// ─── Tagged output ────────────────────────────────────────────────────

type Tagged<P extends Phase, I> = { phase: P; items: I[]; metadata: Record<string, unknown> };

export type PhaseOutput =
  | Tagged<"scan", Security>
  | Tagged<"pattern_analysis", PatternResult>
  | Tagged<"technical_analysis", TechnicalResult>
  | Tagged<"signal_generation", TradeSignal>
  | Tagged<"trade_execution", TradeResult>;

function validate<T extends z.ZodTypeAny>(schema: T, phase: Phase, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) throw ValidationError.fromIssues(`Malformed ${phase} response`, result.error.issues);
  return result.data;
}

export function parsePhaseResponse(phase: Phase, body: unknown): PhaseOutput {
  switch (phase) {
    case "scan":
      return { phase, ...validate(responseSchemas.scan, phase, body) };
    case "pattern_analysis":
      return { phase, ...validate(responseSchemas.pattern_analysis, phase, body) };
    case "technical_analysis":
      return { phase, ...validate(responseSchemas.technical_analysis, phase, body) };
    case "signal_generation":
      return { phase, ...validate(responseSchemas.signal_generation, phase, body) };
    case "trade_execution":
      return { phase, ...validate(responseSchemas.trade_execution, phase, body) };
  }
}

// ─── Counting ─────────────────────────────────────────────────────────

export interface ItemCounts {
  processed: number;
  succeeded: number;
  failed: number;
}

export function countItems(output: PhaseOutput): ItemCounts {
  const processed = output.items.length;
  switch (output.phase) {
    case "pattern_analysis": {
      const succeeded = output.items.filter((i) => i.patterns.length > 0).length;
      return { processed, succeeded, failed: processed - succeeded };
    }
    case "trade_execution": {
      const succeeded = output.items.filter(
        (t) => t.status === "filled" || t.status === "submitted"
      ).length;
      return { processed, succeeded, failed: processed - succeeded };
    }
    case "scan":
    case "technical_analysis":
    case "signal_generation":
      return { processed, succeeded: processed, failed: 0 };
  }
}

type CountMetric = keyof Pick<
  CycleMetrics,
  "securities_scanned" | "patterns_found" | "signals_generated" | "trades_executed"
>;

/** The cycle metric a phase contributes to, and how much. */
export function metricContribution(output: PhaseOutput): { metric: CountMetric; value: number } | null {
  const { succeeded } = countItems(output);
  switch (output.phase) {
    case "scan":
      return { metric: "securities_scanned", value: output.items.length };
    case "pattern_analysis":
      return { metric: "patterns_found", value: succeeded };
    case "technical_analysis":
      return null;
    case "signal_generation":
      return { metric: "signals_generated", value: output.items.length };
    case "trade_execution":
      return { metric: "trades_executed", value: succeeded };
  }
}
