/**
 * Tradeflow — Runtime Configuration & Validation
 * Uses Zod schemas to validate environment variables at startup.
 * Components call `loadConfig()` and get typed, validated config or a clear error.
 */
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { worstCaseDurationMs } from "./retry.js";

// ─── Schema Definitions ───────────────────────────────────────────────

const supabaseSchema = z.object({
  SUPABASE_URL: z.string().url("SUPABASE_URL must be a valid URL"),
  SUPABASE_KEY: z.string().min(1, "SUPABASE_KEY is required"),
  SUPABASE_SERVICE_ROLE_KEY: z.string().optional(),
});

const serverSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  HOST: z.string().default("0.0.0.0"),
});

const registrySchema = z.object({
  STAGE_DEFAULT_HOST: z.string().default("localhost"),
  HEALTH_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(30_000),
  HEALTH_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(2_000),
  HEALTH_FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(3),
  HEARTBEAT_STALE_MS: z.coerce.number().int().positive().default(90_000),
});

const orchestratorSchema = z.object({
  CYCLE_MAX_DURATION_MS: z.coerce.number().int().positive().default(600_000),
  LOCK_GRACE_MS: z.coerce.number().int().min(0).default(60_000),
  PHASE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(15_000),
  STAGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  TRADE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

const schedulerSchema = z.object({
  SCHEDULER_TICK_MS: z.coerce.number().int().positive().default(30_000),
});

const appSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

// ─── Full Config Schema ───────────────────────────────────────────────

export const configSchema = appSchema
  .merge(supabaseSchema)
  .merge(serverSchema)
  .merge(registrySchema)
  .merge(orchestratorSchema)
  .merge(schedulerSchema)
  .superRefine((config, ctx) => {
    // The lock is refreshed between phases; one phase must fit inside the stale-lock window.
    const window = config.CYCLE_MAX_DURATION_MS + config.LOCK_GRACE_MS;
    const phase = worstCaseDurationMs(
      {
        maxAttempts: config.PHASE_MAX_ATTEMPTS,
        baseDelayMs: config.RETRY_BASE_DELAY_MS,
        maxDelayMs: config.RETRY_MAX_DELAY_MS,
      },
      Math.max(config.STAGE_TIMEOUT_MS, config.TRADE_TIMEOUT_MS)
    );
    if (window <= phase) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CYCLE_MAX_DURATION_MS"],
        message: `CYCLE_MAX_DURATION_MS + LOCK_GRACE_MS (${window}ms) must exceed the longest single phase (${phase}ms)`,
      });
    }
  });

export type CoordinatorConfig = z.infer<typeof configSchema>;

// ─── Partial Schemas (for commands that only need a subset) ───────────

export const migrateConfigSchema = appSchema.merge(supabaseSchema);
export type MigrateConfig = z.infer<typeof migrateConfigSchema>;

export const clientConfigSchema = appSchema.merge(serverSchema);
export type ClientConfig = z.infer<typeof clientConfigSchema>;

// ─── Loader ───────────────────────────────────────────────────────────

/**
 * Validate and load config from process.env.
 * Pass a specific schema for command-level validation, or omit for full config.
 */
export function loadConfig(): CoordinatorConfig;
export function loadConfig<T extends z.ZodTypeAny>(schema: T): z.infer<T>;
export function loadConfig(schema?: z.ZodTypeAny): unknown {
  const target = schema ?? configSchema;
  const result = target.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigurationError(`[TradeflowConfig] Invalid configuration:\n${errors}`, result.error.issues);
  }

  return result.data;
}
