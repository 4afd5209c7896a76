/**
 * Schedule routes — read and hot-reload the scheduler configuration.
 */
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { TradingScheduler } from "../../scheduler/src/index.js";

const enableBodySchema = z
  .object({
    interval_minutes: z.number().int().min(1).max(1440).optional(),
    market_hours_only: z.boolean().optional(),
  })
  .default({});

export function registerScheduleRoutes(app: FastifyInstance, scheduler: TradingScheduler): void {
  app.get("/schedule/status", async () => scheduler.getStatus());

  app.get("/schedule/config", async () => scheduler.getConfig());

  /** Partial updates merge onto the current config; 400 when the result is invalid. */
  app.post("/schedule/config", async (req) => scheduler.updateConfig(req.body ?? {}));

  app.post("/schedule/enable", async (req) => {
    const patch = enableBodySchema.parse(req.body ?? undefined);
    return scheduler.enable(patch);
  });

  app.post("/schedule/disable", async () => scheduler.disable());
}
