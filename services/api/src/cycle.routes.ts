/**
 * Cycle routes — trigger and inspect trading cycles.
 */
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { createLogger } from "../../shared/src/logger.js";
import { errorMessage } from "../../shared/src/errors.js";
import type { TradingCycleOrchestrator } from "../../orchestrator/src/index.js";

const log = createLogger("api:cycles");

const startBodySchema = z
  .object({
    async: z.boolean().default(false),
  })
  .default({});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

const cycleParamsSchema = z.object({
  cycleId: z.string().min(1),
});

export function registerCycleRoutes(app: FastifyInstance, orchestrator: TradingCycleOrchestrator): void {
  /**
   * POST /start_trading_cycle
   * Runs a manual cycle. With `{ "async": true }` answers 202 as soon as
   * the cycle is running; otherwise waits for the summary.
   */
  app.post("/start_trading_cycle", async (req, reply) => {
    const body = startBodySchema.parse(req.body ?? undefined);

    if (body.async) {
      const begun = await orchestrator.beginCycle("manual");
      if (begun.kind === "conflict") {
        return reply.status(409).send({ error: "concurrency_conflict", active_cycle_id: begun.activeCycleId });
      }
      begun.completion.catch((e) =>
        log.error("Background cycle failed", { cycleId: begun.cycleId, error: errorMessage(e) })
      );
      return reply.status(202).send({ cycle_id: begun.cycleId, accepted: true });
    }

    const result = await orchestrator.triggerCycle("manual");
    if (result.kind === "conflict") {
      return reply.status(409).send({ error: "concurrency_conflict", active_cycle_id: result.activeCycleId });
    }
    return { cycle_id: result.summary.cycle_id, summary: result.summary };
  });

  app.get("/current_cycle", async () => ({ cycle: orchestrator.getCurrentCycle() }));

  app.get("/latest_cycle", async () => {
    const latest = await orchestrator.latestCycle();
    return latest ?? { status: "no_cycles" };
  });

  app.get("/cycles", async (req) => {
    const { limit } = listQuerySchema.parse(req.query);
    return { cycles: await orchestrator.listCycles(limit) };
  });

  app.get("/cycles/:cycleId", async (req) => {
    const { cycleId } = cycleParamsSchema.parse(req.params);
    return orchestrator.getCycleDetail(cycleId);
  });

  app.get("/phase_stats", async () => ({ phases: await orchestrator.phaseStats() }));
}
