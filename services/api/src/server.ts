/**
 * Coordinator HTTP surface (Fastify).
 *
 * Route modules register onto one instance; every error leaves through the
 * handler below as `{ ok: false, error, message }`.
 */
import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { createLogger } from "../../shared/src/logger.js";
import { CoordinatorError, ValidationError } from "../../shared/src/errors.js";
import type { ServiceRegistry } from "../../registry/src/index.js";
import type { TradingCycleOrchestrator } from "../../orchestrator/src/index.js";
import type { TradingScheduler } from "../../scheduler/src/index.js";
import { registerCycleRoutes } from "./cycle.routes.js";
import { registerScheduleRoutes } from "./schedule.routes.js";
import { registerRegistryRoutes } from "./registry.routes.js";

const log = createLogger("api");

export const SERVICE_NAME = "coordination";

export interface ApiDeps {
  orchestrator: TradingCycleOrchestrator;
  scheduler: TradingScheduler;
  registry: ServiceRegistry;
  clock?: () => Date;
}

export function buildServer(deps: ApiDeps): FastifyInstance {
  const app = Fastify({ logger: false });
  const clock = deps.clock ?? (() => new Date());

  app.addHook("onResponse", async (req, reply) => {
    log.info("request", {
      method: req.method,
      url: req.url,
      status: reply.statusCode,
      ms: Math.round(reply.elapsedTime),
    });
  });

  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof ZodError) {
      const mapped = ValidationError.fromIssues("Invalid request", err.issues);
      return reply.status(400).send({ ok: false, error: mapped.code, message: mapped.message });
    }

    if (err instanceof CoordinatorError) {
      if (err.statusCode >= 500) {
        log.error("Request failed", { url: req.url, code: err.code, error: err.message });
      }
      return reply.status(err.statusCode).send({ ok: false, error: err.code, message: err.message });
    }

    if (err.validation) {
      return reply.status(400).send({ ok: false, error: "VALIDATION", message: err.message });
    }

    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) {
      log.error("Unhandled error", { url: req.url, error: err.message, stack: err.stack });
    }
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode >= 500 ? "INTERNAL" : err.code,
      message: err.message,
    });
  });

  app.get("/health", async () => ({
    status: "healthy",
    service_name: SERVICE_NAME,
    timestamp: clock().toISOString(),
  }));

  registerCycleRoutes(app, deps.orchestrator);
  registerScheduleRoutes(app, deps.scheduler);
  registerRegistryRoutes(app, deps.registry);

  return app;
}
