/**
 * Registry routes — stage services register, heartbeat, and are listed here.
 */
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { ServiceRegistry } from "../../registry/src/index.js";

const registerBodySchema = z.object({
  service_name: z.string().min(1),
  host: z.string().min(1).default("localhost"),
  port: z.coerce.number().int().min(1).max(65535),
});

const heartbeatBodySchema = z.object({
  service_name: z.string().min(1),
});

export function registerRegistryRoutes(app: FastifyInstance, registry: ServiceRegistry): void {
  app.get("/service_status", async () => ({ services: registry.snapshot() }));

  app.post("/register_service", async (req) => {
    const body = registerBodySchema.parse(req.body);
    return registry.register(body.service_name, body.host, body.port);
  });

  app.post("/heartbeat", async (req) => {
    const body = heartbeatBodySchema.parse(req.body);
    return registry.heartbeat(body.service_name);
  });
}
