/**
 * `tradeflow serve` — run the coordinator in the foreground.
 *
 * Usage:
 *   tradeflow serve
 *   tradeflow serve --port 5050
 */
import type { Command } from "commander";
import { z } from "zod";
import { createLogger } from "../../services/shared/src/logger.js";
import { loadConfig } from "../../services/shared/src/config.js";
import { errorMessage } from "../../services/shared/src/errors.js";
import { createCoordinator } from "../../services/api/src/index.js";

const log = createLogger("cli:serve");

const serveOptsSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535).optional(),
});

export function registerServeCli(program: Command): void {
  program
    .command("serve")
    .description("Migrate, start registry polling and the scheduler, and serve the HTTP API")
    .option("--port <port>", "Port to listen on (overrides PORT)")
    .action(async (raw: unknown) => {
      const opts = serveOptsSchema.parse(raw);
      const config = loadConfig();
      const coordinator = createCoordinator({ ...config, PORT: opts.port ?? config.PORT });

      await coordinator.start();

      const shutdown = (signal: string): void => {
        log.info("Shutting down", { signal });
        coordinator
          .stop()
          .then(() => process.exit(0))
          .catch((e) => {
            log.error("Shutdown failed", { error: errorMessage(e) });
            process.exit(1);
          });
      };
      process.once("SIGINT", () => shutdown("SIGINT"));
      process.once("SIGTERM", () => shutdown("SIGTERM"));
    });
}
