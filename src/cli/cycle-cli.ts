/**
 * Client commands against a running coordinator.
 *
 * Usage:
 *   tradeflow trigger
 *   tradeflow trigger --async --url http://coordinator:5000
 *   tradeflow status
 */
import type { Command } from "commander";
import { z } from "zod";
import { clientConfigSchema, loadConfig } from "../../services/shared/src/config.js";
import { requestJson } from "../../services/shared/src/http.js";

const CLIENT_TIMEOUT_MS = 15 * 60_000;

const clientOptsSchema = z.object({
  url: z.string().url().optional(),
  async: z.boolean().default(false),
});

function baseUrl(url: string | undefined): string {
  if (url) return url.replace(/\/+$/, "");
  return `http://localhost:${loadConfig(clientConfigSchema).PORT}`;
}

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function registerCycleCli(program: Command): void {
  program
    .command("trigger")
    .description("Start a manual trading cycle")
    .option("--async", "Return as soon as the cycle is running", false)
    .option("--url <url>", "Coordinator base URL")
    .action(async (raw: unknown) => {
      const opts = clientOptsSchema.parse(raw);
      const res = await requestJson(`${baseUrl(opts.url)}/start_trading_cycle`, {
        method: "POST",
        body: { async: opts.async },
        timeoutMs: CLIENT_TIMEOUT_MS,
      });

      print(res.body);
      if (res.status === 409) {
        console.error("A cycle is already running");
        process.exitCode = 2;
      } else if (!res.ok) {
        process.exitCode = 1;
      }
    });

  program
    .command("status")
    .description("Show the schedule status and the latest cycle")
    .option("--url <url>", "Coordinator base URL")
    .action(async (raw: unknown) => {
      const opts = clientOptsSchema.parse(raw);
      const url = baseUrl(opts.url);
      const [schedule, latest] = await Promise.all([
        requestJson(`${url}/schedule/status`, { timeoutMs: 10_000 }),
        requestJson(`${url}/latest_cycle`, { timeoutMs: 10_000 }),
      ]);

      print({ schedule: schedule.body, latest_cycle: latest.body });
      if (!schedule.ok || !latest.ok) process.exitCode = 1;
    });
}
