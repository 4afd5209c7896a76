/**
 * Health probe for a stage service's `GET /health` surface.
 */
import { z } from "zod";
import { requestJson, type FetchFn } from "../../shared/src/http.js";
import { errorMessage } from "../../shared/src/errors.js";

const UNHEALTHY = new Set(["unhealthy", "error", "down", "failed"]);

const healthBodySchema = z.object({
  status: z.string(),
  service_name: z.string().optional(),
});

export type ProbeResult =
  | { ok: true; latencyMs: number; serviceName: string | null }
  | { ok: false; latencyMs: number; error: string };

export async function probeHealth(
  baseUrl: string,
  timeoutMs: number,
  fetchImpl?: FetchFn
): Promise<ProbeResult> {
  const started = Date.now();
  const elapsed = (): number => Date.now() - started;

  try {
    const res = await requestJson(`${baseUrl}/health`, { timeoutMs, fetchImpl });
    if (!res.ok) return { ok: false, latencyMs: elapsed(), error: `HTTP ${res.status}` };

    const parsed = healthBodySchema.safeParse(res.body);
    if (!parsed.success) return { ok: false, latencyMs: elapsed(), error: "malformed health body" };
    if (UNHEALTHY.has(parsed.data.status.toLowerCase())) {
      return { ok: false, latencyMs: elapsed(), error: `reported ${parsed.data.status}` };
    }

    return { ok: true, latencyMs: elapsed(), serviceName: parsed.data.service_name ?? null };
  } catch (e) {
    return { ok: false, latencyMs: elapsed(), error: errorMessage(e) };
  }
}
