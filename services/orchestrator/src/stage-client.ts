/**
 * StageClient — one phase call against a stage service.
 *
 * Maps every outcome onto the error taxonomy so the retry loop can decide:
 *   network failure, timeout, 5xx, 429 → TransientNetworkError (retried)
 *   other 4xx                          → StageResponseError (not retried)
 *   malformed body                     → ValidationError (not retried)
 */
import { requestJson, type FetchFn } from "../../shared/src/http.js";
import { StageResponseError, TransientNetworkError } from "../../shared/src/errors.js";
import type { Phase } from "../../shared/src/types.js";
import { PHASE_ROUTES, parsePhaseResponse, type PhaseOutput } from "./phases.js";

export interface StageCall {
  cycleId: string;
  phase: Phase;
  baseUrl: string;
  items: unknown[];
  timeoutMs: number;
  idempotencyKey?: string;
}

function describeBody(body: unknown): string {
  if (typeof body === "string") return body.slice(0, 200);
  if (typeof body === "object" && body !== null) {
    if ("error" in body && typeof body.error === "string") return body.error;
    if ("message" in body && typeof body.message === "string") return body.message;
  }
  return String(JSON.stringify(body)).slice(0, 200);
}

export class StageClient {
  constructor(private readonly fetchImpl?: FetchFn) {}

  async call(req: StageCall): Promise<PhaseOutput> {
    const url = `${req.baseUrl}${PHASE_ROUTES[req.phase].path}`;

    const res = await requestJson(url, {
      method: "POST",
      body: { cycle_id: req.cycleId, phase: req.phase, items: req.items },
      headers: req.idempotencyKey ? { "Idempotency-Key": req.idempotencyKey } : undefined,
      timeoutMs: req.timeoutMs,
      fetchImpl: this.fetchImpl,
    });

    if (res.status >= 500 || res.status === 429) {
      throw new TransientNetworkError(
        `${req.phase} stage answered ${res.status}: ${describeBody(res.body)}`,
        { url, status: res.status }
      );
    }
    if (!res.ok) {
      throw new StageResponseError(
        `${req.phase} stage rejected the request (${res.status}): ${describeBody(res.body)}`,
        res.status,
        { url, body: res.body }
      );
    }

    return parsePhaseResponse(req.phase, res.body);
  }
}
