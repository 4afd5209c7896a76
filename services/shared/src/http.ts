/**
 * Tradeflow — JSON over HTTP
 * The one place outbound requests are made. Network failures and timeouts
 * become TransientNetworkError; status codes are left to the caller.
 */
import { TransientNetworkError } from "./errors.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsonRequest {
  method?: "GET" | "POST";
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs: number;
  fetchImpl?: FetchFn;
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

function isTimeout(e: unknown): boolean {
  return typeof e === "object" && e !== null && "name" in e &&
    (e.name === "TimeoutError" || e.name === "AbortError");
}

export async function requestJson(url: string, req: JsonRequest): Promise<JsonResponse> {
  const fetchImpl = req.fetchImpl ?? fetch;

  try {
    const res = await fetchImpl(url, {
      method: req.method ?? "GET",
      headers: {
        accept: "application/json",
        ...(req.body !== undefined && { "content-type": "application/json" }),
        ...req.headers,
      },
      body: req.body === undefined ? undefined : JSON.stringify(req.body),
      signal: AbortSignal.timeout(req.timeoutMs),
    });

    const text = await res.text();
    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }

    return { status: res.status, ok: res.ok, body };
  } catch (e) {
    if (isTimeout(e)) throw TransientNetworkError.timeout(url, req.timeoutMs);
    throw TransientNetworkError.unreachable(url, e);
  }
}
