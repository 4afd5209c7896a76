/**
 * Tradeflow — Error taxonomy
 *
 * Every failure the coordinator reasons about has a class here. The HTTP
 * layer maps `statusCode` straight onto the response; the orchestrator
 * reads `retryable` to decide whether a phase call is attempted again.
 */

export type CoordinatorErrorCode =
  | "TRANSIENT_NETWORK"
  | "STAGE_RESPONSE"
  | "VALIDATION"
  | "PERSISTENCE"
  | "CONFIGURATION"
  | "NOT_FOUND";

export class CoordinatorError extends Error {
  constructor(
    message: string,
    public readonly code: CoordinatorErrorCode,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = "CoordinatorError";
  }

  get retryable(): boolean {
    return false;
  }
}

/** Stage unreachable, timed out, or answering 5xx / 429. */
export class TransientNetworkError extends CoordinatorError {
  constructor(message: string, details?: unknown) {
    super(message, "TRANSIENT_NETWORK", 502, details);
    this.name = "TransientNetworkError";
  }

  override get retryable(): boolean {
    return true;
  }

  static timeout(url: string, timeoutMs: number): TransientNetworkError {
    return new TransientNetworkError(`Request to ${url} timed out after ${timeoutMs}ms`, {
      url,
      timeoutMs,
    });
  }

  static unreachable(url: string, cause: unknown): TransientNetworkError {
    return new TransientNetworkError(`Request to ${url} failed: ${String(cause)}`, { url });
  }
}

/** Non-success answer from a stage that retrying will not fix (4xx). */
export class StageResponseError extends CoordinatorError {
  constructor(
    message: string,
    public readonly httpStatus: number,
    details?: unknown
  ) {
    super(message, "STAGE_RESPONSE", 502, details);
    this.name = "StageResponseError";
  }
}

export class ValidationError extends CoordinatorError {
  constructor(message: string, details?: unknown) {
    super(message, "VALIDATION", 400, details);
    this.name = "ValidationError";
  }

  static fromIssues(
    context: string,
    issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>
  ): ValidationError {
    const summary = issues
      .map((i) => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`)
      .join("; ");
    return new ValidationError(`${context}: ${summary}`, issues);
  }
}

export class PersistenceError extends CoordinatorError {
  constructor(
    message: string,
    public readonly table?: string,
    details?: unknown
  ) {
    super(message, "PERSISTENCE", 500, details);
    this.name = "PersistenceError";
  }

  static fromDb(operation: string, table: string, error: { message: string }): PersistenceError {
    return new PersistenceError(`DB ${operation} error (${table}): ${error.message}`, table, error);
  }
}

export class ConfigurationError extends CoordinatorError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIGURATION", 400, details);
    this.name = "ConfigurationError";
  }
}

export class NotFoundError extends CoordinatorError {
  constructor(what: string, id: string) {
    super(`${what} '${id}' not found`, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

/**
 * Returned, never thrown, when a trigger finds another cycle already
 * holding the current-cycle marker.
 */
export interface ConcurrencyConflict {
  kind: "conflict";
  activeCycleId: string | null;
  lockedAt: string | null;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
