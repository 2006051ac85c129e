// src/errors.ts
import type { HttpResponse } from "./types.js";

export type HttpChainErrorCode =
  | "ENETWORK"
  | "ETIMEOUT"
  | "EABORTED"
  | "ECIRCUITOPEN"
  | "ERATELIMIT"
  | "EHTTPSTATUS"
  | "EBODYREPLAY"
  | "ECONFIG";

export abstract class HttpChainError extends Error {
  abstract readonly code: HttpChainErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The transport failed before any response was received (dial, reset, DNS...). */
export class NetworkError extends HttpChainError {
  readonly code = "ENETWORK";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class RequestTimeoutError extends HttpChainError {
  readonly code = "ETIMEOUT";

  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
  }
}

/** The caller's signal fired. */
export class RequestAbortedError extends HttpChainError {
  readonly code = "EABORTED";

  constructor(cause?: unknown) {
    super("Request was aborted by the caller", { cause });
  }
}

export class CircuitOpenError extends HttpChainError {
  readonly code = "ECIRCUITOPEN";

  constructor(public readonly key: string, public readonly retryAfterMs: number) {
    super(`Circuit open for "${key}" (retry after ${retryAfterMs}ms)`);
  }
}

/** The caller's signal fired while waiting for a rate-limit token. */
export class RateLimitCancelledError extends HttpChainError {
  readonly code = "ERATELIMIT";

  constructor(public readonly key: string, cause?: unknown) {
    super(`Cancelled while waiting for a rate-limit token for "${key}"`, { cause });
  }
}

export class HttpStatusError extends HttpChainError {
  readonly code = "EHTTPSTATUS";
  readonly status: number;

  constructor(public readonly response: HttpResponse) {
    super(`${response.request.method} ${response.request.url} failed with status ${response.status}`);
    this.status = response.status;
  }
}

export class BodyReplayError extends HttpChainError {
  readonly code = "EBODYREPLAY";

  constructor(cause: unknown) {
    super("Request body could not be materialized for this attempt", { cause });
  }
}

export class ConfigError extends HttpChainError {
  readonly code = "ECONFIG";
}

/** True for a reason set by `AbortSignal.timeout()` or by a timeout stage. */
function isDeadlineReason(reason: unknown): boolean {
  if (reason instanceof RequestTimeoutError) return true;
  return typeof reason === "object" && reason !== null && "name" in reason && reason.name === "TimeoutError";
}

/**
 * A timeout of ours, or a cancellation whose signal fired because the caller's
 * deadline (`AbortSignal.timeout`) ran out.
 */
export function isTimeout(err: unknown): boolean {
  if (err instanceof RequestTimeoutError) return true;
  return (err instanceof RequestAbortedError || err instanceof RateLimitCancelledError) && isDeadlineReason(err.cause);
}

/** Caller-side cancellation, whether it surfaced from a transport, a token wait or a backoff sleep. */
export function isCancellation(err: unknown): boolean {
  return err instanceof RequestAbortedError || err instanceof RateLimitCancelledError;
}

export function isNetworkError(err: unknown): err is NetworkError | RequestTimeoutError {
  return err instanceof NetworkError || err instanceof RequestTimeoutError;
}

export function isCircuitOpen(err: unknown): err is CircuitOpenError {
  return err instanceof CircuitOpenError;
}
