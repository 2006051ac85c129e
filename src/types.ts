// src/types.ts
export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

/**
 * Produces a fresh body for every attempt. Use this for payloads that are
 * expensive to build or must not be shared between attempts.
 */
export type BodyFactory = () => string | Uint8Array;

/** Strings and byte arrays are re-readable as-is; a factory is re-invoked per attempt. */
export type RequestBody = string | Uint8Array | BodyFactory;

export interface HttpRequest {
  readonly method: HttpMethod;
  readonly url: string; // absolute, already resolved against the client's base URL
  readonly headers: Readonly<Record<string, string>>; // lower-cased keys
  readonly body?: RequestBody;
  readonly signal?: AbortSignal;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>; // lower-cased keys
  readonly body: Uint8Array; // fully buffered; helpers can parse JSON
  readonly request: HttpRequest;
}

/**
 * One request -> one response exchange. Rejects when no response was obtained
 * (connection failure, timeout, cancellation). Non-2xx statuses resolve.
 */
export interface Transport {
  roundTrip(req: HttpRequest): Promise<HttpResponse>;
}

export type Middleware = (next: Transport) => Transport;

export type KeyFn = (req: HttpRequest) => string;

export type BreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface BreakerOptions {
  failureThreshold: number; // consecutive failures that trip CLOSED -> OPEN
  successThreshold: number; // consecutive HALF_OPEN successes that close the circuit
  openTimeoutMs: number; // time spent OPEN before the next check may probe
  halfOpenMaxProbes?: number; // concurrent HALF_OPEN probes, default successThreshold
}

export interface PoolOptions {
  connections?: number; // max sockets per origin
  keepAliveTimeoutMs?: number;
}
