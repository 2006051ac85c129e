// src/retry.ts
import { exponentialBackoff, type BackoffStrategy } from "./backoff.js";
import { BodyReplayError, HttpChainError, isCancellation, isNetworkError } from "./errors.js";
import { transportFunc } from "./middleware.js";
import type { HttpRequest, HttpResponse, Middleware, Transport } from "./types.js";
import { sleep } from "./utils/abort.js";
import { isIdempotent } from "./utils/request.js";

/**
 * Decides whether an attempt's outcome deserves another try.
 * Exactly one of `response` / `error` is set.
 */
export type RetryCondition = (response: HttpResponse | undefined, error: unknown) => boolean;

export type OnRetry = (attempt: number, req: HttpRequest, response: HttpResponse | undefined, error: unknown) => void;

export interface RetryPolicy {
  maxAttempts: number; // total attempts, >= 1
  conditions: RetryCondition[]; // OR-ed
  backoff: BackoffStrategy;
  /** Never retry POST/PATCH. */
  retryOnlyIdempotent?: boolean;
  /** Called before each backoff sleep with the attempt that just finished. */
  onRetry?: OnRetry;
}

/** The transport rejected without a response, for a reason other than our own stages. */
export const retryOnNetworkError: RetryCondition = (response, error) =>
  response === undefined && error !== undefined && (!(error instanceof HttpChainError) || isNetworkError(error));

export const retryOnStatus5xx: RetryCondition = (response) => response !== undefined && response.status >= 500 && response.status <= 599;

export const retryOnStatus429: RetryCondition = (response) => response?.status === 429;

export function retryOnStatuses(...statuses: number[]): RetryCondition {
  const set = new Set(statuses);
  return (response) => response !== undefined && set.has(response.status);
}

export function retryOnErrors(predicate: (error: unknown) => boolean): RetryCondition {
  return (response, error) => response === undefined && error !== undefined && predicate(error);
}

export function defaultRetryPolicy(): RetryPolicy {
  return {
    maxAttempts: 3,
    conditions: [retryOnNetworkError, retryOnStatus5xx, retryOnStatus429],
    backoff: exponentialBackoff(100, 5_000, 0.1),
  };
}

export function validateRetryPolicy(policy: RetryPolicy): void {
  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1 (got ${policy.maxAttempts})`);
  }
}

type Outcome = { ok: true; response: HttpResponse } | { ok: false; error: unknown };

// Caller cancellation and an unreplayable body end the loop whatever the conditions say.
function isFatal(outcome: Outcome): boolean {
  return !outcome.ok && (isCancellation(outcome.error) || outcome.error instanceof BodyReplayError);
}

async function attempt(next: Transport, req: HttpRequest): Promise<Outcome> {
  try {
    return { ok: true, response: await next.roundTrip(req) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Run `req` through `next`, retrying per `policy`. Exhaustion hands back the
 * last response, or rethrows the last error, untouched.
 */
export async function executeWithRetry(next: Transport, req: HttpRequest, policy: RetryPolicy): Promise<HttpResponse> {
  validateRetryPolicy(policy);

  for (let n = 0; ; n++) {
    const outcome = await attempt(next, req);
    const response = outcome.ok ? outcome.response : undefined;
    const error = outcome.ok ? undefined : outcome.error;

    const wanted = !isFatal(outcome) && policy.conditions.some((cond) => cond(response, error));
    const allowed = n + 1 < policy.maxAttempts && (!policy.retryOnlyIdempotent || isIdempotent(req.method));

    if (!wanted || !allowed) {
      if (outcome.ok) return outcome.response;
      throw outcome.error;
    }

    policy.onRetry?.(n, req, response, error);
    await sleep(policy.backoff(n), req.signal);
  }
}

export function retryMiddleware(policy: RetryPolicy): Middleware {
  validateRetryPolicy(policy);
  return (next) => transportFunc((req) => executeWithRetry(next, req, policy));
}
