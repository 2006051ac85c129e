// src/breaker.ts
import { CircuitOpenError, ConfigError, HttpChainError, isCancellation, isNetworkError } from "./errors.js";
import { transportFunc } from "./middleware.js";
import type { BreakerOptions, BreakerState, HttpResponse, KeyFn, Middleware } from "./types.js";
import { hostOf } from "./utils/request.js";

export const DEFAULT_BREAKER_OPTIONS: Readonly<BreakerOptions> = {
  failureThreshold: 5,
  successThreshold: 1,
  openTimeoutMs: 30_000,
};

interface BreakerBucket {
  state: BreakerState;
  openedAtMs?: number;

  consecutiveFailures: number;

  // HALF_OPEN bookkeeping
  consecutiveSuccesses: number;
  halfOpenInFlight: number;
}

export interface BreakerDecision {
  allowed: boolean;
  state: BreakerState;
  retryAfterMs?: number; // only when blocked
}

export interface BreakerTransition {
  changed: boolean;
  from?: BreakerState;
  to?: BreakerState;
}

export interface BreakerSnapshotEntry {
  key: string;
  state: BreakerState;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  openedAtMs?: number;
}

const UNCHANGED: BreakerTransition = { changed: false };

/**
 * Process-local circuit breaker, one state machine per key.
 * - CLOSED: allow; `failureThreshold` consecutive failures trip it OPEN.
 * - OPEN: block until `openTimeoutMs` passes; the first check after that moves to HALF_OPEN and is let through.
 * - HALF_OPEN: allow limited probes; close after `successThreshold` consecutive successes, reopen on any failure.
 */
export class CircuitBreaker {
  private readonly opts: Required<BreakerOptions>;
  private readonly buckets = new Map<string, BreakerBucket>();

  constructor(opts: BreakerOptions = DEFAULT_BREAKER_OPTIONS) {
    if (!Number.isInteger(opts.failureThreshold) || opts.failureThreshold <= 0)
      throw new ConfigError("failureThreshold must be an integer > 0");
    if (!Number.isInteger(opts.successThreshold) || opts.successThreshold <= 0)
      throw new ConfigError("successThreshold must be an integer > 0");
    if (!Number.isFinite(opts.openTimeoutMs) || opts.openTimeoutMs < 0) throw new ConfigError("openTimeoutMs must be >= 0");

    const probes = opts.halfOpenMaxProbes ?? opts.successThreshold;
    if (!Number.isInteger(probes) || probes <= 0) throw new ConfigError("halfOpenMaxProbes must be an integer > 0");

    this.opts = { ...opts, halfOpenMaxProbes: probes };
  }

  private bucket(key: string): BreakerBucket {
    let b = this.buckets.get(key);
    if (!b) {
      b = { state: "CLOSED", consecutiveFailures: 0, consecutiveSuccesses: 0, halfOpenInFlight: 0 };
      this.buckets.set(key, b);
    }
    return b;
  }

  /**
   * Decide whether an outbound call is allowed for this key.
   * If allowed, caller MUST later call `onSuccess`, `onFailure` or `release`.
   */
  allow(key: string, nowMs: number = Date.now()): BreakerDecision {
    const b = this.bucket(key);

    if (b.state === "OPEN") {
      const elapsed = nowMs - (b.openedAtMs ?? nowMs);
      const remaining = this.opts.openTimeoutMs - elapsed;

      if (remaining > 0) {
        return { allowed: false, state: "OPEN", retryAfterMs: remaining };
      }

      // timeout passed -> this check becomes the trial request
      this.toHalfOpen(b);
    }

    if (b.state === "HALF_OPEN") {
      if (b.halfOpenInFlight >= this.opts.halfOpenMaxProbes) {
        return { allowed: false, state: "HALF_OPEN", retryAfterMs: 0 };
      }
      b.halfOpenInFlight += 1;
      return { allowed: true, state: "HALF_OPEN" };
    }

    return { allowed: true, state: "CLOSED" };
  }

  onSuccess(key: string): BreakerTransition {
    const b = this.bucket(key);

    if (b.state === "HALF_OPEN") {
      b.halfOpenInFlight = Math.max(0, b.halfOpenInFlight - 1);
      b.consecutiveSuccesses += 1;

      if (b.consecutiveSuccesses >= this.opts.successThreshold) {
        this.toClosed(b);
        return { changed: true, from: "HALF_OPEN", to: "CLOSED" };
      }
      return UNCHANGED;
    }

    if (b.state === "CLOSED") b.consecutiveFailures = 0;
    return UNCHANGED;
  }

  onFailure(key: string, nowMs: number = Date.now()): BreakerTransition {
    const b = this.bucket(key);

    if (b.state === "HALF_OPEN") {
      this.toOpen(b, nowMs);
      return { changed: true, from: "HALF_OPEN", to: "OPEN" };
    }

    if (b.state === "CLOSED") {
      b.consecutiveFailures += 1;
      if (b.consecutiveFailures >= this.opts.failureThreshold) {
        this.toOpen(b, nowMs);
        return { changed: true, from: "CLOSED", to: "OPEN" };
      }
    }

    return UNCHANGED;
  }

  /** Give back a HALF_OPEN probe slot for an attempt that ended neither way (caller cancelled). */
  release(key: string): void {
    const b = this.bucket(key);
    if (b.state === "HALF_OPEN") b.halfOpenInFlight = Math.max(0, b.halfOpenInFlight - 1);
  }

  state(key: string): BreakerState {
    return this.bucket(key).state;
  }

  snapshot(): BreakerSnapshotEntry[] {
    const out: BreakerSnapshotEntry[] = [];
    for (const [key, b] of this.buckets.entries()) {
      out.push({
        key,
        state: b.state,
        consecutiveFailures: b.consecutiveFailures,
        consecutiveSuccesses: b.consecutiveSuccesses,
        openedAtMs: b.openedAtMs,
      });
    }
    return out;
  }

  private toOpen(b: BreakerBucket, nowMs: number): void {
    b.state = "OPEN";
    b.openedAtMs = nowMs;
    b.consecutiveFailures = 0;
    b.consecutiveSuccesses = 0;
    b.halfOpenInFlight = 0;
  }

  private toHalfOpen(b: BreakerBucket): void {
    b.state = "HALF_OPEN";
    b.openedAtMs = undefined;
    b.consecutiveSuccesses = 0;
    b.halfOpenInFlight = 0;
  }

  private toClosed(b: BreakerBucket): void {
    b.state = "CLOSED";
    b.openedAtMs = undefined;
    b.consecutiveFailures = 0;
    b.consecutiveSuccesses = 0;
    b.halfOpenInFlight = 0;
  }
}

export type BreakerVerdict = "success" | "failure" | "ignore";

/**
 * Upstream health as the breaker sees it: 5xx and transport failures count
 * against the key, caller cancellation counts neither way, everything else
 * (4xx included) is a success.
 */
export function classifyOutcome(response: HttpResponse | undefined, error: unknown): BreakerVerdict {
  if (response) return response.status >= 500 ? "failure" : "success";
  if (isCancellation(error)) return "ignore";
  if (isNetworkError(error) || !(error instanceof HttpChainError)) return "failure";
  return "ignore";
}

export interface BreakerMiddlewareOptions {
  /** Default: the request URL's host. */
  keyFn?: KeyFn;
  onTransition?: (key: string, change: Required<BreakerTransition>) => void;
}

function notify(key: string, change: BreakerTransition, opts: BreakerMiddlewareOptions): void {
  if (change.changed && change.from && change.to) {
    opts.onTransition?.(key, { changed: true, from: change.from, to: change.to });
  }
}

export function circuitBreakerMiddleware(breaker: CircuitBreaker, opts: BreakerMiddlewareOptions = {}): Middleware {
  const keyFn = opts.keyFn ?? hostOf;

  return (next) =>
    transportFunc(async (req) => {
      const key = keyFn(req);
      const before = breaker.state(key);
      const decision = breaker.allow(key);
      if (decision.state !== before) notify(key, { changed: true, from: before, to: decision.state }, opts);
      if (!decision.allowed) throw new CircuitOpenError(key, decision.retryAfterMs ?? 0);

      let res: HttpResponse;
      try {
        res = await next.roundTrip(req);
      } catch (err) {
        const verdict = classifyOutcome(undefined, err);
        if (verdict === "failure") notify(key, breaker.onFailure(key), opts);
        else breaker.release(key);
        throw err;
      }

      const verdict = classifyOutcome(res, undefined);
      notify(key, verdict === "failure" ? breaker.onFailure(key) : breaker.onSuccess(key), opts);
      return res;
    });
}
