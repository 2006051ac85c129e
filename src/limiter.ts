// src/limiter.ts
import { ConfigError, RateLimitCancelledError } from "./errors.js";
import { transportFunc } from "./middleware.js";
import type { KeyFn, Middleware } from "./types.js";
import { hostOf } from "./utils/request.js";

function assertBucketConfig(cfg: { rps: number; burst: number }): void {
  if (!(cfg.rps > 0)) throw new ConfigError(`rps must be > 0 (got ${cfg.rps})`);
  if (!Number.isFinite(cfg.burst) || cfg.burst < 0) throw new ConfigError(`burst must be >= 0 (got ${cfg.burst})`);
}

export interface TokenBucketOptions {
  rps: number; // refill rate, tokens per second
  burst: number; // capacity; 0 is treated as 1
  now?: () => number;
}

/**
 * Continuously refilling token bucket.
 *
 * - Up to `burst` tokens are available at once; each admitted call takes one.
 * - A caller that finds the bucket empty reserves the next token and sleeps
 *   until it is due, so waiters are admitted in arrival order.
 * - If the caller's signal fires while waiting, its reservation is handed back
 *   and it is rejected (RateLimitCancelledError). Nothing is consumed.
 *
 * A burst of 0 would never admit anything, so the capacity is at least one
 * token: the first call goes through, the next waits a full interval.
 */
export class TokenBucket {
  readonly rps: number;
  readonly capacity: number;

  private tokens: number;
  private lastRefillMs: number;
  private readonly now: () => number;

  constructor(opts: TokenBucketOptions, private readonly name = "global") {
    assertBucketConfig(opts);

    this.rps = opts.rps;
    this.capacity = Math.max(1, Math.floor(opts.burst));
    this.now = opts.now ?? Date.now;
    this.tokens = this.capacity;
    this.lastRefillMs = this.now();
  }

  private refill(nowMs: number): void {
    const elapsed = Math.max(0, nowMs - this.lastRefillMs);
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed / 1000) * this.rps);
    this.lastRefillMs = nowMs;
  }

  /** Take a token only if one is available right now. */
  tryTake(): boolean {
    if (this.rps === Infinity) return true;
    this.refill(this.now());
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  /** Resolves once a token has been taken for the caller. */
  wait(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(new RateLimitCancelledError(this.name, signal.reason));
    if (this.rps === Infinity) return Promise.resolve();

    this.refill(this.now());
    this.tokens -= 1; // reserve

    if (this.tokens >= 0) return Promise.resolve();

    const waitMs = Math.ceil((-this.tokens / this.rps) * 1000);

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        // Hand the reservation back.
        this.refill(this.now());
        this.tokens = Math.min(this.capacity, this.tokens + 1);
        reject(new RateLimitCancelledError(this.name, signal?.reason));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, waitMs);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /** Tokens available now; negative while callers hold reservations. */
  available(): number {
    if (this.rps === Infinity) return this.capacity;
    this.refill(this.now());
    return this.tokens;
  }
}

export interface RateLimiter {
  wait(key: string, signal?: AbortSignal): Promise<void>;
  snapshot(): Array<{ key: string; tokens: number }>;
}

/** One bucket shared by every request. */
export class GlobalRateLimiter implements RateLimiter {
  private readonly bucket: TokenBucket;

  constructor(rps: number, burst: number, opts: { now?: () => number } = {}) {
    this.bucket = new TokenBucket({ rps, burst, now: opts.now });
  }

  wait(_key: string, signal?: AbortSignal): Promise<void> {
    return this.bucket.wait(signal);
  }

  snapshot(): Array<{ key: string; tokens: number }> {
    return [{ key: "*", tokens: this.bucket.available() }];
  }
}

export interface BucketConfig {
  rps: number;
  burst: number;
}

/**
 * One bucket per host. Hosts listed in `overrides` (exact match on host:port)
 * get their own settings; everything else gets a bucket with the defaults.
 */
export class PerHostRateLimiter implements RateLimiter {
  private readonly buckets = new Map<string, TokenBucket>();
  private readonly defaults: BucketConfig;
  private readonly overrides: ReadonlyMap<string, BucketConfig>;
  private readonly now?: () => number;

  constructor(defaultRps: number, defaultBurst: number, overrides: Record<string, BucketConfig> = {}, opts: { now?: () => number } = {}) {
    this.defaults = { rps: defaultRps, burst: defaultBurst };
    this.overrides = new Map(Object.entries(overrides));
    this.now = opts.now;

    assertBucketConfig(this.defaults);
    for (const [host, cfg] of this.overrides) this.buckets.set(host, new TokenBucket({ ...cfg, now: this.now }, host));
  }

  private bucket(key: string): TokenBucket {
    let b = this.buckets.get(key);
    if (!b) {
      b = new TokenBucket({ ...(this.overrides.get(key) ?? this.defaults), now: this.now }, key);
      this.buckets.set(key, b);
    }
    return b;
  }

  wait(key: string, signal?: AbortSignal): Promise<void> {
    return this.bucket(key).wait(signal);
  }

  snapshot(): Array<{ key: string; tokens: number }> {
    return [...this.buckets.entries()].map(([key, b]) => ({ key, tokens: b.available() }));
  }
}

/** Every request waits for a token before going further. Default key: URL host. */
export function rateLimitMiddleware(limiter: RateLimiter, keyFn: KeyFn = hostOf): Middleware {
  return (next) =>
    transportFunc(async (req) => {
      await limiter.wait(keyFn(req), req.signal);
      return next.roundTrip(req);
    });
}
