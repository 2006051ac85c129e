// src/cache.ts
import { ConfigError } from "./errors.js";
import { transportFunc } from "./middleware.js";
import type { HttpResponse, KeyFn, Middleware } from "./types.js";
import { cloneResponse } from "./utils/request.js";

export interface CacheEntry {
  response: HttpResponse;
  expiresAtMs: number;
}

/**
 * Response store. Implementations own their copies: `set` must not keep the
 * caller's object and `get` must not hand out the stored one.
 */
export interface Cache {
  get(key: string): CacheEntry | undefined;
  /** `ttlMs` omitted => the cache's own default. */
  set(key: string, response: HttpResponse, ttlMs?: number): void;
  delete(key: string): void;
}

const DEFAULT_TTL_MS = 60_000;

/**
 * In-process TTL cache. Expiry is checked on read; `prune()` and the opt-in
 * auto-prune timer only reclaim memory.
 */
export class MemoryCache implements Cache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly now: () => number;
  private pruneTimer?: ReturnType<typeof setInterval>;

  constructor(private readonly defaultTtlMs = DEFAULT_TTL_MS, opts: { now?: () => number } = {}) {
    if (!Number.isFinite(defaultTtlMs) || defaultTtlMs <= 0) throw new ConfigError(`ttl must be > 0 (got ${defaultTtlMs})`);
    this.now = opts.now ?? Date.now;
  }

  get(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return { response: cloneResponse(entry.response), expiresAtMs: entry.expiresAtMs };
  }

  set(key: string, response: HttpResponse, ttlMs: number = this.defaultTtlMs): void {
    this.entries.set(key, { response: cloneResponse(response), expiresAtMs: this.now() + ttlMs });
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }

  prune(): void {
    const now = this.now();
    for (const [key, entry] of this.entries.entries()) {
      if (entry.expiresAtMs <= now) this.entries.delete(key);
    }
  }

  startAutoPrune(intervalMs: number = this.defaultTtlMs): void {
    if (this.pruneTimer) return;
    this.pruneTimer = setInterval(() => this.prune(), intervalMs);
    this.pruneTimer.unref();
  }

  stopAutoPrune(): void {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = undefined;
    }
  }

  clear(): void {
    this.stopAutoPrune();
    this.entries.clear();
  }
}

/** Stores nothing; every read misses. */
export class NoopCache implements Cache {
  get(_key: string): CacheEntry | undefined {
    return undefined;
  }

  set(_key: string, _response: HttpResponse, _ttlMs?: number): void {}

  delete(_key: string): void {}
}

/**
 * Fast short-lived L1 in front of a slower long-lived L2.
 * An L2 hit back-fills L1 under L1's own TTL; writes and deletes reach both.
 * A TTL given to `set` applies to L2 only: L1 always keeps its own.
 */
export class TieredCache implements Cache {
  constructor(
    readonly l1: Cache,
    readonly l2: Cache
  ) {}

  get(key: string): CacheEntry | undefined {
    const hit = this.l1.get(key);
    if (hit) return hit;

    const fromL2 = this.l2.get(key);
    if (!fromL2) return undefined;

    this.l1.set(key, fromL2.response);
    return fromL2;
  }

  set(key: string, response: HttpResponse, ttlMs?: number): void {
    this.l1.set(key, response);
    this.l2.set(key, response, ttlMs);
  }

  delete(key: string): void {
    this.l1.delete(key);
    this.l2.delete(key);
  }
}

export interface CacheMiddlewareOptions {
  /** Overrides the cache's own TTL for entries written by this stage. */
  ttlMs?: number;
  /** Default: the full resolved URL. */
  keyFn?: KeyFn;
}

export const urlCacheKey: KeyFn = (req) => req.url;

/**
 * GET-only response cache. Hits short-circuit the rest of the pipeline;
 * misses go downstream and 2xx responses are stored.
 */
export function cacheMiddleware(cache: Cache, opts: CacheMiddlewareOptions = {}): Middleware {
  const keyFn = opts.keyFn ?? urlCacheKey;

  return (next) =>
    transportFunc(async (req) => {
      if (req.method !== "GET") return next.roundTrip(req);

      const key = keyFn(req);
      const hit = cache.get(key);
      if (hit) return { ...hit.response, request: req };

      const res = await next.roundTrip(req);
      if (res.status >= 200 && res.status < 300) cache.set(key, res, opts.ttlMs);
      return res;
    });
}
