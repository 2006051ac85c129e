// src/singleflight.ts
import { RequestAbortedError } from "./errors.js";
import { transportFunc } from "./middleware.js";
import type { HttpResponse, KeyFn, Middleware } from "./types.js";
import { cloneResponse, withSignal } from "./utils/request.js";

interface Call<T> {
  promise: Promise<T>;
  waiters: number;
  controller: AbortController;
}

export interface DoOptions<T> {
  /** This caller's cancellation. Only detaches this caller. */
  signal?: AbortSignal;
  /** Per-caller copy of the shared value. */
  clone?: (value: T) => T;
}

/**
 * Collapses concurrent calls sharing a key into one execution.
 *
 * - The first caller for a key starts `fn`; callers arriving while it runs join it.
 * - `fn` gets its own signal, aborted only once every joined caller has cancelled.
 * - The group is forgotten as soon as `fn` settles: later callers start afresh.
 */
export class SingleFlight<T> {
  private readonly calls = new Map<string, Call<T>>();

  do(key: string, fn: (signal: AbortSignal) => Promise<T>, opts: DoOptions<T> = {}): Promise<T> {
    const { signal, clone } = opts;
    if (signal?.aborted) return Promise.reject(new RequestAbortedError(signal.reason));

    let call = this.calls.get(key);
    // Everyone on the previous execution cancelled: don't join a doomed call.
    if (!call || call.controller.signal.aborted) {
      const controller = new AbortController();
      const promise = Promise.resolve()
        .then(() => fn(controller.signal))
        .finally(() => {
          if (this.calls.get(key) === created) this.calls.delete(key);
        });
      const created: Call<T> = { promise, waiters: 0, controller };
      this.calls.set(key, created);
      call = created;
    }

    return this.join(call, signal, clone);
  }

  /** Number of keys with an execution in flight. */
  get inFlight(): number {
    return this.calls.size;
  }

  private join(call: Call<T>, signal: AbortSignal | undefined, clone: ((value: T) => T) | undefined): Promise<T> {
    call.waiters += 1;

    return new Promise<T>((resolve, reject) => {
      let settled = false;

      const leave = () => {
        if (settled) return;
        settled = true;
        call.waiters -= 1;
        signal?.removeEventListener("abort", onAbort);
      };

      const onAbort = () => {
        if (settled) return;
        leave();
        if (call.waiters === 0) call.controller.abort(signal?.reason);
        reject(new RequestAbortedError(signal?.reason));
      };

      signal?.addEventListener("abort", onAbort, { once: true });

      call.promise.then(
        (value) => {
          if (settled) return;
          leave();
          resolve(clone ? clone(value) : value);
        },
        (err: unknown) => {
          if (settled) return;
          leave();
          reject(err);
        }
      );
    });
  }
}

export interface SingleflightMiddlewareOptions {
  /** Default: `GET <url>`. */
  keyFn?: KeyFn;
}

/**
 * Deduplicates concurrent GETs. Every other method always executes on its own:
 * coalescing a POST would swallow its side effects.
 */
export function singleflightMiddleware(opts: SingleflightMiddlewareOptions = {}): Middleware {
  const keyFn = opts.keyFn ?? ((req) => `${req.method} ${req.url}`);
  const group = new SingleFlight<HttpResponse>();

  return (next) =>
    transportFunc(async (req) => {
      if (req.method !== "GET") return next.roundTrip(req);

      const res = await group.do(keyFn(req), (signal) => next.roundTrip(withSignal(req, signal)), {
        signal: req.signal,
        clone: cloneResponse,
      });
      return { ...res, request: req };
    });
}
