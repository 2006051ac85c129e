// src/middleware.ts
import { RequestTimeoutError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { HttpRequest, HttpResponse, Middleware, Transport } from "./types.js";
import { linkedController } from "./utils/abort.js";
import { withHeaders, withSignal } from "./utils/request.js";

export function transportFunc(fn: (req: HttpRequest) => Promise<HttpResponse>): Transport {
  return { roundTrip: fn };
}

/**
 * Compose `middlewares` around `terminal`. The first middleware is outermost:
 * it sees the request first and the response last.
 */
export function chain(middlewares: readonly Middleware[], terminal: Transport): Transport {
  return middlewares.reduceRight<Transport>((next, mw) => mw(next), terminal);
}

/** Sets static headers on every request, replacing same-named ones. */
export function headerInjector(headers: Record<string, string>): Middleware {
  return (next) => transportFunc((req) => next.roundTrip(withHeaders(req, headers)));
}

/** Adds a fresh id under `header` unless the request already carries one. */
export function correlationIdInjector(header: string, generate: () => string): Middleware {
  const name = header.toLowerCase();
  return (next) =>
    transportFunc((req) => {
      if (req.headers[name]) return next.roundTrip(req);
      return next.roundTrip(withHeaders(req, { [name]: generate() }));
    });
}

/**
 * Bounds everything downstream to `ms`. On expiry the inner request's signal is
 * aborted and the caller gets RequestTimeoutError.
 */
export function timeoutMiddleware(ms: number): Middleware {
  if (!Number.isFinite(ms) || ms <= 0) throw new RangeError(`timeout must be > 0 (got ${ms})`);

  return (next) =>
    transportFunc(async (req) => {
      const { controller, dispose } = linkedController(req.signal);
      let timer: NodeJS.Timeout | undefined;
      const expired = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          const err = new RequestTimeoutError(ms);
          controller.abort(err);
          reject(err);
        }, ms);
      });

      try {
        return await Promise.race([next.roundTrip(withSignal(req, controller.signal)), expired]);
      } finally {
        clearTimeout(timer);
        dispose();
      }
    });
}

/** One structured line per exchange. */
export function loggingMiddleware(logger: Logger): Middleware {
  return (next) =>
    transportFunc(async (req) => {
      const start = Date.now();
      try {
        const res = await next.roundTrip(req);
        logger.debug({ method: req.method, url: req.url, status: res.status, durationMs: Date.now() - start }, "http exchange");
        return res;
      } catch (err) {
        logger.warn({ method: req.method, url: req.url, err, durationMs: Date.now() - start }, "http exchange failed");
        throw err;
      }
    });
}
