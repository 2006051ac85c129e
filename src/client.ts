// src/client.ts
import { EventEmitter } from "node:events";
import type { ZodType } from "zod";
import { CircuitBreaker, circuitBreakerMiddleware } from "./breaker.js";
import { executingBreakerMiddleware, type ExecutingCircuitBreaker } from "./breakerAdapter.js";
import { RequestBuilder, encodeMultipart, jsonBody, type FormFields, type FormFile } from "./builder.js";
import { cacheMiddleware, type Cache } from "./cache.js";
import { validateClientOptions } from "./config.js";
import { ConfigError } from "./errors.js";
import type { BreakerStateEvent, RequestFailureEvent, RequestSuccessEvent } from "./events.js";
import { UndiciTransport } from "./http.js";
import { rateLimitMiddleware, type RateLimiter } from "./limiter.js";
import { createLogger, type Logger } from "./logger.js";
import { chain, timeoutMiddleware } from "./middleware.js";
import { ensureSuccess, json } from "./response.js";
import { retryMiddleware, type RetryPolicy } from "./retry.js";
import { singleflightMiddleware } from "./singleflight.js";
import type { ClientSnapshot } from "./snapshot.js";
import type { HttpMethod, HttpRequest, HttpResponse, KeyFn, Middleware, PoolOptions, RequestBody, Transport } from "./types.js";
import { hostOf, normalizeHeaders } from "./utils/request.js";

/** Runs before the pipeline. Return a request to replace the outgoing one. */
export type BeforeRequestHook = (req: HttpRequest) => HttpRequest | void | Promise<HttpRequest | void>;

/** Runs after the pipeline, once per request, with the response or the error. */
export type AfterResponseHook = (req: HttpRequest, res: HttpResponse | undefined, error: unknown) => void | Promise<void>;

export interface HttpClientOptions {
  /** Relative request paths resolve against this. */
  baseUrl?: string;
  defaultHeaders?: Record<string, string>;
  /** Per-exchange timeout applied at the transport. 0 or unset: none. */
  timeoutMs?: number;
  pool?: PoolOptions;

  /** Replaces the undici transport (tests, custom stacks). */
  transport?: Transport;
  /** Outermost stages, in execution order. */
  middleware?: Middleware[];

  retryPolicy?: RetryPolicy;
  circuitBreaker?: CircuitBreaker;
  executingCircuitBreaker?: ExecutingCircuitBreaker;
  rateLimiter?: RateLimiter;
  cache?: Cache;
  /** TTL for entries written by the cache stage. Default: the cache's own. */
  cacheTtlMs?: number;
  /** Coalesce concurrent identical GETs. */
  singleflight?: boolean;

  beforeRequest?: BeforeRequestHook[];
  afterResponse?: AfterResponseHook[];

  /**
   * Determines which breaker / rate-limit bucket a request belongs to.
   * Default: (req) => new URL(req.url).host
   */
  keyFn?: KeyFn;
  logger?: Logger;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: RequestBody;
  /** Serialized with JSON.stringify; sets content-type. */
  json?: unknown;
  /** URL-encoded; sets content-type. */
  form?: FormFields;
  /** Encoded as multipart/form-data; sets content-type with the boundary. */
  multipart?: { fields?: Record<string, string>; files?: readonly FormFile[] };
  signal?: AbortSignal;
}

export interface JsonOptions<T> extends Omit<RequestOptions, "json" | "body" | "form" | "multipart"> {
  /** Validates the decoded body. */
  schema?: ZodType<T>;
}

const ABSOLUTE_URL = /^[a-z][a-z\d+.-]*:\/\//i;

function genRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 10)}`;
}

/**
 * HTTP client around a composed pipeline. Built-in stages run in this order,
 * outermost first, after any `middleware` given:
 * cache -> singleflight -> circuit breaker -> retry -> rate limiter -> transport.
 */
export class HttpClient extends EventEmitter {
  private readonly pipeline: Transport;
  private readonly defaultHeaders: Record<string, string>;
  private readonly baseUrl?: string;
  private readonly beforeHooks: BeforeRequestHook[];
  private readonly afterHooks: AfterResponseHook[];
  private readonly ownedTransport?: UndiciTransport;
  private readonly logger: Logger;

  constructor(private readonly opts: HttpClientOptions = {}) {
    super();
    validateClientOptions(opts);

    this.logger = opts.logger ?? createLogger("HttpClient");
    this.baseUrl = opts.baseUrl;
    this.defaultHeaders = normalizeHeaders(opts.defaultHeaders);
    this.beforeHooks = [...(opts.beforeRequest ?? [])];
    this.afterHooks = [...(opts.afterResponse ?? [])];

    const keyFn = opts.keyFn ?? hostOf;
    const stages: Middleware[] = [...(opts.middleware ?? [])];

    if (opts.cache) stages.push(cacheMiddleware(opts.cache, { ttlMs: opts.cacheTtlMs }));
    if (opts.singleflight) stages.push(singleflightMiddleware());
    if (opts.circuitBreaker) {
      stages.push(
        circuitBreakerMiddleware(opts.circuitBreaker, {
          keyFn,
          onTransition: (key, change) => this.onBreakerState({ key, from: change.from, to: change.to }),
        })
      );
    }
    if (opts.executingCircuitBreaker) stages.push(executingBreakerMiddleware(opts.executingCircuitBreaker, keyFn));
    if (opts.retryPolicy) stages.push(retryMiddleware(opts.retryPolicy));
    if (opts.rateLimiter) stages.push(rateLimitMiddleware(opts.rateLimiter, keyFn));

    let terminal: Transport;
    if (opts.transport) {
      terminal = opts.transport;
      if (opts.timeoutMs) stages.push(timeoutMiddleware(opts.timeoutMs));
    } else {
      this.ownedTransport = new UndiciTransport({ timeoutMs: opts.timeoutMs, pool: opts.pool });
      terminal = this.ownedTransport;
    }

    this.pipeline = chain(stages, terminal);

    this.logger.debug(
      { baseUrl: opts.baseUrl, timeoutMs: opts.timeoutMs ?? 0, stages: stages.length },
      "HTTP client initialized"
    );
  }

  /** Send a fully built request through hooks and pipeline. */
  async request(input: HttpRequest): Promise<HttpResponse> {
    let req: HttpRequest = { ...input, headers: { ...this.defaultHeaders, ...normalizeHeaders({ ...input.headers }) } };
    for (const hook of this.beforeHooks) {
      const replaced = await hook(req);
      if (replaced) req = replaced;
    }

    const requestId = genRequestId();
    const start = Date.now();
    this.emit("request:start", { requestId, request: req });

    let res: HttpResponse;
    try {
      res = await this.pipeline.roundTrip(req);
    } catch (err) {
      const event: RequestFailureEvent = {
        requestId,
        request: req,
        error: err,
        errorName: err instanceof Error ? err.name : undefined,
        durationMs: Date.now() - start,
      };
      this.emit("request:failure", event);
      for (const hook of this.afterHooks) await hook(req, undefined, err);
      throw err;
    }

    const event: RequestSuccessEvent = { requestId, request: req, status: res.status, durationMs: Date.now() - start };
    this.emit("request:success", event);
    for (const hook of this.afterHooks) await hook(req, res, undefined);
    return res;
  }

  /** Alias of `request` for builder-made requests. */
  do(req: HttpRequest): Promise<HttpResponse> {
    return this.request(req);
  }

  newRequest(method: HttpMethod, path: string): RequestBuilder {
    return new RequestBuilder(method, this.resolveUrl(path));
  }

  async execute(method: HttpMethod, path: string, opts: RequestOptions = {}): Promise<HttpResponse> {
    const builder = this.newRequest(method, path);
    if (opts.headers) builder.headers(opts.headers);
    for (const [name, value] of Object.entries(opts.query ?? {})) builder.query(name, value);
    if (opts.body !== undefined) builder.body(opts.body);
    if (opts.json !== undefined) builder.jsonBody(opts.json);
    if (opts.form !== undefined) builder.formBody(opts.form);
    if (opts.multipart !== undefined) builder.multipartBody(await encodeMultipart(opts.multipart.fields, opts.multipart.files));
    if (opts.signal) builder.signal(opts.signal);
    return this.request(builder.build());
  }

  get(path: string, opts?: RequestOptions): Promise<HttpResponse> {
    return this.execute("GET", path, opts);
  }

  head(path: string, opts?: RequestOptions): Promise<HttpResponse> {
    return this.execute("HEAD", path, opts);
  }

  post(path: string, opts?: RequestOptions): Promise<HttpResponse> {
    return this.execute("POST", path, opts);
  }

  put(path: string, opts?: RequestOptions): Promise<HttpResponse> {
    return this.execute("PUT", path, opts);
  }

  patch(path: string, opts?: RequestOptions): Promise<HttpResponse> {
    return this.execute("PATCH", path, opts);
  }

  delete(path: string, opts?: RequestOptions): Promise<HttpResponse> {
    return this.execute("DELETE", path, opts);
  }

  /**
   * GET and decode. Non-2xx responses reject with HttpStatusError.
   */
  async getJSON<T = unknown>(path: string, opts: JsonOptions<T> = {}): Promise<T | undefined> {
    return this.sendJSON("GET", path, undefined, opts);
  }

  async postJSON<T = unknown>(path: string, body: unknown, opts: JsonOptions<T> = {}): Promise<T | undefined> {
    return this.sendJSON("POST", path, body, opts);
  }

  async putJSON<T = unknown>(path: string, body: unknown, opts: JsonOptions<T> = {}): Promise<T | undefined> {
    return this.sendJSON("PUT", path, body, opts);
  }

  async patchJSON<T = unknown>(path: string, body: unknown, opts: JsonOptions<T> = {}): Promise<T | undefined> {
    return this.sendJSON("PATCH", path, body, opts);
  }

  async deleteJSON<T = unknown>(path: string, opts: JsonOptions<T> = {}): Promise<T | undefined> {
    return this.sendJSON("DELETE", path, undefined, opts);
  }

  snapshot(): ClientSnapshot {
    return {
      breakers: this.opts.circuitBreaker?.snapshot() ?? [],
      rateLimits: this.opts.rateLimiter?.snapshot() ?? [],
    };
  }

  /** Closes the pooled connections of the built-in transport. */
  async close(): Promise<void> {
    await this.ownedTransport?.close();
  }

  private async sendJSON<T>(method: HttpMethod, path: string, body: unknown, opts: JsonOptions<T>): Promise<T | undefined> {
    const { schema, ...rest } = opts;
    const builder = this.newRequest(method, path).accept("application/json");
    if (rest.headers) builder.headers(rest.headers);
    for (const [name, value] of Object.entries(rest.query ?? {})) builder.query(name, value);
    if (body !== undefined) builder.body(jsonBody(body), "application/json");
    if (rest.signal) builder.signal(rest.signal);

    const res = ensureSuccess(await this.request(builder.build()));
    return json(res, schema);
  }

  private resolveUrl(path: string): string {
    if (ABSOLUTE_URL.test(path)) return path;
    if (!this.baseUrl) throw new ConfigError(`Relative URL "${path}" needs a baseUrl`);
    return `${this.baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
  }

  private onBreakerState(event: BreakerStateEvent): void {
    this.logger.warn(event, `circuit ${event.key}: ${event.from} -> ${event.to}`);
    this.emit("breaker:state", event);
  }
}
