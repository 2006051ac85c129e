// src/http.ts
import { Agent, request as undiciRequest } from "undici";
import { BodyReplayError, NetworkError, RequestAbortedError, RequestTimeoutError } from "./errors.js";
import type { HttpRequest, HttpResponse, PoolOptions, Transport } from "./types.js";
import { linkedController } from "./utils/abort.js";
import { materializeBody, normalizeHeaders } from "./utils/request.js";

export interface UndiciTransportOptions {
  /** Per-exchange timeout. 0 disables it. */
  timeoutMs?: number;
  pool?: PoolOptions;
}

/**
 * Network leaf of the default pipeline: one request in, one fully buffered
 * response out, over a pooled undici Agent.
 */
export class UndiciTransport implements Transport {
  private readonly agent: Agent;
  private readonly timeoutMs: number;

  constructor(opts: UndiciTransportOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 0;
    this.agent = new Agent({
      connections: opts.pool?.connections ?? null,
      keepAliveTimeout: opts.pool?.keepAliveTimeoutMs ?? 4_000,
    });
  }

  async roundTrip(req: HttpRequest): Promise<HttpResponse> {
    const { controller, dispose } = linkedController(req.signal);
    let timedOut = false;
    const timer =
      this.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, this.timeoutMs)
        : undefined;

    try {
      const body = materializeBody(req);
      const res = await undiciRequest(req.url, {
        method: req.method,
        headers: { ...req.headers },
        body,
        signal: controller.signal,
        dispatcher: this.agent,
      });

      const buf = await res.body.arrayBuffer();
      return {
        status: res.statusCode,
        headers: normalizeHeaders(res.headers),
        body: new Uint8Array(buf),
        request: req,
      };
    } catch (err) {
      if (timedOut) throw new RequestTimeoutError(this.timeoutMs);
      if (req.signal?.aborted) throw new RequestAbortedError(req.signal.reason);
      if (err instanceof BodyReplayError) throw err;
      throw new NetworkError(`${req.method} ${req.url}: ${err instanceof Error ? err.message : String(err)}`, err);
    } finally {
      if (timer) clearTimeout(timer);
      dispose();
    }
  }

  close(): Promise<void> {
    return this.agent.close();
  }
}
