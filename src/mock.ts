// src/mock.ts
import { NetworkError, RequestAbortedError } from "./errors.js";
import type { HttpMethod, HttpRequest, HttpResponse, Transport } from "./types.js";
import { materializeBody, normalizeHeaders } from "./utils/request.js";

const encoder = new TextEncoder();

/** What a mock handler returns; the transport attaches the request. */
export interface MockResponse {
  status: number;
  headers?: Record<string, string>;
  body?: Uint8Array;
}

export type MockHandler = (req: HttpRequest) => MockResponse | Promise<MockResponse>;

export function mockResponse(status: number, body?: string | Uint8Array, headers: Record<string, string> = {}): MockResponse {
  return { status, headers, body: typeof body === "string" ? encoder.encode(body) : body };
}

export function mockJsonResponse(status: number, value: unknown, headers: Record<string, string> = {}): MockResponse {
  return mockResponse(status, JSON.stringify(value), { "content-type": "application/json", ...headers });
}

/**
 * In-process Transport for tests. Routes match on method + URL path; query
 * strings are ignored. A handler that throws is reported as a NetworkError,
 * the way a refused connection would be.
 */
export class MockTransport implements Transport {
  /** Every request that reached the transport, in order. */
  readonly requests: HttpRequest[] = [];
  /** Handles requests no route matches. Without one they fail with NetworkError. */
  default?: MockHandler;

  private readonly routes = new Map<string, MockHandler>();

  on(method: HttpMethod, path: string, handler: MockHandler): this {
    this.routes.set(`${method} ${path}`, handler);
    return this;
  }

  onGet(path: string, handler: MockHandler): this {
    return this.on("GET", path, handler);
  }

  onPost(path: string, handler: MockHandler): this {
    return this.on("POST", path, handler);
  }

  onPut(path: string, handler: MockHandler): this {
    return this.on("PUT", path, handler);
  }

  onPatch(path: string, handler: MockHandler): this {
    return this.on("PATCH", path, handler);
  }

  onDelete(path: string, handler: MockHandler): this {
    return this.on("DELETE", path, handler);
  }

  async roundTrip(req: HttpRequest): Promise<HttpResponse> {
    if (req.signal?.aborted) throw new RequestAbortedError(req.signal.reason);
    // Same contract as the network transport: the body is produced per attempt.
    materializeBody(req);
    this.requests.push(req);

    const path = new URL(req.url).pathname;
    const handler = this.routes.get(`${req.method} ${path}`) ?? this.default;
    if (!handler) throw new NetworkError(`mock: no route for ${req.method} ${path}`);

    let res: MockResponse;
    try {
      res = await handler(req);
    } catch (err) {
      if (req.signal?.aborted) throw new RequestAbortedError(req.signal.reason);
      throw new NetworkError(`mock: ${err instanceof Error ? err.message : String(err)}`, err);
    }

    if (req.signal?.aborted) throw new RequestAbortedError(req.signal.reason);
    return {
      status: res.status,
      headers: normalizeHeaders(res.headers),
      body: res.body ?? new Uint8Array(),
      request: req,
    };
  }

  /** Requests recorded, optionally narrowed to one method and path. */
  callCount(method?: HttpMethod, path?: string): number {
    return this.requests.filter(
      (r) => (method === undefined || r.method === method) && (path === undefined || new URL(r.url).pathname === path)
    ).length;
  }

  reset(): void {
    this.requests.length = 0;
  }
}
