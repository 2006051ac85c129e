// src/utils/request.ts
import { BodyReplayError } from "../errors.js";
import type { HttpMethod, HttpRequest, HttpResponse } from "../types.js";

const IDEMPOTENT: ReadonlySet<HttpMethod> = new Set<HttpMethod>(["GET", "HEAD", "PUT", "DELETE", "OPTIONS"]);

export function isIdempotent(method: HttpMethod): boolean {
  return IDEMPOTENT.has(method);
}

export function normalizeHeaders(headers: Record<string, string | string[] | undefined> | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  if (!headers) return out;

  for (const [k, v] of Object.entries(headers)) {
    if (Array.isArray(v)) out[k.toLowerCase()] = v.join(", ");
    else if (typeof v === "string") out[k.toLowerCase()] = v;
  }
  return out;
}

/** Returns a copy of `req` with `extra` merged over its headers. */
export function withHeaders(req: HttpRequest, extra: Record<string, string>): HttpRequest {
  return { ...req, headers: { ...req.headers, ...normalizeHeaders(extra) } };
}

export function withSignal(req: HttpRequest, signal: AbortSignal | undefined): HttpRequest {
  return { ...req, signal };
}

/**
 * Produce the bytes to send for one attempt. Factories run on every call so a
 * retried request never reuses a consumed payload.
 */
export function materializeBody(req: HttpRequest): string | Uint8Array | undefined {
  const body = req.body;
  if (typeof body !== "function") return body;

  try {
    return body();
  } catch (err) {
    throw new BodyReplayError(err);
  }
}

export function cloneResponse(res: HttpResponse): HttpResponse {
  return {
    status: res.status,
    headers: { ...res.headers },
    body: res.body.slice(),
    request: res.request,
  };
}

export function hostOf(req: HttpRequest): string {
  return new URL(req.url).host;
}
