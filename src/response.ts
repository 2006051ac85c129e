// src/response.ts
import type { ZodType } from "zod";
import { HttpStatusError } from "./errors.js";
import type { HttpResponse } from "./types.js";

const decoder = new TextDecoder();

export function isSuccess(res: HttpResponse): boolean {
  return res.status >= 200 && res.status < 300;
}

export function isClientError(res: HttpResponse): boolean {
  return res.status >= 400 && res.status < 500;
}

export function isServerError(res: HttpResponse): boolean {
  return res.status >= 500 && res.status < 600;
}

/** Returns `res` unchanged if 2xx, otherwise throws HttpStatusError. */
export function ensureSuccess(res: HttpResponse): HttpResponse {
  if (!isSuccess(res)) throw new HttpStatusError(res);
  return res;
}

export function text(res: HttpResponse): string {
  return decoder.decode(res.body);
}

/**
 * Parses the body as JSON, validating it against `schema` when given.
 * An empty body yields `undefined`.
 */
export function json<T = unknown>(res: HttpResponse, schema?: ZodType<T>): T | undefined {
  if (res.body.length === 0) return undefined;
  const value: unknown = JSON.parse(text(res));
  return schema ? schema.parse(value) : (value as T);
}

export function header(res: HttpResponse, name: string): string | undefined {
  return res.headers[name.toLowerCase()];
}
