// src/builder.ts
import { FormData, Response } from "undici";
import type { HttpMethod, HttpRequest, RequestBody } from "./types.js";

const encoder = new TextEncoder();

export type FormFields = Record<string, string | readonly string[]> | URLSearchParams;

/** Serializes `value` once; the bytes are re-sent as-is on every attempt. */
export function jsonBody(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

export function formBody(fields: FormFields): string {
  if (fields instanceof URLSearchParams) return fields.toString();

  const params = new URLSearchParams();
  for (const [name, value] of Object.entries(fields)) {
    if (typeof value === "string") params.append(name, value);
    else for (const v of value) params.append(name, v);
  }
  return params.toString();
}

export interface FormFile {
  fieldName: string;
  fileName: string;
  content: string | Uint8Array;
  /** Default: application/octet-stream. */
  contentType?: string;
}

export interface MultipartBody {
  body: Uint8Array;
  /** multipart/form-data with the boundary the body was encoded with. */
  contentType: string;
}

/**
 * Encodes fields and files as multipart/form-data. The result is a byte
 * snapshot, so retries re-send it unchanged.
 */
export async function encodeMultipart(
  fields: Record<string, string> = {},
  files: readonly FormFile[] = []
): Promise<MultipartBody> {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) form.append(name, value);
  for (const file of files) {
    const blob = new Blob([file.content], { type: file.contentType ?? "application/octet-stream" });
    form.append(file.fieldName, blob, file.fileName);
  }

  const encoded = new Response(form);
  const contentType = encoded.headers.get("content-type");
  if (!contentType) throw new Error("multipart encoding produced no content type");
  return { body: new Uint8Array(await encoded.arrayBuffer()), contentType };
}

/**
 * Fluent per-request builder. Nothing is sent until the built request is
 * handed to `HttpClient.do`.
 *
 * @example
 * const req = client.newRequest("GET", "/users")
 *   .query("page", "1")
 *   .accept("application/json")
 *   .bearerToken("test-token")
 *   .build();
 */
export class RequestBuilder {
  private readonly headerMap: Record<string, string> = {};
  private readonly params: Array<[string, string]> = [];
  private payload?: RequestBody;
  private abortSignal?: AbortSignal;

  constructor(
    private readonly method: HttpMethod,
    private readonly url: string
  ) {}

  header(name: string, value: string): this {
    this.headerMap[name.toLowerCase()] = value;
    return this;
  }

  headers(values: Record<string, string>): this {
    for (const [name, value] of Object.entries(values)) this.header(name, value);
    return this;
  }

  /** Appends; repeated names produce repeated parameters. */
  query(name: string, value: string): this {
    this.params.push([name, value]);
    return this;
  }

  accept(mediaType: string): this {
    return this.header("accept", mediaType);
  }

  contentType(mediaType: string): this {
    return this.header("content-type", mediaType);
  }

  basicAuth(username: string, password: string): this {
    return this.header("authorization", `Basic ${Buffer.from(`${username}:${password}`).toString("base64")}`);
  }

  bearerToken(token: string): this {
    return this.header("authorization", `Bearer ${token}`);
  }

  body(body: RequestBody, contentType?: string): this {
    this.payload = body;
    if (contentType) this.contentType(contentType);
    return this;
  }

  jsonBody(value: unknown): this {
    return this.body(jsonBody(value), "application/json");
  }

  formBody(fields: FormFields): this {
    return this.body(formBody(fields), "application/x-www-form-urlencoded");
  }

  /** Takes the output of `encodeMultipart`. */
  multipartBody(multipart: MultipartBody): this {
    return this.body(multipart.body, multipart.contentType);
  }

  signal(signal: AbortSignal): this {
    this.abortSignal = signal;
    return this;
  }

  /** Throws TypeError if the URL is not absolute. */
  build(): HttpRequest {
    const url = new URL(this.url);
    for (const [name, value] of this.params) url.searchParams.append(name, value);

    return {
      method: this.method,
      url: url.toString(),
      headers: { ...this.headerMap },
      body: this.payload,
      signal: this.abortSignal,
    };
  }
}
