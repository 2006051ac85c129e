// src/config.ts
import { z } from "zod";
import type { HttpClientOptions } from "./client.js";
import { ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";

export const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

/** Environment variables the client understands. All optional. */
export const clientEnvSchema = z.object({
  HTTPCHAIN_BASE_URL: z.string().trim().url({ message: "Invalid base URL" }).optional(),
  HTTPCHAIN_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  HTTPCHAIN_POOL_CONNECTIONS: z.coerce.number().int().positive().optional(),
  HTTPCHAIN_LOG_LEVEL: logLevelSchema.optional(),
});

export type ClientEnvConfig = z.infer<typeof clientEnvSchema>;

/** Shape checks for the plain-data part of HttpClientOptions. */
export const clientOptionsSchema = z.object({
  baseUrl: z.string().url().optional(),
  defaultHeaders: z.record(z.string()).optional(),
  timeoutMs: z.number().int().nonnegative().optional(),
  pool: z
    .object({
      connections: z.number().int().positive().optional(),
      keepAliveTimeoutMs: z.number().int().positive().optional(),
    })
    .optional(),
  cacheTtlMs: z.number().positive().optional(),
  singleflight: z.boolean().optional(),
});

function describe(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function validateClientOptions(opts: HttpClientOptions): void {
  const result = clientOptionsSchema.safeParse(opts);
  if (!result.success) throw new ConfigError(`Invalid client options: ${describe(result.error)}`);
}

/**
 * Client options taken from the environment. Spread the result under your own
 * options: `new HttpClient({ ...loadClientConfig(), retryPolicy })`.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): HttpClientOptions {
  const result = clientEnvSchema.safeParse(env);
  if (!result.success) throw new ConfigError(`Invalid environment: ${describe(result.error)}`);

  const cfg = result.data;
  const opts: HttpClientOptions = {};
  if (cfg.HTTPCHAIN_BASE_URL !== undefined) opts.baseUrl = cfg.HTTPCHAIN_BASE_URL;
  if (cfg.HTTPCHAIN_TIMEOUT_MS !== undefined) opts.timeoutMs = cfg.HTTPCHAIN_TIMEOUT_MS;
  if (cfg.HTTPCHAIN_POOL_CONNECTIONS !== undefined) opts.pool = { connections: cfg.HTTPCHAIN_POOL_CONNECTIONS };
  if (cfg.HTTPCHAIN_LOG_LEVEL !== undefined) opts.logger = createLogger("HttpClient", cfg.HTTPCHAIN_LOG_LEVEL);
  return opts;
}
