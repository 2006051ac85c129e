export { HttpClient } from "./client.js";
export type { AfterResponseHook, BeforeRequestHook, HttpClientOptions, JsonOptions, RequestOptions } from "./client.js";
export { RequestBuilder, encodeMultipart, formBody, jsonBody } from "./builder.js";
export type { FormFields, FormFile, MultipartBody } from "./builder.js";
export { UndiciTransport } from "./http.js";
export type { UndiciTransportOptions } from "./http.js";
export {
  chain,
  correlationIdInjector,
  headerInjector,
  loggingMiddleware,
  timeoutMiddleware,
  transportFunc,
} from "./middleware.js";

export { constantBackoff, exponentialBackoff, fullJitterBackoff, linearBackoff } from "./backoff.js";
export type { BackoffStrategy, RandomFn } from "./backoff.js";
export {
  defaultRetryPolicy,
  executeWithRetry,
  retryMiddleware,
  retryOnErrors,
  retryOnNetworkError,
  retryOnStatus429,
  retryOnStatus5xx,
  retryOnStatuses,
} from "./retry.js";
export type { OnRetry, RetryCondition, RetryPolicy } from "./retry.js";

export { CircuitBreaker, DEFAULT_BREAKER_OPTIONS, circuitBreakerMiddleware, classifyOutcome } from "./breaker.js";
export type { BreakerDecision, BreakerSnapshotEntry, BreakerTransition, BreakerVerdict } from "./breaker.js";
export { StateMachineExecutor, executingBreakerMiddleware } from "./breakerAdapter.js";
export type { Classifier, ExecutingBreakerOptions, ExecutingCircuitBreaker } from "./breakerAdapter.js";

export { GlobalRateLimiter, PerHostRateLimiter, TokenBucket, rateLimitMiddleware } from "./limiter.js";
export type { BucketConfig, RateLimiter, TokenBucketOptions } from "./limiter.js";

export { MemoryCache, NoopCache, TieredCache, cacheMiddleware, urlCacheKey } from "./cache.js";
export type { Cache, CacheEntry, CacheMiddlewareOptions } from "./cache.js";

export { SingleFlight, singleflightMiddleware } from "./singleflight.js";
export type { DoOptions, SingleflightMiddlewareOptions } from "./singleflight.js";

export { MockTransport, mockJsonResponse, mockResponse } from "./mock.js";
export type { MockHandler, MockResponse } from "./mock.js";

export { ensureSuccess, header, isClientError, isServerError, isSuccess, json, text } from "./response.js";

export {
  BodyReplayError,
  CircuitOpenError,
  ConfigError,
  HttpChainError,
  HttpStatusError,
  NetworkError,
  RateLimitCancelledError,
  RequestAbortedError,
  RequestTimeoutError,
  isCancellation,
  isCircuitOpen,
  isNetworkError,
  isTimeout,
} from "./errors.js";
export type { HttpChainErrorCode } from "./errors.js";

export { clientEnvSchema, clientOptionsSchema, loadClientConfig, validateClientOptions } from "./config.js";
export type { ClientEnvConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export type * from "./events.js";
export type * from "./snapshot.js";
export type * from "./types.js";
