// test/retry.test.ts
import { describe, expect, it } from "vitest";
import { constantBackoff } from "../src/backoff.js";
import { BodyReplayError, NetworkError, RequestAbortedError } from "../src/errors.js";
import { MockTransport, mockResponse } from "../src/mock.js";
import {
  defaultRetryPolicy,
  executeWithRetry,
  retryMiddleware,
  retryOnNetworkError,
  retryOnStatus429,
  retryOnStatus5xx,
  retryOnStatuses,
  type RetryPolicy,
} from "../src/retry.js";
import type { HttpMethod, HttpRequest } from "../src/types.js";

function req(method: HttpMethod = "GET", extra: Partial<HttpRequest> = {}): HttpRequest {
  return { method, url: "http://api.test/resource", headers: {}, ...extra };
}

function policy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { maxAttempts: 3, backoff: constantBackoff(0), conditions: [retryOnStatus5xx], ...overrides };
}

/** Answers `statuses` in order, then repeats the last one. */
function scripted(...statuses: number[]): MockTransport {
  let n = 0;
  const mt = new MockTransport();
  mt.default = () => mockResponse(statuses[Math.min(n++, statuses.length - 1)]);
  return mt;
}

describe("executeWithRetry", () => {
  it("retries 5xx until success", async () => {
    const mt = scripted(503, 503, 503, 200);
    const res = await executeWithRetry(mt, req(), policy({ maxAttempts: 4 }));
    expect(res.status).toBe(200);
    expect(mt.callCount()).toBe(4);
  });

  it("returns the last response unmodified once attempts are exhausted", async () => {
    const mt = scripted(500, 502, 503);
    const res = await executeWithRetry(mt, req(), policy());
    expect(res.status).toBe(503);
    expect(mt.callCount()).toBe(3);
  });

  it("makes exactly one attempt when no condition matches", async () => {
    const mt = scripted(404);
    const res = await executeWithRetry(mt, req(), policy());
    expect(res.status).toBe(404);
    expect(mt.callCount()).toBe(1);
  });

  it("retries 429 and listed statuses", async () => {
    const on429 = scripted(429, 200);
    expect((await executeWithRetry(on429, req(), policy({ conditions: [retryOnStatus429] }))).status).toBe(200);
    expect(on429.callCount()).toBe(2);

    const on503 = scripted(503, 200);
    expect((await executeWithRetry(on503, req(), policy({ conditions: [retryOnStatuses(503)] }))).status).toBe(200);
    expect(on503.callCount()).toBe(2);

    const on500 = scripted(500, 200);
    expect((await executeWithRetry(on500, req(), policy({ conditions: [retryOnStatuses(503)] }))).status).toBe(500);
    expect(on500.callCount()).toBe(1);
  });

  it("retries network errors and rethrows the last one when exhausted", async () => {
    const mt = new MockTransport();
    mt.default = () => {
      throw new Error("connect ECONNREFUSED");
    };

    await expect(executeWithRetry(mt, req(), policy({ conditions: [retryOnNetworkError] }))).rejects.toBeInstanceOf(NetworkError);
    expect(mt.callCount()).toBe(3);
  });

  it("recovers from a network error", async () => {
    let n = 0;
    const mt = new MockTransport();
    mt.default = () => {
      if (n++ === 0) throw new Error("socket hang up");
      return mockResponse(200);
    };

    const res = await executeWithRetry(mt, req(), policy({ conditions: [retryOnNetworkError] }));
    expect(res.status).toBe(200);
    expect(mt.callCount()).toBe(2);
  });

  it("never retries POST when retryOnlyIdempotent is set", async () => {
    const mt = scripted(500);
    const p = policy({ retryOnlyIdempotent: true, conditions: [() => true] });

    await executeWithRetry(mt, req("POST"), p);
    expect(mt.callCount()).toBe(1);

    mt.reset();
    await executeWithRetry(mt, req("GET"), p);
    expect(mt.callCount()).toBe(3);
  });

  it("reports each retry to onRetry before sleeping", async () => {
    const seen: Array<[number, number | undefined]> = [];
    const mt = scripted(500, 500, 200);

    await executeWithRetry(
      mt,
      req(),
      policy({ onRetry: (attempt, _req, response) => seen.push([attempt, response?.status]) })
    );

    expect(seen).toEqual([
      [0, 500],
      [1, 500],
    ]);
  });

  it("waits the sum of backoff(0..N-2) across N attempts", async () => {
    const mt = scripted(500);
    const start = Date.now();
    await executeWithRetry(mt, req(), policy({ maxAttempts: 4, backoff: constantBackoff(20), conditions: [() => true] }));
    const elapsed = Date.now() - start;

    expect(mt.callCount()).toBe(4);
    expect(elapsed).toBeGreaterThanOrEqual(55);
  });

  it("stops sleeping as soon as the caller aborts", async () => {
    const mt = scripted(500);
    const ac = new AbortController();
    setTimeout(() => ac.abort(), 20);

    const start = Date.now();
    await expect(
      executeWithRetry(mt, req("GET", { signal: ac.signal }), policy({ backoff: constantBackoff(1_000) }))
    ).rejects.toBeInstanceOf(RequestAbortedError);
    expect(Date.now() - start).toBeLessThan(500);
    expect(mt.callCount()).toBe(1);
  });

  it("re-materializes a body factory on every attempt", async () => {
    let built = 0;
    const mt = scripted(500);
    const body = () => {
      built += 1;
      return `{"attempt":${built}}`;
    };

    await executeWithRetry(mt, req("PUT", { body }), policy());
    expect(built).toBe(3);
  });

  it("treats a body that cannot be rebuilt as fatal", async () => {
    let built = 0;
    const mt = scripted(200);
    const body = () => {
      built += 1;
      throw new Error("stream already consumed");
    };

    await expect(executeWithRetry(mt, req("PUT", { body }), policy({ conditions: [() => true] }))).rejects.toBeInstanceOf(
      BodyReplayError
    );
    expect(built).toBe(1);
  });
});

describe("retryMiddleware", () => {
  it("rejects a policy without attempts", () => {
    expect(() => retryMiddleware(policy({ maxAttempts: 0 }))).toThrow(RangeError);
  });

  it("default policy retries network errors, 5xx and 429", () => {
    const p = defaultRetryPolicy();
    expect(p.maxAttempts).toBe(3);
    expect(p.conditions).toEqual([retryOnNetworkError, retryOnStatus5xx, retryOnStatus429]);
  });
});
