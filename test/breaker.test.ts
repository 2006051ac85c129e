// test/breaker.test.ts
import { describe, expect, it } from "vitest";
import { CircuitBreaker, circuitBreakerMiddleware, classifyOutcome } from "../src/breaker.js";
import { StateMachineExecutor, type Classifier } from "../src/breakerAdapter.js";
import { CircuitOpenError, ConfigError, NetworkError, RequestAbortedError } from "../src/errors.js";
import { MockTransport, mockResponse } from "../src/mock.js";
import type { HttpRequest, HttpResponse } from "../src/types.js";

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

const get: HttpRequest = { method: "GET", url: "http://api.test/health", headers: {} };

function response(status: number): HttpResponse {
  return { status, headers: {}, body: new Uint8Array(), request: get };
}

describe("CircuitBreaker", () => {
  it("opens after failureThreshold consecutive failures", () => {
    const br = new CircuitBreaker({ failureThreshold: 3, successThreshold: 1, openTimeoutMs: 1000 });
    const key = "api.example.com";

    for (let i = 0; i < 2; i++) {
      expect(br.allow(key).allowed).toBe(true);
      br.onFailure(key);
    }
    expect(br.state(key)).toBe("CLOSED");

    br.allow(key);
    const change = br.onFailure(key);
    expect(change).toEqual({ changed: true, from: "CLOSED", to: "OPEN" });

    const blocked = br.allow(key);
    expect(blocked.allowed).toBe(false);
    expect(blocked.state).toBe("OPEN");
  });

  it("a success resets the failure streak", () => {
    const br = new CircuitBreaker({ failureThreshold: 3, successThreshold: 1, openTimeoutMs: 1000 });
    const key = "svc";

    br.onFailure(key);
    br.onFailure(key);
    br.onSuccess(key);
    br.onFailure(key);
    br.onFailure(key);

    expect(br.state(key)).toBe("CLOSED");
  });

  it("fails fast while OPEN until the timeout, then HALF_OPEN", () => {
    const br = new CircuitBreaker({ failureThreshold: 1, successThreshold: 1, openTimeoutMs: 100 });
    const key = "svc";
    const t0 = 1000;

    br.allow(key, t0);
    br.onFailure(key, t0);
    expect(br.state(key)).toBe("OPEN");

    const d1 = br.allow(key, t0 + 50);
    expect(d1).toEqual({ allowed: false, state: "OPEN", retryAfterMs: 50 });

    const d2 = br.allow(key, t0 + 100);
    expect(d2.allowed).toBe(true);
    expect(br.state(key)).toBe("HALF_OPEN");
  });

  it("half-open allows limited probes and closes after enough successes", () => {
    const br = new CircuitBreaker({ failureThreshold: 1, successThreshold: 2, openTimeoutMs: 50 });
    const key = "svc";
    const t0 = 1000;

    br.allow(key, t0);
    br.onFailure(key, t0);

    // This call both transitions to HALF_OPEN and consumes probe #1
    expect(br.allow(key, t0 + 60).allowed).toBe(true);
    expect(br.state(key)).toBe("HALF_OPEN");
    expect(br.allow(key, t0 + 61).allowed).toBe(true);

    const blocked = br.allow(key, t0 + 62);
    expect(blocked).toEqual({ allowed: false, state: "HALF_OPEN", retryAfterMs: 0 });

    br.onSuccess(key);
    expect(br.state(key)).toBe("HALF_OPEN");

    const change = br.onSuccess(key);
    expect(change.changed).toBe(true);
    expect(br.state(key)).toBe("CLOSED");

    for (let i = 0; i < 10; i++) expect(br.allow(key, t0 + 100 + i).allowed).toBe(true);
  });

  it("half-open reopens on any failure with a fresh timestamp", () => {
    const br = new CircuitBreaker({ failureThreshold: 1, successThreshold: 2, openTimeoutMs: 50 });
    const key = "svc";
    const t0 = 1000;

    br.allow(key, t0);
    br.onFailure(key, t0);
    br.allow(key, t0 + 60);

    const change = br.onFailure(key, t0 + 61);
    expect(change).toEqual({ changed: true, from: "HALF_OPEN", to: "OPEN" });
    expect(br.allow(key, t0 + 100)).toEqual({ allowed: false, state: "OPEN", retryAfterMs: 11 });
  });

  it("release hands back a probe slot", () => {
    const br = new CircuitBreaker({ failureThreshold: 1, successThreshold: 1, openTimeoutMs: 10, halfOpenMaxProbes: 1 });
    const key = "svc";

    br.allow(key, 0);
    br.onFailure(key, 0);

    expect(br.allow(key, 20).allowed).toBe(true);
    expect(br.allow(key, 21).allowed).toBe(false);
    br.release(key);
    expect(br.allow(key, 22).allowed).toBe(true);
  });

  it("keeps one state machine per key", () => {
    const br = new CircuitBreaker({ failureThreshold: 1, successThreshold: 1, openTimeoutMs: 1000 });
    br.onFailure("a.test");

    expect(br.state("a.test")).toBe("OPEN");
    expect(br.allow("b.test").allowed).toBe(true);
    expect(br.snapshot().map((s) => [s.key, s.state])).toEqual([
      ["a.test", "OPEN"],
      ["b.test", "CLOSED"],
    ]);
  });

  it("rejects invalid options", () => {
    expect(() => new CircuitBreaker({ failureThreshold: 0, successThreshold: 1, openTimeoutMs: 10 })).toThrow(ConfigError);
    expect(() => new CircuitBreaker({ failureThreshold: 1, successThreshold: 1, openTimeoutMs: -1 })).toThrow(ConfigError);
  });
});

describe("classifyOutcome", () => {
  it("counts 5xx and transport failures, not 4xx or cancellation", () => {
    expect(classifyOutcome(response(503), undefined)).toBe("failure");
    expect(classifyOutcome(response(404), undefined)).toBe("success");
    expect(classifyOutcome(response(200), undefined)).toBe("success");
    expect(classifyOutcome(undefined, new NetworkError("refused"))).toBe("failure");
    expect(classifyOutcome(undefined, new Error("boom"))).toBe("failure");
    expect(classifyOutcome(undefined, new RequestAbortedError())).toBe("ignore");
  });
});

describe("circuitBreakerMiddleware", () => {
  it("blocks calls once 5xx responses trip the circuit", async () => {
    const mt = new MockTransport().onGet("/health", () => mockResponse(500));
    const br = new CircuitBreaker({ failureThreshold: 2, successThreshold: 1, openTimeoutMs: 10_000 });
    const transitions: string[] = [];
    const t = circuitBreakerMiddleware(br, { onTransition: (key, c) => transitions.push(`${key} ${c.from}->${c.to}`) })(mt);

    expect((await t.roundTrip(get)).status).toBe(500);
    expect((await t.roundTrip(get)).status).toBe(500);

    const err = await t.roundTrip(get).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CircuitOpenError);
    expect(err).toMatchObject({ key: "api.test" });
    expect(mt.callCount()).toBe(2);
    expect(transitions).toEqual(["api.test CLOSED->OPEN"]);
  });

  it("never trips on client errors", async () => {
    const mt = new MockTransport().onGet("/health", () => mockResponse(404));
    const br = new CircuitBreaker({ failureThreshold: 2, successThreshold: 1, openTimeoutMs: 10_000 });
    const t = circuitBreakerMiddleware(br)(mt);

    for (let i = 0; i < 5; i++) await t.roundTrip(get);
    expect(br.state("api.test")).toBe("CLOSED");
    expect(mt.callCount()).toBe(5);
  });

  it("recovers through HALF_OPEN once the upstream is healthy", async () => {
    let healthy = false;
    const mt = new MockTransport().onGet("/health", () => mockResponse(healthy ? 200 : 500));
    const br = new CircuitBreaker({ failureThreshold: 2, successThreshold: 1, openTimeoutMs: 40 });
    const transitions: string[] = [];
    const t = circuitBreakerMiddleware(br, { onTransition: (_key, c) => transitions.push(`${c.from}->${c.to}`) })(mt);

    await t.roundTrip(get);
    await t.roundTrip(get);
    await expect(t.roundTrip(get)).rejects.toBeInstanceOf(CircuitOpenError);

    healthy = true;
    await sleep(60);

    expect((await t.roundTrip(get)).status).toBe(200);
    expect(br.state("api.test")).toBe("CLOSED");
    expect(transitions).toEqual(["CLOSED->OPEN", "OPEN->HALF_OPEN", "HALF_OPEN->CLOSED"]);
  });
});

describe("StateMachineExecutor", () => {
  it("runs the same state machine behind an execute-style API", async () => {
    const changes: string[] = [];
    const exec = new StateMachineExecutor({
      name: "demo-api",
      failureThreshold: 3,
      successThreshold: 1,
      openTimeoutMs: 40,
      onStateChange: (name, key, from, to) => changes.push(`${name}/${key}: ${from}->${to}`),
    });
    const classify: Classifier<string> = (_value, error) => (error ? "failure" : "success");
    const boom = new Error("upstream 500");

    for (let i = 0; i < 3; i++) {
      await expect(exec.execute<string>("svc", () => Promise.reject(boom), classify)).rejects.toBe(boom);
    }

    let called = false;
    await expect(
      exec.execute<string>(
        "svc",
        async () => {
          called = true;
          return "ok";
        },
        classify
      )
    ).rejects.toBeInstanceOf(CircuitOpenError);
    expect(called).toBe(false);

    await sleep(60);
    await expect(exec.execute<string>("svc", async () => "recovered", classify)).resolves.toBe("recovered");
    expect(exec.state("svc")).toBe("CLOSED");
    expect(changes).toEqual([
      "demo-api/svc: CLOSED->OPEN",
      "demo-api/svc: OPEN->HALF_OPEN",
      "demo-api/svc: HALF_OPEN->CLOSED",
    ]);
  });
});
