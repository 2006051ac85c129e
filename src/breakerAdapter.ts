// src/breakerAdapter.ts
import { CircuitBreaker, classifyOutcome, type BreakerTransition, type BreakerVerdict } from "./breaker.js";
import { CircuitOpenError } from "./errors.js";
import { transportFunc } from "./middleware.js";
import type { BreakerOptions, BreakerState, HttpResponse, KeyFn, Middleware } from "./types.js";
import { hostOf } from "./utils/request.js";

export type Classifier<T> = (value: T | undefined, error: unknown) => BreakerVerdict;

/**
 * Execute-style breaker: hand it the work, it does the bookkeeping.
 * Implementations must reject with CircuitOpenError without calling `fn`
 * while the circuit for `key` is open.
 */
export interface ExecutingCircuitBreaker {
  execute<T>(key: string, fn: () => Promise<T>, classify: Classifier<T>): Promise<T>;
}

export interface ExecutingBreakerOptions extends BreakerOptions {
  name?: string;
  onStateChange?: (name: string, key: string, from: BreakerState, to: BreakerState) => void;
}

/** ExecutingCircuitBreaker over the same per-key state machine as CircuitBreaker. */
export class StateMachineExecutor implements ExecutingCircuitBreaker {
  readonly name: string;
  private readonly breaker: CircuitBreaker;
  private readonly onStateChange?: ExecutingBreakerOptions["onStateChange"];

  constructor(opts: ExecutingBreakerOptions) {
    this.name = opts.name ?? "default";
    this.onStateChange = opts.onStateChange;
    this.breaker = new CircuitBreaker(opts);
  }

  async execute<T>(key: string, fn: () => Promise<T>, classify: Classifier<T>): Promise<T> {
    const before = this.breaker.state(key);
    const decision = this.breaker.allow(key);
    if (decision.state !== before) this.emit(key, { changed: true, from: before, to: decision.state });
    if (!decision.allowed) throw new CircuitOpenError(key, decision.retryAfterMs ?? 0);

    let value: T;
    try {
      value = await fn();
    } catch (err) {
      this.record(key, classify(undefined, err));
      throw err;
    }
    this.record(key, classify(value, undefined));
    return value;
  }

  state(key: string): BreakerState {
    return this.breaker.state(key);
  }

  private record(key: string, verdict: BreakerVerdict): void {
    if (verdict === "success") this.emit(key, this.breaker.onSuccess(key));
    else if (verdict === "failure") this.emit(key, this.breaker.onFailure(key));
    else this.breaker.release(key);
  }

  private emit(key: string, change: BreakerTransition): void {
    if (change.changed && change.from && change.to) this.onStateChange?.(this.name, key, change.from, change.to);
  }
}

export function executingBreakerMiddleware(executor: ExecutingCircuitBreaker, keyFn: KeyFn = hostOf): Middleware {
  return (next) =>
    transportFunc((req) => executor.execute<HttpResponse>(keyFn(req), () => next.roundTrip(req), classifyOutcome));
}
