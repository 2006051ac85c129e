import type { BreakerState, HttpRequest } from "./types.js";

export type HttpClientEventName = "breaker:state" | "request:start" | "request:success" | "request:failure";

export interface BreakerStateEvent {
  key: string;
  from: BreakerState;
  to: BreakerState;
}

export interface RequestEventBase {
  request: HttpRequest;
  requestId: string; // unique per call to request()
}

export interface RequestSuccessEvent extends RequestEventBase {
  durationMs: number;
  status: number;
}

export interface RequestFailureEvent extends RequestEventBase {
  durationMs: number;
  error: unknown;
  errorName?: string;
}
