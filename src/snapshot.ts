import type { BreakerSnapshotEntry } from "./breaker.js";

export interface RateLimitSnapshot {
  key: string;
  tokens: number;
}

export interface ClientSnapshot {
  breakers: BreakerSnapshotEntry[];
  rateLimits: RateLimitSnapshot[];
}
