// src/backoff.ts

/** Maps a 0-based attempt index to the wait before the next attempt, in ms. */
export type BackoffStrategy = (attempt: number) => number;

/** Source of uniform randoms in [0, 1). Injectable so tests can pin jitter. */
export type RandomFn = () => number;

export function constantBackoff(ms: number): BackoffStrategy {
  const delay = Math.max(0, ms);
  return () => delay;
}

/** base, base + increment, base + 2*increment, ... */
export function linearBackoff(baseMs: number, incrementMs: number): BackoffStrategy {
  return (attempt) => Math.max(0, baseMs + incrementMs * attempt);
}

/**
 * base * 2^attempt, capped at `capMs`, then spread by +/- `jitterFactor`
 * (0.1 => within 10% either side). The result never exceeds the cap.
 */
export function exponentialBackoff(
  baseMs: number,
  capMs: number,
  jitterFactor = 0,
  random: RandomFn = Math.random
): BackoffStrategy {
  if (jitterFactor < 0 || jitterFactor > 1) throw new RangeError(`jitterFactor must be 0..1 (got ${jitterFactor})`);

  return (attempt) => {
    const capped = Math.min(capMs, baseMs * Math.pow(2, attempt));
    if (jitterFactor === 0) return capped;

    const spread = capped * jitterFactor * (random() * 2 - 1);
    return Math.min(capMs, Math.max(0, capped + spread));
  };
}

/**
 * "Full jitter": uniform in [0, min(cap, base * 2^attempt)).
 * Spreads synchronized clients the furthest apart.
 */
export function fullJitterBackoff(baseMs: number, capMs: number, random: RandomFn = Math.random): BackoffStrategy {
  return (attempt) => random() * Math.min(capMs, baseMs * Math.pow(2, attempt));
}
