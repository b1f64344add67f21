export interface BackOffOptions {
  multiplier?: number;
  maxMs?: number;
  /** Fraction of the delay added or removed at random; 0 disables jitter. */
  jitter?: number;
}

// attempt is 1-indexed: attempt=1 waits baseMs, attempt=2 waits baseMs * multiplier, ...
export function calculateBackOff(
  attempt: number,
  baseMs: number,
  { multiplier = 2, maxMs = 60_000, jitter = 0.1 }: BackOffOptions = {},
): number {
  const delay = Math.min(baseMs * Math.pow(multiplier, Math.max(attempt, 1) - 1), maxMs);
  const spread = delay * jitter;
  return Math.floor(delay - spread + Math.random() * spread * 2);
}
