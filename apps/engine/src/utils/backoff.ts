export interface BackoffOptions {
  initialIntervalMs: number;
  multiplier: number;
  maxIntervalMs: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = {
  initialIntervalMs: 30_000,
  multiplier: 4,
  maxIntervalMs: 15 * 60_000,
};

// Exponential backoff between ticks: with the defaults, 30s → 2m → 8m → 15m cap.
// attempt is 1-indexed; attempt=1 waits initialIntervalMs, attempt=2 waits multiplier× that, etc.
export function calculateBackOff(attempt: number, options: BackoffOptions = DEFAULT_BACKOFF): number {
  const { initialIntervalMs, multiplier, maxIntervalMs } = options;
  let delay = initialIntervalMs * Math.pow(multiplier, Math.max(attempt, 1) - 1);
  delay = Math.min(delay, maxIntervalMs);
  // ±10% jitter so tasks that failed together do not retry together
  const jitter = delay * 0.1;
  const randomJitter = Math.random() * jitter * 2 - jitter;
  return Math.max(0, Math.floor(delay + randomJitter));
}
