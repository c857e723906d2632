export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Reconnection attempts before giving up */
  maxAttempts: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 5,
};

/** `min(base * 2^attempt, max)`, with attempt counted from 0. */
export function computeBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
}
