/** Backoff policy between retry attempts. */
export interface BackoffPolicy {
  /** Delay before the second attempt. */
  baseMs: number;
  /** Upper bound for any single delay. */
  maxMs: number;
  /** Spread each delay by ±JITTER_RATIO to decorrelate concurrent retries. */
  jitter: boolean;
}

export const JITTER_RATIO = 0.2;

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseMs: 1_000,
  maxMs: 8_000,
  jitter: true,
};

/**
 * Delay to wait after failed attempt `attempt` (1-based): base doubled per
 * attempt, jittered, then capped.
 */
export function computeBackoff(policy: BackoffPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseMs * Math.pow(2, attempt - 1);
  const delay = policy.jitter
    ? exponential * (1 - JITTER_RATIO + random() * JITTER_RATIO * 2)
    : exponential;
  return Math.round(Math.min(policy.maxMs, delay));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
