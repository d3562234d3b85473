export interface BackoffPolicy {
  baseMs: number;
  capMs: number;
  /** Upper bound (exclusive) of the uniform jitter; kept at or below baseMs. */
  jitterMs: number;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  baseMs: 5_000,
  capMs: 120_000,
  jitterMs: 1_000,
};

/**
 * Exponential backoff: 5s, 10s, 20s, 40s... plus jitter, capped at 2m with the defaults.
 * With jitterMs <= baseMs the result never decreases as `attempt` grows.
 */
export function computeBackoffMs(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF,
  random: () => number = Math.random
): number {
  const exp = Math.max(0, Math.floor(attempt));
  const raw = policy.baseMs * Math.pow(2, exp);
  const jitter = policy.jitterMs > 0 ? Math.floor(random() * policy.jitterMs) : 0;
  return Math.min(raw + jitter, policy.capMs);
}
