/**
 * Backoff policy
 * Pure function of the attempt number; the engine does the waiting.
 */

export interface BackoffPolicy {
  /** Delay after the first failed attempt */
  baseDelayMs: number;
  /** Ceiling for any single delay */
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  baseDelayMs: 2000,
  maxDelayMs: 60000,
};

/**
 * Delay to wait after failed attempt `attempt` (1-based):
 * min(baseDelayMs * 2^(attempt-1), maxDelayMs)
 */
export function computeBackoffDelay(attempt: number, policy: BackoffPolicy): number {
  const n = Math.max(1, Math.floor(attempt));
  const delay = policy.baseDelayMs * Math.pow(2, n - 1);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Whether another attempt is allowed after `attemptsMade` attempts
 */
export function hasAttemptsRemaining(attemptsMade: number, maxRetries: number): boolean {
  return attemptsMade < maxRetries;
}
