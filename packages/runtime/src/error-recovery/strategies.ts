/**
 * Backoff strategies
 */

/**
 * Inputs of the exponential backoff curve
 */
export type BackoffPolicy = {
  /** First delay in milliseconds */
  initialDelay: number;

  /** Maximum delay in milliseconds */
  maxDelay: number;

  /** Growth factor between consecutive delays */
  backoffMultiplier: number;

  /** Spread delays by up to ±20% */
  jitter: boolean;
};

export const JITTER_RATIO = 0.2;

/**
 * Delay before retry number `attempt + 1`, where `attempt` counts from 0.
 *
 * `min(maxDelay, initialDelay * backoffMultiplier^attempt)`, optionally jittered.
 * Jitter never pushes the result above `maxDelay`.
 */
export function calculateDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const base = Math.min(
    policy.maxDelay,
    policy.initialDelay * policy.backoffMultiplier ** Math.max(0, attempt)
  );

  if (!policy.jitter) {
    return Math.round(base);
  }

  const spread = (random() * 2 - 1) * JITTER_RATIO * base;
  return Math.max(0, Math.min(policy.maxDelay, Math.round(base + spread)));
}

/**
 * Un-jittered delays for `count` consecutive retries
 */
export function backoffSchedule(count: number, policy: BackoffPolicy): number[] {
  const plain = { ...policy, jitter: false };
  return Array.from({ length: count }, (_, attempt) => calculateDelay(attempt, plain));
}
