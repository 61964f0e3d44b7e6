export type BackoffPolicy = {
  baseMs: number;
  maxMs: number;
  jitterRatio: number;
};

/**
 * Exponential delay for the given zero-based attempt, capped at maxMs and
 * shortened by up to jitterRatio of itself.
 */
export function computeBackoffDelay(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt);
  const capped = Math.min(policy.maxMs, policy.baseMs * 2 ** exponent);
  const ratio = Math.min(1, Math.max(0, policy.jitterRatio));
  return Math.round(capped * (1 - ratio * random()));
}
