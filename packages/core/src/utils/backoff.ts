/**
 * Exponential Backoff Utility
 *
 * Computes delay between retry attempts with jitter.
 */

export interface RetryPolicy {
  initialMs: number
  maxMs: number
  factor: number
  /** Fraction of the delay applied as random ± offset */
  jitter: number
  maxAttempts: number
}

/**
 * Compute backoff delay for a given attempt number.
 *
 * @param attempt - Zero-based attempt number
 * @returns Delay in milliseconds, or null if maxAttempts exceeded
 */
export function computeBackoff(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number | null {
  if (attempt >= policy.maxAttempts) return null

  const base = policy.initialMs * Math.pow(policy.factor, attempt)
  const capped = Math.min(base, policy.maxMs)

  // Apply jitter: ±jitter% of the computed delay
  const jitterRange = capped * policy.jitter
  const jitterOffset = (random() * 2 - 1) * jitterRange

  return Math.round(capped + jitterOffset)
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
