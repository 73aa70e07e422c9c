/**
 * Retry Policy
 *
 * Backoff arithmetic and jitter randomness, kept free of timers so the
 * schedule can be asserted directly.
 */

import type { RetryPolicyConfig } from '@/config/schema';

export type RetryPolicy = RetryPolicyConfig;

/** Source of uniform values in [0, 1). */
export type RandomSource = () => number;

/**
 * Delay before the retry that follows `attempt` (1-based).
 *
 * `min(maxDelay, baseDelay * 2^(attempt-1))`, spread by ±jitter of itself.
 */
export function computeBackoff(
  attempt: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: RandomSource = Math.random
): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  if (policy.jitter === 0) return exponential;

  const spread = exponential * policy.jitter;
  const offset = (random() * 2 - 1) * spread;
  return Math.max(0, Math.round(exponential + offset));
}

/**
 * Seeded generator (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Pick the jitter source: seeded when a seed is configured, Math.random otherwise.
 */
export function resolveRandomSource(seed?: number): RandomSource {
  return seed === undefined ? Math.random : createSeededRandom(seed);
}
