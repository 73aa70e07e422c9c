/**
 * Resilience Manager
 *
 * One retry wrapper for every outbound call: graph store, relational store,
 * prediction services, tool execution, planner calls and tool discovery.
 *
 * Each attempt runs under its own timeout and receives a signal that fires
 * on that timeout or on the caller's signal. Transient failures back off
 * exponentially; permanent ones are rethrown untouched.
 */

import { AbortedError, FinalError, TimeoutError } from '../errors';
import { classifyFailure, type FailureKind } from './classify';
import { computeBackoff, type RandomSource, type RetryPolicy } from './policy';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/** Passed to the operation on every attempt. */
export interface AttemptContext {
  /** 1-based attempt number */
  attempt: number;
  /** Fires on the per-attempt timeout or when the caller aborts */
  signal: AbortSignal;
}

export interface RetryEvent {
  operationName: string;
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  /** Used in error messages and retry logs */
  operationName?: string;
  /** Request-level cancellation; never retried */
  signal?: AbortSignal;
  classify?: (error: unknown) => FailureKind;
  random?: RandomSource;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (event: RetryEvent) => void;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Timers
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Sleep for `ms`, rejecting with AbortedError if the signal fires first.
 */
export function sleep(ms: number, signal?: AbortSignal, operationName = 'sleep'): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    if (signal.aborted) {
      reject(new AbortedError(operationName, signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError(operationName, signal.reason));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run one attempt under a timeout, linked to the caller's signal.
 * Settles as soon as the attempt signal fires, even if the operation ignores it.
 */
async function runAttempt<T>(
  operation: (context: AttemptContext) => Promise<T>,
  attempt: number,
  timeoutMs: number,
  operationName: string,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = setTimeout(
    () => controller.abort(new TimeoutError(operationName, timeoutMs)),
    timeoutMs
  );

  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), {
      once: true
    });
  });

  try {
    return await Promise.race([operation({ attempt, signal: controller.signal }), cancelled]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retry
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Execute an operation with per-attempt timeout and exponential backoff.
 *
 * - Transient failure: back off and retry until `maxAttempts`, then FinalError
 * - Permanent failure: rethrown immediately
 * - Caller abort: AbortedError, never retried
 *
 * @example
 * ```typescript
 * const rows = await withRetry(
 *   ({ signal }) => client.query(sql, { signal }),
 *   policies.records,
 *   { operationName: 'loadPatient', signal: request.signal }
 * );
 * ```
 */
export async function withRetry<T>(
  operation: (context: AttemptContext) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const operationName = options.operationName ?? 'operation';
  const classify = options.classify ?? classifyFailure;
  const random = options.random ?? Math.random;
  const wait = options.sleep ?? ((ms: number, signal?: AbortSignal) => sleep(ms, signal, operationName));
  const { signal } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw new AbortedError(operationName, signal.reason);
    }

    try {
      return await runAttempt(operation, attempt, policy.timeoutPerAttemptMs, operationName, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error instanceof AbortedError ? error : new AbortedError(operationName, signal.reason);
      }
      if (classify(error) === 'permanent') {
        throw error;
      }

      lastError = error;
      if (attempt === policy.maxAttempts) break;

      const delayMs = computeBackoff(attempt, policy, random);
      options.onRetry?.({ operationName, attempt, delayMs, error });
      await wait(delayMs, signal);
    }
  }

  throw new FinalError(operationName, policy.maxAttempts, lastError);
}
