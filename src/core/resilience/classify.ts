/**
 * Failure Classification
 *
 * Decides whether a thrown value is worth another attempt.
 * Anything unrecognized is treated as permanent.
 */

import { AbortedError } from '../errors';

export type FailureKind = 'transient' | 'permanent';

/** Socket-level codes that indicate the peer was briefly unreachable. */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_SOCKET'
]);

/** HTTP statuses that mean "busy, try again". */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

/**
 * Classify a failure as transient or permanent.
 *
 * Order:
 * 1. Aborts are permanent (the caller gave up)
 * 2. Errors exposing a boolean `retryable` decide for themselves
 * 3. HTTP API errors in the AI SDK shape: `isRetryable`, else `statusCode`
 * 4. Network error codes, on the error or anywhere in its cause chain
 * 5. Everything else is permanent
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof AbortedError) return 'permanent';

  const retryable = readProperty(error, 'retryable');
  if (typeof retryable === 'boolean') {
    return retryable ? 'transient' : 'permanent';
  }

  const isRetryable = readProperty(error, 'isRetryable');
  if (typeof isRetryable === 'boolean') {
    return isRetryable ? 'transient' : 'permanent';
  }

  const statusCode = readProperty(error, 'statusCode');
  if (typeof statusCode === 'number') {
    return isTransientStatus(statusCode) ? 'transient' : 'permanent';
  }

  let current: unknown = error;
  for (let depth = 0; depth < 5 && current !== undefined; depth++) {
    const code = readProperty(current, 'code');
    if (typeof code === 'string' && TRANSIENT_NETWORK_CODES.has(code)) {
      return 'transient';
    }
    current = readProperty(current, 'cause');
  }

  return 'permanent';
}
