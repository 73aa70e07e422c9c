import { AbortedError, ClinigraphError } from '@/core/errors';
import type { ToolResult } from '@/core/tools';

/**
 * Turn a domain error into a structured tool failure.
 *
 * Retryable errors and aborts are rethrown: the first so the tools policy
 * can retry the call, the second so the orchestrator sees the deadline.
 */
export function toToolFailure(error: unknown): ToolResult<never> {
  if (error instanceof AbortedError) throw error;
  if (error instanceof ClinigraphError && !error.retryable) {
    return { ok: false, error: error.toDetail() };
  }
  throw error;
}
