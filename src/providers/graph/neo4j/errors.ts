/**
 * Neo4j Error Handling & Session Management
 *
 * Error classification and the runCommand orchestrator that keeps
 * session boilerplate out of the backend.
 */

import type { Driver, Session } from 'neo4j-driver';
import type { GraphErrorType } from '../types';
import { GraphClientError } from '../types';

// ============================================================
// ERROR CLASSIFICATION
// ============================================================

function errorCode(error: Error): string {
  return 'code' in error && typeof error.code === 'string' ? error.code.toLowerCase() : '';
}

/**
 * Map Neo4j-specific errors to standard GraphErrorType.
 *
 * Categories:
 * - CONNECTION_ERROR: Network/availability issues (retryable)
 * - QUERY_SYNTAX_ERROR: Cypher that does not parse
 * - ACCESS_MODE_ERROR: Write clause in a read transaction
 * - CONSTRAINT_VIOLATION: Unique constraint failures
 * - TRANSACTION_ERROR: Deadlocks, lock timeouts, terminated transactions (retryable)
 * - QUERY_ERROR: Anything else
 */
export function classifyNeo4jError(error: unknown): GraphErrorType {
  if (!(error instanceof Error)) return 'QUERY_ERROR';

  const message = error.message.toLowerCase();
  const code = errorCode(error);

  // Connection errors
  if (
    code === 'serviceunavailable' ||
    code === 'sessionexpired' ||
    message.includes('connection') ||
    message.includes('unavailable') ||
    message.includes('failed to connect')
  ) {
    return 'CONNECTION_ERROR';
  }

  // Syntax errors - surfaced verbatim, never retried
  if (code.includes('syntaxerror') || message.startsWith('invalid input')) {
    return 'QUERY_SYNTAX_ERROR';
  }

  if (code.includes('accessmode') || message.includes('read access mode')) {
    return 'ACCESS_MODE_ERROR';
  }

  // Constraint violations - not retryable
  if (message.includes('constraint') || message.includes('unique') || code.includes('constraint')) {
    return 'CONSTRAINT_VIOLATION';
  }

  // Transaction errors - retryable
  if (
    message.includes('deadlock') ||
    message.includes('timeout') ||
    message.includes('transient') ||
    message.includes('terminated') ||
    code.includes('transienterror') ||
    code.includes('deadlock')
  ) {
    return 'TRANSACTION_ERROR';
  }

  return 'QUERY_ERROR';
}

/**
 * Check if an error indicates a schema element already exists.
 */
export function isSchemaAlreadyExistsError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('equivalent') ||
      message.includes('already exists') ||
      message.includes('constraintalreadyexists') ||
      message.includes('indexalreadyexists')
    );
  }
  return false;
}

/**
 * Wrap a driver error as GraphClientError, keeping the driver's message.
 */
export function toGraphClientError(error: unknown, operationName: string): GraphClientError {
  if (error instanceof GraphClientError) return error;
  const type = classifyNeo4jError(error);
  const detail = error instanceof Error ? error.message : String(error);
  // Syntax errors carry the server message unchanged
  const message = type === 'QUERY_SYNTAX_ERROR' ? detail : `${operationName} failed: ${detail}`;
  return new GraphClientError(message, type, error);
}

// ============================================================
// SESSION LIFECYCLE MANAGEMENT
// ============================================================

export type CommandMode = 'read' | 'write';

/**
 * Unified session lifecycle orchestrator.
 *
 * Opens a session in the right access mode, runs the operation,
 * classifies any failure and always closes the session.
 */
export async function runCommand<T>(
  driver: Driver,
  database: string,
  mode: CommandMode,
  operation: (session: Session) => Promise<T>,
  operationName: string
): Promise<T> {
  const session = driver.session({
    database,
    defaultAccessMode: mode === 'read' ? 'READ' : 'WRITE'
  });
  try {
    return await operation(session);
  } catch (error) {
    throw toGraphClientError(error, operationName);
  } finally {
    await session.close();
  }
}
