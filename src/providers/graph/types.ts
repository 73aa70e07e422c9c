/**
 * Graph Backend Types
 *
 * Defines the contract the Graph Store Adapter needs from a graph database.
 * The Neo4j backend implements it in production; tests use an in-process one.
 */

import type { EdgeType, GraphEdge, GraphNode, NodeType } from '@/core/synthesis';

// ============================================================
// ERROR TYPES
// ============================================================

/**
 * Standard error types that any graph backend must map to.
 */
export type GraphErrorType =
  | 'CONNECTION_ERROR' // Database unreachable (retryable)
  | 'TRANSACTION_ERROR' // Deadlock, lock timeout, terminated transaction (retryable)
  | 'QUERY_SYNTAX_ERROR' // Malformed query (surfaced verbatim)
  | 'CONSTRAINT_VIOLATION' // Unique constraint violated
  | 'ACCESS_MODE_ERROR' // Write attempted in a read transaction
  | 'QUERY_ERROR'; // Any other execution error

/**
 * Standardized error class for graph operations.
 * All graph backends throw this error type.
 */
export class GraphClientError extends Error {
  public override readonly cause?: unknown;

  constructor(
    message: string,
    public readonly type: GraphErrorType,
    cause?: unknown
  ) {
    super(message);
    this.name = 'GraphClientError';
    this.cause = cause;
  }

  /**
   * Whether this error is retryable (transient failures).
   */
  get retryable(): boolean {
    return this.type === 'CONNECTION_ERROR' || this.type === 'TRANSACTION_ERROR';
  }
}

// ============================================================
// DATA TYPES
// ============================================================

/** One result row, with driver values converted to plain JSON values. */
export type QueryRow = Record<string, unknown>;

export interface ReplaceResult {
  nodesWritten: number;
  edgesWritten: number;
  nodesDeleted: number;
}

// ============================================================
// BACKEND CONTRACT
// ============================================================

/**
 * Write operations available inside one backend transaction.
 * Everything done through it commits or rolls back together.
 */
export interface GraphWriteTransaction {
  /** Delete every node (and its relationships) tagged with patientId. */
  deletePatientScope(patientId: number): Promise<number>;
  /** Create nodes of one type, tagged with patientId. */
  createNodes(patientId: number, type: NodeType, nodes: readonly GraphNode[]): Promise<number>;
  /** Create edges of one type between nodes created in this transaction. */
  createEdges(patientId: number, type: EdgeType, edges: readonly GraphEdge[]): Promise<number>;
}

export interface GraphBackend {
  /** Human-readable location, e.g. the bolt URI */
  readonly location: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;

  /** Idempotent: constraints and indexes. */
  initializeSchema(): Promise<void>;

  /**
   * Run `work` in one write transaction.
   * Commits if it resolves, rolls back if it throws.
   *
   * @throws GraphClientError
   */
  executeWrite<T>(
    work: (tx: GraphWriteTransaction) => Promise<T>,
    options?: { timeoutMs?: number }
  ): Promise<T>;

  /**
   * Run a caller-supplied query in a read-only transaction.
   *
   * @throws GraphClientError
   */
  executeRead(
    query: string,
    params?: Record<string, unknown>,
    options?: { timeoutMs?: number }
  ): Promise<QueryRow[]>;
}
