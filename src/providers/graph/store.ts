/**
 * Graph Store Adapter
 *
 * Applies a synthesized subgraph as an atomic, patient-scoped replace and
 * runs read-only queries. Writes for the same patient are serialized by a
 * keyed mutex; every write runs under the graph retry policy.
 */

import { ArgumentValidationError, QuerySyntaxError } from '@/core/errors';
import {
  type RandomSource,
  type RetryEvent,
  type RetryPolicy,
  withRetry
} from '@/core/resilience';
import {
  assertSubgraphConsistent,
  type EdgeType,
  type GraphEdge,
  type GraphNode,
  type NodeType,
  type Subgraph
} from '@/core/synthesis';
import { KeyedMutex } from './patient-lock';
import {
  type GraphBackend,
  GraphClientError,
  type GraphWriteTransaction,
  type QueryRow,
  type ReplaceResult
} from './types';

// ============================================================
// OPTIONS
// ============================================================

export interface GraphStoreOptions {
  policy: RetryPolicy;
  random?: RandomSource;
  onRetry?: (event: RetryEvent) => void;
}

export interface StoreCallOptions {
  signal?: AbortSignal;
}

// ============================================================
// HELPERS
// ============================================================

function groupBy<T, K extends string>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}

/**
 * Clear-then-write inside one transaction. The signal is checked between
 * statements so a cancelled attempt stops issuing writes and rolls back.
 */
async function applyReplace(
  tx: GraphWriteTransaction,
  subgraph: Subgraph,
  signal: AbortSignal
): Promise<ReplaceResult> {
  signal.throwIfAborted();
  const nodesDeleted = await tx.deletePatientScope(subgraph.patientId);

  let nodesWritten = 0;
  for (const [type, nodes] of groupBy<GraphNode, NodeType>(subgraph.nodes, (n) => n.type)) {
    signal.throwIfAborted();
    nodesWritten += await tx.createNodes(subgraph.patientId, type, nodes);
  }

  let edgesWritten = 0;
  for (const [type, edges] of groupBy<GraphEdge, EdgeType>(subgraph.edges, (e) => e.type)) {
    signal.throwIfAborted();
    edgesWritten += await tx.createEdges(subgraph.patientId, type, edges);
  }

  signal.throwIfAborted();
  return { nodesWritten, edgesWritten, nodesDeleted };
}

// ============================================================
// STORE
// ============================================================

export class GraphStore {
  private readonly locks = new KeyedMutex<number>();

  constructor(
    private readonly backend: GraphBackend,
    private readonly options: GraphStoreOptions
  ) {}

  get location(): string {
    return this.backend.location;
  }

  /** Patients with a write running or queued. */
  get activeWriters(): number {
    return this.locks.size;
  }

  healthCheck(): Promise<boolean> {
    return this.backend.healthCheck();
  }

  /**
   * Replace everything stored for `patientId` with `subgraph`.
   *
   * Either the whole subgraph is visible afterwards or the previous one is.
   * The patient lock is held until the backend has settled every attempt,
   * including one abandoned on timeout or abort.
   *
   * @throws ArgumentValidationError if the subgraph belongs to another patient
   * @throws ConsistencyError for duplicate node ids or dangling edges
   * @throws FinalError after exhausting transient retries
   * @throws AbortedError when the signal fires
   */
  async replacePatientSubgraph(
    patientId: number,
    subgraph: Subgraph,
    { signal }: StoreCallOptions = {}
  ): Promise<ReplaceResult> {
    if (subgraph.patientId !== patientId) {
      throw new ArgumentValidationError(
        'patientId',
        `subgraph belongs to patient ${subgraph.patientId}, not ${patientId}`
      );
    }
    assertSubgraphConsistent(subgraph);

    return this.locks.runExclusive(
      patientId,
      async () => {
        const inFlight: Promise<unknown>[] = [];
        try {
          return await withRetry(
            ({ signal: attemptSignal }) => {
              const write = this.backend.executeWrite(
                (tx) => applyReplace(tx, subgraph, attemptSignal),
                { timeoutMs: this.options.policy.timeoutPerAttemptMs }
              );
              inFlight.push(write);
              return write;
            },
            this.options.policy,
            {
              operationName: `replacePatientSubgraph(${patientId})`,
              signal,
              random: this.options.random,
              onRetry: this.options.onRetry
            }
          );
        } finally {
          await Promise.allSettled(inFlight);
        }
      },
      signal
    );
  }

  /**
   * Run a read-only query. Syntax errors surface verbatim as QuerySyntaxError.
   */
  async query(
    cypher: string,
    params: Record<string, unknown> = {},
    { signal }: StoreCallOptions = {}
  ): Promise<QueryRow[]> {
    try {
      return await withRetry(
        () =>
          this.backend.executeRead(cypher, params, {
            timeoutMs: this.options.policy.timeoutPerAttemptMs
          }),
        this.options.policy,
        {
          operationName: 'graphQuery',
          signal,
          random: this.options.random,
          onRetry: this.options.onRetry
        }
      );
    } catch (error) {
      if (error instanceof GraphClientError && error.type === 'QUERY_SYNTAX_ERROR') {
        throw new QuerySyntaxError(error.message, error);
      }
      throw error;
    }
  }
}
