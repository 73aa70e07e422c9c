/**
 * Test Doubles
 *
 * In-process stand-ins for Neo4j, PostgreSQL, the prediction services,
 * the reasoning model and remote MCP servers.
 */

import type { Planner, PlanRequest } from '@/core/agent';
import type { RetryPolicy } from '@/core/resilience';
import type { EdgeType, GraphEdge, GraphNode, NodeType } from '@/core/synthesis';
import type { GraphBackend, GraphWriteTransaction, QueryRow } from '@/providers/graph/types';
import type { RemoteToolClient, RemoteToolInfo } from '@/providers/mcp';
import type { FetchFn } from '@/providers/prediction';
import type { DbExecutor, DbRow } from '@/providers/records/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Zero-delay policy so retries do not slow tests down.
 */
export function testPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return {
    maxAttempts: 3,
    baseDelayMs: 0,
    maxDelayMs: 0,
    jitter: 0,
    timeoutPerAttemptMs: 1000,
    ...overrides
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Graph Backend
// ═══════════════════════════════════════════════════════════════════════════════

export interface StoredNode {
  id: string;
  patientId: number;
  type: NodeType;
  key: string;
  properties: GraphNode['properties'];
}

export interface StoredEdge {
  id: string;
  patientId: number;
  type: EdgeType;
  fromId: string;
  toId: string;
}

/** Where an injected write failure is thrown. */
export type FailurePoint = 'begin' | 'createEdges';

interface InjectedFailure {
  at: FailurePoint;
  error: unknown;
}

/**
 * Graph backend that keeps committed state in maps. Each write works on a
 * copy that replaces the committed state only when the work resolves.
 */
export class InMemoryGraphBackend implements GraphBackend {
  readonly location = 'memory://graph';

  nodes = new Map<string, StoredNode>();
  edges = new Map<string, StoredEdge>();

  healthy = true;
  writeCalls = 0;
  activeWrites = 0;
  maxConcurrentWrites = 0;
  readonly reads: Array<{ query: string; params: Record<string, unknown> }> = [];
  readRows: QueryRow[] = [];
  readonly readFailures: unknown[] = [];

  private readonly failures: InjectedFailure[] = [];
  private gate: Promise<void> | null = null;

  /** Queue a failure for the next write transaction. */
  failNextWrite(error: unknown, at: FailurePoint = 'begin'): this {
    this.failures.push({ at, error });
    return this;
  }

  /**
   * Make writes wait inside the transaction (after deleting the patient
   * scope) until the returned function is called.
   */
  holdWrites(): () => void {
    let open: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    return () => {
      this.gate = null;
      open();
    };
  }

  nodesFor(patientId: number): StoredNode[] {
    return [...this.nodes.values()].filter((node) => node.patientId === patientId);
  }

  edgesFor(patientId: number): StoredEdge[] {
    return [...this.edges.values()].filter((edge) => edge.patientId === patientId);
  }

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }

  async initializeSchema(): Promise<void> {}

  async executeWrite<T>(work: (tx: GraphWriteTransaction) => Promise<T>): Promise<T> {
    this.writeCalls++;
    this.activeWrites++;
    this.maxConcurrentWrites = Math.max(this.maxConcurrentWrites, this.activeWrites);

    try {
      const failure = this.failures.shift();
      if (failure?.at === 'begin') throw failure.error;

      const nodes = new Map(this.nodes);
      const edges = new Map(this.edges);
      const gate = this.gate;

      const tx: GraphWriteTransaction = {
        deletePatientScope: async (patientId) => {
          let deleted = 0;
          for (const [id, node] of nodes) {
            if (node.patientId === patientId) {
              nodes.delete(id);
              deleted++;
            }
          }
          for (const [id, edge] of edges) {
            if (edge.patientId === patientId) edges.delete(id);
          }
          if (gate) await gate;
          return deleted;
        },
        createNodes: async (patientId, type, batch) => {
          for (const node of batch) {
            nodes.set(node.id, { id: node.id, patientId, type, key: node.key, properties: node.properties });
          }
          return batch.length;
        },
        createEdges: async (patientId, type, batch: readonly GraphEdge[]) => {
          if (failure?.at === 'createEdges') throw failure.error;
          for (const edge of batch) {
            edges.set(edge.id, { id: edge.id, patientId, type, fromId: edge.fromId, toId: edge.toId });
          }
          return batch.length;
        }
      };

      const result = await work(tx);
      this.nodes = nodes;
      this.edges = edges;
      return result;
    } finally {
      this.activeWrites--;
    }
  }

  async executeRead(query: string, params: Record<string, unknown> = {}): Promise<QueryRow[]> {
    this.reads.push({ query, params });
    if (this.readFailures.length > 0) throw this.readFailures.shift();
    return this.readRows;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Records Database
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * SQL executor that answers by matching the table a query selects from.
 */
export class FakeDb implements DbExecutor {
  readonly queries: Array<{ text: string; values: unknown[] }> = [];
  readonly failures: unknown[] = [];

  constructor(private readonly tables: Partial<Record<string, DbRow[]>> = {}) {}

  async query(text: string, values: unknown[] = []): Promise<{ rows: DbRow[] }> {
    this.queries.push({ text, values });
    if (this.failures.length > 0) throw this.failures.shift();

    const match = /FROM\s+(\w+)/i.exec(text);
    const table = match?.[1];
    if (!table) return { rows: [{ '?column?': 1 }] };
    return { rows: this.tables[table] ?? [] };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP
// ═══════════════════════════════════════════════════════════════════════════════

export interface RecordedRequest {
  url: string;
  method: string;
  body: unknown;
}

/**
 * fetch stand-in that replays queued responses (or thrown errors) in order.
 */
export function createFakeFetch(responses: Array<Response | Error>): {
  fetch: FetchFn;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    const body = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    requests.push({ url: input, method: init?.method ?? 'GET', body });

    const next = responses.shift();
    if (next === undefined) throw new Error(`Unexpected request to ${input}`);
    if (next instanceof Error) throw next;
    return next;
  };
  return { fetch: fetchFn, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Planner
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Planner that replays scripted raw plans in order. When the script runs
 * out it answers "done".
 */
export class ScriptedPlanner implements Planner {
  readonly requests: PlanRequest[] = [];
  finalizeCalls = 0;
  finalAnswer = 'Final answer from gathered results';

  constructor(private readonly steps: unknown[]) {}

  async plan(request: PlanRequest): Promise<unknown> {
    this.requests.push({ ...request, history: [...request.history] });
    if (this.steps.length === 0) return { type: 'final_answer', answer: 'done' };
    return this.steps.shift();
  }

  async finalize(): Promise<string> {
    this.finalizeCalls++;
    return this.finalAnswer;
  }
}

/** Promise that settles only when the signal fires. */
export function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// Remote MCP
// ═══════════════════════════════════════════════════════════════════════════════

export class FakeRemoteClient implements RemoteToolClient {
  readonly calls: Array<{ name: string; args: Record<string, unknown> }> = [];
  closed = false;

  constructor(
    private readonly tools: RemoteToolInfo[],
    private readonly respond: (name: string, args: Record<string, unknown>) => unknown = () => ({
      content: [{ type: 'text', text: 'ok' }]
    })
  ) {}

  async listTools(): Promise<RemoteToolInfo[]> {
    return this.tools;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    this.calls.push({ name, args });
    return this.respond(name, args);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
