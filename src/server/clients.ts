/**
 * Shared Client Initialization
 *
 * Lazy composition root. The graph backend, records pool, prediction
 * clients, reasoning model, discovered remote tools, sealed registry and
 * orchestrator are created on first use and shared by every endpoint.
 */

import { getConfig } from '@/config/config';
import type { Config } from '@/config/schema';
import {
  InMemorySessionStore,
  LLMPlanner,
  type OrchestrationResult,
  Orchestrator,
  type RunInput,
  type SessionStore
} from '@/core/agent';
import { resolveRandomSource } from '@/core/resilience';
import type { ToolRegistry } from '@/core/tools';
import { createGraphBackend, type GraphBackend, GraphStore } from '@/providers/graph';
import { createLLMClient } from '@/providers/llm';
import { type DiscoveryReport, discoverRemoteTools, type RemoteToolClient } from '@/providers/mcp';
import { PredictionClient } from '@/providers/prediction';
import {
  createRecordsPool,
  PostgresRecordsSource,
  type RecordsSource,
  redactConnectionString
} from '@/providers/records';
import { createToolRegistry } from '@/tools';
import { logAgentEvent, logDiscovery, logError, logRetry } from '@/utils/logger';

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

/** Anything that can answer one chat turn. */
export interface ChatAgent {
  run(input: RunInput): Promise<OrchestrationResult>;
}

export type DependentService = 'graph' | 'records' | 'diabetesModel' | 'cardioModel';

export type HealthProbes = Record<DependentService, () => Promise<boolean>>;

/**
 * What the HTTP layer needs. Tests supply their own.
 */
export interface ServerClients {
  agent: ChatAgent;
  sessions: SessionStore;
  registry: ToolRegistry;
  health: HealthProbes;
}

/**
 * Everything the process owns, including what must be closed on shutdown.
 */
export interface Clients extends ServerClients {
  graphBackend: GraphBackend;
  graphStore: GraphStore;
  records: RecordsSource;
  predictions: { diabetes: PredictionClient; cardio: PredictionClient };
  remoteClients: RemoteToolClient[];
  discovery: DiscoveryReport[];
}

/** Cached clients instance */
let clients: Clients | null = null;
let initPromise: Promise<Clients> | null = null;

/**
 * Get initialized clients.
 * Lazy initialization ensures clients are only created when needed.
 */
export async function getClients(): Promise<Clients> {
  if (clients) return clients;

  if (!initPromise) {
    initPromise = initializeClients(getConfig());
  }

  clients = await initPromise;
  return clients;
}

/**
 * Release pools, the driver and remote MCP sessions. Safe to call twice.
 */
export async function closeClients(): Promise<void> {
  const current = clients;
  clients = null;
  initPromise = null;
  if (!current) return;

  const results = await Promise.allSettled([
    current.records.close(),
    current.graphBackend.disconnect(),
    ...current.remoteClients.map((client) => client.close())
  ]);
  for (const result of results) {
    if (result.status === 'rejected') logError('shutdown', result.reason);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Initialization
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Connect to Neo4j and create its schema. A database that is down at
 * startup does not stop the server; /health reports it as degraded.
 */
async function prepareGraph(backend: GraphBackend): Promise<void> {
  try {
    await backend.connect();
    await backend.initializeSchema();
  } catch (error) {
    logError(`Neo4j at ${backend.location}`, error);
  }
}

/**
 * Build every client from config.
 */
export async function initializeClients(config: Config): Promise<Clients> {
  const { policies, jitterSeed } = config.resilience;
  const random = resolveRandomSource(jitterSeed);
  const onRetry = logRetry;

  // Knowledge graph
  const graphBackend = createGraphBackend(config.graph);
  await prepareGraph(graphBackend);
  const graphStore = new GraphStore(graphBackend, { policy: policies.graph, random, onRetry });

  // Patient records
  const pool = createRecordsPool(config.records.connectionString, config.records.poolSize);
  pool.on('error', (error) => logError('records pool', error));
  const records = new PostgresRecordsSource(pool, {
    policy: policies.records,
    random,
    onRetry,
    location: redactConnectionString(config.records.connectionString),
    onClose: () => pool.end()
  });

  // Risk models
  const predictions = {
    diabetes: new PredictionClient('diabetes', config.prediction.diabetesUrl),
    cardio: new PredictionClient('cardio', config.prediction.cardioUrl)
  };

  // Remote tools
  const discovered = await discoverRemoteTools(config.discovery.servers, {
    policy: policies.discovery,
    random,
    onRetry,
    onServer: logDiscovery
  });

  const registry = createToolRegistry(
    {
      graphStore,
      records,
      predictions,
      graphQuery: config.tools.graphQuery,
      predictionPolicy: policies.prediction,
      random,
      onRetry
    },
    discovered.descriptors
  );

  // Reasoning
  const llm = createLLMClient(config.llm.provider, config.llm.model, {
    apiKey: config.llm.apiKey,
    baseUrl: config.llm.baseUrl,
    providerName: config.llm.providerName
  });
  const planner = new LLMPlanner(llm, {
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens
  });
  const agent = new Orchestrator({
    planner,
    registry,
    limits: config.agent,
    policies: { planner: policies.planner, tools: policies.tools },
    random,
    onRetry,
    onEvent: logAgentEvent
  });

  const sessions = new InMemorySessionStore(config.sessions.maxSessions, config.sessions.maxTurns);

  return {
    agent,
    sessions,
    registry,
    health: {
      graph: () => graphStore.healthCheck(),
      records: () => records.healthCheck(),
      diabetesModel: () => predictions.diabetes.healthCheck(),
      cardioModel: () => predictions.cardio.healthCheck()
    },
    graphBackend,
    graphStore,
    records,
    predictions,
    remoteClients: discovered.clients,
    discovery: discovered.reports
  };
}
