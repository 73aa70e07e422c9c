/**
 * Neo4j Graph Backend
 *
 * Implements GraphBackend on the official driver. Retries are owned by
 * the Graph Store's resilience policy, so the driver's own transaction
 * retry loop is disabled.
 */

import neo4j, { type Driver, type ManagedTransaction } from 'neo4j-driver';
import type { EdgeType, GraphEdge, GraphNode, NodeType } from '@/core/synthesis';
import type { GraphBackend, GraphWriteTransaction, QueryRow } from '../types';
import { GraphClientError } from '../types';
import { runCommand } from './errors';
import { readCount, recordToRow } from './mapping';
import { createEdgesQuery, createNodesQuery, DELETE_PATIENT_SCOPE } from './queries';
import { initializeSchema } from './schema';

// ============================================================
// CONFIGURATION
// ============================================================

/**
 * Configuration for Neo4j connection.
 */
export interface Neo4jConfig {
  uri: string;
  user: string;
  password: string;
  database: string;
  maxConnectionPoolSize: number;
}

// ============================================================
// TRANSACTION CLIENT
// ============================================================

/**
 * Creates a GraphWriteTransaction bound to one managed transaction.
 */
export function createTransactionClient(tx: ManagedTransaction): GraphWriteTransaction {
  return {
    async deletePatientScope(patientId: number): Promise<number> {
      const result = await tx.run(DELETE_PATIENT_SCOPE, { patientId: neo4j.int(patientId) });
      return readCount(result.records, 'deleted');
    },

    async createNodes(patientId: number, type: NodeType, nodes: readonly GraphNode[]): Promise<number> {
      if (nodes.length === 0) return 0;
      const result = await tx.run(createNodesQuery(type), {
        patientId: neo4j.int(patientId),
        nodes: nodes.map((node) => ({ id: node.id, key: node.key, properties: node.properties }))
      });
      return readCount(result.records, 'created');
    },

    async createEdges(patientId: number, type: EdgeType, edges: readonly GraphEdge[]): Promise<number> {
      if (edges.length === 0) return 0;
      const result = await tx.run(createEdgesQuery(type), {
        patientId: neo4j.int(patientId),
        edges: edges.map((edge) => ({
          id: edge.id,
          fromId: edge.fromId,
          toId: edge.toId,
          properties: edge.properties
        }))
      });
      const created = readCount(result.records, 'created');
      if (created !== edges.length) {
        // An endpoint MATCH found nothing; abort so the transaction rolls back
        throw new GraphClientError(
          `Created ${created} of ${edges.length} ${type} edges; an endpoint is missing`,
          'QUERY_ERROR'
        );
      }
      return created;
    }
  };
}

// ============================================================
// BACKEND IMPLEMENTATION
// ============================================================

export class Neo4jGraphBackend implements GraphBackend {
  private _driver: Driver | null = null;
  private readonly config: Neo4jConfig;

  constructor(config: Neo4jConfig) {
    this.config = config;
  }

  /**
   * Get the Neo4j driver instance.
   * Throws if not connected.
   */
  get driver(): Driver {
    if (!this._driver) {
      throw new GraphClientError('Not connected to Neo4j', 'CONNECTION_ERROR');
    }
    return this._driver;
  }

  get location(): string {
    return this.config.uri;
  }

  // ============================================================
  // CONNECTION MANAGEMENT
  // ============================================================

  async connect(): Promise<void> {
    this._driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password),
      {
        maxConnectionPoolSize: this.config.maxConnectionPoolSize,
        maxTransactionRetryTime: 0
      }
    );

    // Fail-fast: verify connectivity at startup
    try {
      await this.driver.verifyConnectivity();
    } catch (error) {
      throw new GraphClientError(
        `Failed to connect to Neo4j at ${this.config.uri}: ${error instanceof Error ? error.message : String(error)}`,
        'CONNECTION_ERROR',
        error
      );
    }
  }

  async disconnect(): Promise<void> {
    if (this._driver) {
      await this._driver.close();
      this._driver = null;
    }
  }

  async healthCheck(): Promise<boolean> {
    if (!this._driver) {
      return false;
    }
    try {
      await this._driver.verifyConnectivity();
      return true;
    } catch {
      return false;
    }
  }

  // ============================================================
  // SCHEMA MANAGEMENT
  // ============================================================

  async initializeSchema(): Promise<void> {
    await runCommand(
      this.driver,
      this.config.database,
      'write',
      (session) => initializeSchema(session),
      'initializeSchema'
    );
  }

  // ============================================================
  // TRANSACTIONS
  // ============================================================

  async executeWrite<T>(
    work: (tx: GraphWriteTransaction) => Promise<T>,
    options: { timeoutMs?: number } = {}
  ): Promise<T> {
    return runCommand(
      this.driver,
      this.config.database,
      'write',
      (session) =>
        session.executeWrite((managedTx) => work(createTransactionClient(managedTx)), {
          timeout: options.timeoutMs
        }),
      'executeWrite'
    );
  }

  async executeRead(
    query: string,
    params: Record<string, unknown> = {},
    options: { timeoutMs?: number } = {}
  ): Promise<QueryRow[]> {
    return runCommand(
      this.driver,
      this.config.database,
      'read',
      async (session) => {
        const result = await session.executeRead((managedTx) => managedTx.run(query, params), {
          timeout: options.timeoutMs
        });
        return result.records.map(recordToRow);
      },
      'executeRead'
    );
  }
}
