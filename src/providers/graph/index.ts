/**
 * Graph Provider Module
 *
 * Exports the GraphBackend contract, the Neo4j implementation and the
 * Graph Store Adapter built on top of them.
 */

// Factory
export { createGraphBackend } from './factory';

// Neo4j implementation
export type { Neo4jConfig } from './neo4j';
export { Neo4jGraphBackend } from './neo4j';

// Store
export { KeyedMutex } from './patient-lock';
export { GraphStore, type GraphStoreOptions, type StoreCallOptions } from './store';

// Types
export type {
  GraphBackend,
  GraphErrorType,
  GraphWriteTransaction,
  QueryRow,
  ReplaceResult
} from './types';
export { GraphClientError } from './types';
