/**
 * Neo4j Graph Provider Module
 *
 * GraphBackend implementation for Neo4j.
 */

export type { Neo4jConfig } from './client';
// Backend (public API)
export { createTransactionClient, Neo4jGraphBackend } from './client';

// Foundation exports for internal use
export { INDEXES, LABELS } from './constants';
export type { CommandMode } from './errors';
export {
  classifyNeo4jError,
  isSchemaAlreadyExistsError,
  runCommand,
  toGraphClientError
} from './errors';
export { readCount, recordToRow, toPlainValue } from './mapping';

// Query repository
export * from './queries';

// Schema management
export { initializeSchema } from './schema';
