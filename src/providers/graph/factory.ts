/**
 * Graph Backend Factory
 *
 * Creates graph backends. Currently only supports Neo4j.
 */

import { type Neo4jConfig, Neo4jGraphBackend } from './neo4j';
import type { GraphBackend } from './types';

export function createGraphBackend(config: Neo4jConfig): GraphBackend {
  return new Neo4jGraphBackend(config);
}
