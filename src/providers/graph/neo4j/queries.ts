/**
 * Neo4j Query Repository
 *
 * Centralized Cypher for schema setup and the patient-scoped replace.
 */

import type { EdgeType, NodeType } from '@/core/synthesis';
import { assertKnownLabel, assertKnownRelType, INDEXES, LABELS } from './constants';

// ============================================================
// SCHEMA QUERIES
// ============================================================

/**
 * Node ids are hashes that include the patient id, so a single global
 * uniqueness constraint covers every patient.
 */
export const CONSTRAINTS = {
  RECORD_ID: `CREATE CONSTRAINT ${INDEXES.RECORD_ID} IF NOT EXISTS FOR (n:${LABELS.RECORD}) REQUIRE n.id IS UNIQUE`
} as const;

/**
 * Patient scoping: the delete step and most tool queries filter on patientId.
 */
export const RANGE_INDEXES = {
  RECORD_PATIENT: `CREATE INDEX ${INDEXES.RECORD_PATIENT} IF NOT EXISTS FOR (n:${LABELS.RECORD}) ON (n.patientId)`
} as const;

// ============================================================
// PATIENT SCOPE
// ============================================================

/**
 * Remove the patient's previous subgraph. DETACH also removes every
 * relationship touching those nodes.
 */
export const DELETE_PATIENT_SCOPE = `
MATCH (n:${LABELS.RECORD} {patientId: $patientId})
DETACH DELETE n
RETURN count(n) AS deleted
`;

/**
 * Create nodes of one type. The label is interpolated from the closed
 * node type set; everything else is a parameter.
 */
export function createNodesQuery(type: NodeType): string {
  assertKnownLabel(type);
  return `
UNWIND $nodes AS node
CREATE (n:${LABELS.RECORD}:${type} {id: node.id, patientId: $patientId, key: node.key})
SET n += node.properties
RETURN count(n) AS created
`;
}

/**
 * Create edges of one type between nodes written earlier in the same
 * transaction.
 */
export function createEdgesQuery(type: EdgeType): string {
  assertKnownRelType(type);
  return `
UNWIND $edges AS edge
MATCH (a:${LABELS.RECORD} {id: edge.fromId})
MATCH (b:${LABELS.RECORD} {id: edge.toId})
CREATE (a)-[r:${type} {id: edge.id, patientId: $patientId}]->(b)
SET r += edge.properties
RETURN count(r) AS created
`;
}
