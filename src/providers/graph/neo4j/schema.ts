/**
 * Neo4j Schema Management
 *
 * Creates the record id constraint and the patient scoping index.
 * Idempotent - safe to run on every startup.
 */

import type { Session } from 'neo4j-driver';
import { isSchemaAlreadyExistsError } from './errors';
import { CONSTRAINTS, RANGE_INDEXES } from './queries';

// ============================================================
// SCHEMA INITIALIZATION
// ============================================================

/**
 * Initialize all database schema elements.
 *
 * Constraints run first because they create implicit indexes.
 */
export async function initializeSchema(session: Session): Promise<void> {
  await runSchemaOperation(session, CONSTRAINTS.RECORD_ID);
  await runSchemaOperation(session, RANGE_INDEXES.RECORD_PATIENT);
}

/**
 * Run a single schema operation. Another instance starting at the same
 * time may have created the element already.
 */
async function runSchemaOperation(session: Session, cypher: string): Promise<void> {
  try {
    await session.run(cypher);
  } catch (error) {
    if (isSchemaAlreadyExistsError(error)) {
      return;
    }
    throw error;
  }
}
