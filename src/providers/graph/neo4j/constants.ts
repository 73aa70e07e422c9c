/**
 * Neo4j Schema Registry
 *
 * Labels, index names and the guards for interpolated identifiers.
 */

import { EDGE_TYPES, NODE_TYPES, type NodeType } from '@/core/synthesis';

// ============================================================
// NODE LABELS
// ============================================================

/**
 * Every synthesized node carries the shared RECORD label plus its own
 * type label, so patient scoping needs one index.
 */
export const LABELS = {
  RECORD: 'ClinicalRecord',
  PATIENT: 'Patient',
  CONDITION: 'Condition',
  MEDICATION: 'Medication',
  SYMPTOM: 'Symptom',
  ENCOUNTER: 'Encounter',
  LAB_RESULT: 'LabResult'
} as const satisfies Record<string, 'ClinicalRecord' | NodeType>;

// ============================================================
// INDEX NAMES
// ============================================================

export const INDEXES = {
  RECORD_ID: 'clinical_record_id_unique',
  RECORD_PATIENT: 'clinical_record_patient_id'
} as const;

// ============================================================
// IDENTIFIER GUARDS
// ============================================================

const NODE_LABELS: ReadonlySet<string> = new Set(NODE_TYPES);
const REL_TYPES: ReadonlySet<string> = new Set(EDGE_TYPES);

/**
 * Labels and relationship types cannot be query parameters; only values
 * from the closed sets are interpolated into Cypher.
 */
export function assertKnownLabel(label: string): void {
  if (!NODE_LABELS.has(label)) throw new Error(`Unknown node label: ${label}`);
}

export function assertKnownRelType(type: string): void {
  if (!REL_TYPES.has(type)) throw new Error(`Unknown relationship type: ${type}`);
}
