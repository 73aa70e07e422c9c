/**
 * Synthesis Types
 *
 * Relational facts in, typed property graph out.
 */

// ============================================================
// FACTS
// ============================================================

export type Scalar = string | number | boolean | null;
export type Properties = Record<string, Scalar>;

/**
 * A single relational fact. `naturalKey` identifies it within its type
 * for one patient; it is what the node ID is derived from.
 */
export interface Fact {
  naturalKey: string;
  properties: Properties;
}

export type ConditionFact = Fact;

export interface MedicationFact extends Fact {
  /** Condition names this medication was prescribed for */
  indications: string[];
}

export type EncounterFact = Fact;

export interface SymptomFact extends Fact {
  /** Natural key of the encounter where the symptom was recorded */
  encounterKey: string | null;
}

export type LabFact = Fact;

/**
 * Everything known about one patient, normalized from the relational store.
 * Lives only for the duration of one synthesis.
 */
export interface PatientSnapshot {
  patientId: number;
  /** Demographics */
  patient: Properties;
  conditions: ConditionFact[];
  medications: MedicationFact[];
  encounters: EncounterFact[];
  symptoms: SymptomFact[];
  labs: LabFact[];
}

// ============================================================
// GRAPH
// ============================================================

export const NODE_TYPES = [
  'Patient',
  'Condition',
  'Medication',
  'Symptom',
  'Encounter',
  'LabResult'
] as const;
export type NodeType = (typeof NODE_TYPES)[number];

export const EDGE_TYPES = [
  'HAS_CONDITION',
  'TAKES_MEDICATION',
  'HAS_SYMPTOM',
  'HAD_ENCOUNTER',
  'HAS_LAB_RESULT',
  'RECORDED_SYMPTOM',
  'TREATS',
  'MAY_INDICATE'
] as const;
export type EdgeType = (typeof EDGE_TYPES)[number];

export interface GraphNode {
  id: string;
  type: NodeType;
  /** Normalized natural key the id was derived from */
  key: string;
  properties: Properties;
}

export interface GraphEdge {
  id: string;
  fromId: string;
  toId: string;
  type: EdgeType;
  properties: Properties;
}

/**
 * Complete node/edge set for one patient from one synthesis pass.
 * Nodes and edges are sorted by id.
 */
export interface Subgraph {
  patientId: number;
  nodes: GraphNode[];
  edges: GraphEdge[];
}

/** Normalized symptom name to the condition names it may indicate. */
export type SymptomConditionMap = ReadonlyMap<string, readonly string[]>;
