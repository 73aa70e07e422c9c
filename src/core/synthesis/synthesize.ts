/**
 * Graph Synthesizer
 *
 * Pure transformation from a PatientSnapshot to a Subgraph. Node ids are
 * derived from (patientId, type, naturalKey) and edge ids from
 * (fromId, type, toId), so identical input always yields identical output.
 *
 * Edge rules:
 * - Patient -HAS_CONDITION-> Condition
 * - Patient -TAKES_MEDICATION-> Medication
 * - Patient -HAS_SYMPTOM-> Symptom
 * - Patient -HAD_ENCOUNTER-> Encounter
 * - Patient -HAS_LAB_RESULT-> LabResult
 * - Encounter -RECORDED_SYMPTOM-> Symptom (symptom names its encounter)
 * - Medication -TREATS-> Condition (indication matches a patient condition)
 * - Symptom -MAY_INDICATE-> Condition (curated map matches a patient condition)
 */

import { MalformedFactError } from '../errors';
import { assertSubgraphConsistent } from './consistency';
import { edgeId, nodeId, normalizeKey, normalizeName } from './identity';
import { getDefaultSymptomConditionMap } from './symptom-map';
import type {
  EdgeType,
  Fact,
  GraphEdge,
  GraphNode,
  NodeType,
  PatientSnapshot,
  Properties,
  Subgraph,
  SymptomConditionMap
} from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// Builder
// ═══════════════════════════════════════════════════════════════════════════════

function byId(a: { id: string }, b: { id: string }): number {
  if (a.id < b.id) return -1;
  if (a.id > b.id) return 1;
  return 0;
}

/**
 * Accumulates nodes and edges for one patient, merging duplicates by id.
 */
class SubgraphBuilder {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edges = new Map<string, GraphEdge>();

  constructor(private readonly patientId: number) {}

  idFor(type: NodeType, normalizedKey: string): string {
    return nodeId(this.patientId, type, normalizedKey);
  }

  /**
   * Add a node, or merge into an existing one: the first occurrence wins,
   * later occurrences only fill properties that are null or absent.
   */
  addNode(type: NodeType, normalizedKey: string, properties: Properties): string {
    const id = this.idFor(type, normalizedKey);
    const existing = this.nodes.get(id);

    if (!existing) {
      this.nodes.set(id, { id, type, key: normalizedKey, properties: { ...properties } });
      return id;
    }

    for (const [name, value] of Object.entries(properties)) {
      const current = existing.properties[name];
      if (current === undefined || current === null) {
        existing.properties[name] = value;
      }
    }
    return id;
  }

  addEdge(fromId: string, type: EdgeType, toId: string, properties: Properties = {}): void {
    const id = edgeId(fromId, type, toId);
    if (!this.edges.has(id)) {
      this.edges.set(id, { id, fromId, toId, type, properties });
    }
  }

  build(): Subgraph {
    return {
      patientId: this.patientId,
      nodes: [...this.nodes.values()].sort(byId),
      edges: [...this.edges.values()].sort(byId)
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Synthesis
// ═══════════════════════════════════════════════════════════════════════════════

export interface SynthesisOptions {
  /** Defaults to the curated map in data/symptom-conditions.json */
  symptomMap?: SymptomConditionMap;
}

function requireKey(type: NodeType, collection: string, fact: Fact, index: number): string {
  if (typeof fact.naturalKey !== 'string' || fact.naturalKey.trim() === '') {
    throw new MalformedFactError(collection, index, 'missing natural key');
  }
  return normalizeKey(type, fact.naturalKey);
}

/**
 * Synthesize the subgraph for one patient.
 *
 * @throws MalformedFactError when a fact has no natural key or patientId is invalid
 * @throws DanglingEdgeError when a symptom names an encounter that is not in the snapshot
 */
export function synthesize(snapshot: PatientSnapshot, options: SynthesisOptions = {}): Subgraph {
  const { patientId } = snapshot;
  if (!Number.isInteger(patientId) || patientId < 1) {
    throw new MalformedFactError(
      'patient',
      0,
      `patientId must be a positive integer, got ${String(patientId)}`
    );
  }

  const symptomMap = options.symptomMap ?? getDefaultSymptomConditionMap();
  const graph = new SubgraphBuilder(patientId);
  const patientNode = graph.addNode('Patient', String(patientId), snapshot.patient);

  // Conditions first: TREATS and MAY_INDICATE resolve against them
  const conditionIds = new Map<string, string>();
  snapshot.conditions.forEach((fact, index) => {
    const key = requireKey('Condition', 'conditions', fact, index);
    const id = graph.addNode('Condition', key, fact.properties);
    conditionIds.set(key, id);
    graph.addEdge(patientNode, 'HAS_CONDITION', id);
  });

  snapshot.medications.forEach((fact, index) => {
    const key = requireKey('Medication', 'medications', fact, index);
    const id = graph.addNode('Medication', key, fact.properties);
    graph.addEdge(patientNode, 'TAKES_MEDICATION', id);

    for (const indication of fact.indications) {
      const conditionId = conditionIds.get(normalizeName(indication));
      if (conditionId) graph.addEdge(id, 'TREATS', conditionId);
    }
  });

  snapshot.encounters.forEach((fact, index) => {
    const key = requireKey('Encounter', 'encounters', fact, index);
    const id = graph.addNode('Encounter', key, fact.properties);
    graph.addEdge(patientNode, 'HAD_ENCOUNTER', id);
  });

  snapshot.symptoms.forEach((fact, index) => {
    const key = requireKey('Symptom', 'symptoms', fact, index);
    const id = graph.addNode('Symptom', key, fact.properties);
    graph.addEdge(patientNode, 'HAS_SYMPTOM', id);

    if (fact.encounterKey !== null) {
      // Unknown encounter leaves this edge dangling; the consistency check rejects it
      const encounterId = graph.idFor('Encounter', normalizeKey('Encounter', fact.encounterKey));
      graph.addEdge(encounterId, 'RECORDED_SYMPTOM', id);
    }

    for (const condition of symptomMap.get(key) ?? []) {
      const conditionId = conditionIds.get(condition);
      if (conditionId) graph.addEdge(id, 'MAY_INDICATE', conditionId);
    }
  });

  snapshot.labs.forEach((fact, index) => {
    const key = requireKey('LabResult', 'labs', fact, index);
    const id = graph.addNode('LabResult', key, fact.properties);
    graph.addEdge(patientNode, 'HAS_LAB_RESULT', id);
  });

  const subgraph = graph.build();
  assertSubgraphConsistent(subgraph);
  return subgraph;
}
