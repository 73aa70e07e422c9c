/**
 * Deterministic identifiers for synthesized nodes and edges.
 */

import { createHash } from 'node:crypto';
import type { EdgeType, NodeType } from './types';

/** Types keyed by a free-text name rather than a structured key. */
const NAME_KEYED: ReadonlySet<NodeType> = new Set(['Condition', 'Medication', 'Symptom']);

function hash(parts: readonly string[]): string {
  // NUL separator: cannot appear in any part, so ("a","bc") and ("ab","c") differ
  return createHash('sha256').update(parts.join('\u0000')).digest('hex');
}

/**
 * Collapse whitespace and trim. Name-keyed types are also lower-cased,
 * so "Type 2 Diabetes" and "type 2  diabetes" land on the same node.
 */
export function normalizeKey(type: NodeType, key: string): string {
  const collapsed = key.replace(/\s+/g, ' ').trim();
  return NAME_KEYED.has(type) ? collapsed.toLowerCase() : collapsed;
}

/** Lower-cased, whitespace-collapsed name for map lookups. */
export function normalizeName(name: string): string {
  return name.replace(/\s+/g, ' ').trim().toLowerCase();
}

export function nodeId(patientId: number, type: NodeType, normalizedKey: string): string {
  return hash([String(patientId), type, normalizedKey]);
}

export function edgeId(fromId: string, type: EdgeType, toId: string): string {
  return hash([fromId, type, toId]);
}
