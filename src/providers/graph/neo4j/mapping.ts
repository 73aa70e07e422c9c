/**
 * Neo4j Record Mapping
 *
 * Converts driver values (Integer, Node, Relationship, Path, temporal
 * types) into plain JSON values before they leave the provider.
 *
 * Note: "record" here is the driver's result record, not a clinical record.
 */

import {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isPath,
  isPoint,
  isRelationship,
  isTime,
  type Record as Neo4jRecord
} from 'neo4j-driver';
import type { QueryRow } from '../types';

// ============================================================
// VALUE TRANSLATORS
// ============================================================

function isTemporal(value: unknown): boolean {
  return (
    isDate(value) ||
    isDateTime(value) ||
    isLocalDateTime(value) ||
    isTime(value) ||
    isLocalTime(value) ||
    isDuration(value)
  );
}

function mapProperties(properties: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    out[key] = toPlainValue(value);
  }
  return out;
}

/**
 * Convert one driver value to a plain value.
 *
 * Integers outside the safe range become strings rather than losing precision.
 */
export function toPlainValue(value: unknown): unknown {
  if (value === null || value === undefined) return null;

  if (isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }
  if (isNode(value)) {
    return { labels: [...value.labels], properties: mapProperties(value.properties) };
  }
  if (isRelationship(value)) {
    return { type: value.type, properties: mapProperties(value.properties) };
  }
  if (isPath(value)) {
    return {
      start: toPlainValue(value.start),
      end: toPlainValue(value.end),
      segments: value.segments.map((segment) => ({
        start: toPlainValue(segment.start),
        relationship: toPlainValue(segment.relationship),
        end: toPlainValue(segment.end)
      }))
    };
  }
  if (isTemporal(value) || isPoint(value)) {
    return String(value);
  }
  if (Array.isArray(value)) {
    return value.map(toPlainValue);
  }
  if (typeof value === 'object') {
    return mapProperties({ ...value });
  }
  return value;
}

/**
 * Convert a result record to a row keyed by the query's return aliases.
 */
export function recordToRow(record: Neo4jRecord): QueryRow {
  const row: QueryRow = {};
  for (const key of record.keys) {
    row[String(key)] = toPlainValue(record.get(key));
  }
  return row;
}

/**
 * Read a count column from a single-row write result.
 */
export function readCount(records: readonly Neo4jRecord[], key: string): number {
  const first = records[0];
  if (!first) return 0;
  const value = toPlainValue(first.get(key));
  return typeof value === 'number' ? value : 0;
}
