/**
 * Curated symptom → condition associations used for MAY_INDICATE edges.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { normalizeName } from './identity';
import type { SymptomConditionMap } from './types';

const DEFAULT_MAP_URL = new URL('../../../data/symptom-conditions.json', import.meta.url);

const mapFileSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

/**
 * Build a lookup from plain entries. Names are normalized on both sides.
 */
export function createSymptomConditionMap(
  entries: Record<string, readonly string[]>
): SymptomConditionMap {
  const map = new Map<string, string[]>();
  for (const [symptom, conditions] of Object.entries(entries)) {
    const key = normalizeName(symptom);
    const merged = new Set([...(map.get(key) ?? []), ...conditions.map(normalizeName)]);
    map.set(key, [...merged]);
  }
  return map;
}

export function loadSymptomConditionMap(url: URL = DEFAULT_MAP_URL): SymptomConditionMap {
  const parsed = mapFileSchema.parse(JSON.parse(readFileSync(url, 'utf-8')));
  return createSymptomConditionMap(parsed);
}

let defaultMap: SymptomConditionMap | null = null;

/** Lazily loaded map from data/symptom-conditions.json. */
export function getDefaultSymptomConditionMap(): SymptomConditionMap {
  if (!defaultMap) {
    defaultMap = loadSymptomConditionMap();
  }
  return defaultMap;
}
