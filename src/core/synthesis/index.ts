export { assertSubgraphConsistent } from './consistency';
export { edgeId, nodeId, normalizeKey, normalizeName } from './identity';
export {
  createSymptomConditionMap,
  getDefaultSymptomConditionMap,
  loadSymptomConditionMap
} from './symptom-map';
export { type SynthesisOptions, synthesize } from './synthesize';
export * from './types';
