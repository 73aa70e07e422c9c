/**
 * Built-in Tools
 *
 * Registers every built-in tool, then any extra descriptors (remote tools
 * from discovery), and seals the registry.
 */

import { type ArgumentSchema, type ToolDescriptor, ToolRegistry } from '@/core/tools';
import { buildPatientGraphTool } from './build-patient-graph';
import { getPatientRecordTool } from './get-patient-record';
import { predictCardiovascularRiskTool, predictDiabetesRiskTool } from './predict-risk';
import { queryKnowledgeGraphTool } from './query-knowledge-graph';
import type { ToolDependencies } from './types';

export function createToolRegistry(
  deps: ToolDependencies,
  extra: readonly ToolDescriptor<ArgumentSchema>[] = []
): ToolRegistry {
  const registry = new ToolRegistry();

  registry.register(buildPatientGraphTool(deps));
  registry.register(queryKnowledgeGraphTool(deps));
  registry.register(getPatientRecordTool(deps));
  registry.register(predictDiabetesRiskTool(deps));
  registry.register(predictCardiovascularRiskTool(deps));

  for (const descriptor of extra) {
    registry.register(descriptor);
  }

  registry.seal();
  return registry;
}

export { buildPatientGraphTool } from './build-patient-graph';
export { toToolFailure } from './failures';
export { getPatientRecordTool } from './get-patient-record';
export { predictCardiovascularRiskTool, predictDiabetesRiskTool } from './predict-risk';
export { checkQueryComplexity, queryKnowledgeGraphTool } from './query-knowledge-graph';
export type { GraphQueryLimits, ToolDependencies } from './types';
