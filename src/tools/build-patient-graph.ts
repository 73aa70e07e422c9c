/**
 * build_patient_graph
 *
 * Relational Extractor → Graph Synthesizer → Graph Store Adapter for one
 * patient. Re-running it for unchanged records leaves the graph unchanged.
 */

import { defineTool, ok } from '@/core/tools';
import { synthesize } from '@/core/synthesis';
import { logGraphRebuild } from '@/utils/logger';
import { toToolFailure } from './failures';
import type { ToolDependencies } from './types';

export function buildPatientGraphTool(deps: ToolDependencies) {
  return defineTool({
    name: 'build_patient_graph',
    description:
      "Rebuild a patient's knowledge graph from their medical records (conditions, " +
      'medications, appointments, symptoms, lab results). Run this before querying ' +
      'the graph for a patient.',
    argumentSchema: {
      patientId: {
        type: 'integer',
        required: true,
        description: 'Patient identifier',
        constraints: { min: 1 }
      }
    },
    async handler({ patientId }, { signal }) {
      try {
        const snapshot = await deps.records.loadPatientSnapshot(patientId, { signal });
        const subgraph = synthesize(snapshot, { symptomMap: deps.symptomMap });
        const result = await deps.graphStore.replacePatientSubgraph(patientId, subgraph, {
          signal
        });
        logGraphRebuild(patientId, result);
        return ok({
          patientId,
          nodesWritten: result.nodesWritten,
          edgesWritten: result.edgesWritten
        });
      } catch (error) {
        return toToolFailure(error);
      }
    }
  });
}
