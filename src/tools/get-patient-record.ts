import { defineTool, ok } from '@/core/tools';
import { toToolFailure } from './failures';
import type { ToolDependencies } from './types';

export function getPatientRecordTool(deps: ToolDependencies) {
  return defineTool({
    name: 'get_patient_record',
    description:
      "Fetch a patient's normalized medical record: demographics, conditions, " +
      'medications with their indications, appointments, symptoms and lab results.',
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
        return ok(await deps.records.loadPatientSnapshot(patientId, { signal }));
      } catch (error) {
        return toToolFailure(error);
      }
    }
  });
}
