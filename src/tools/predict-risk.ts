/**
 * Prediction passthrough tools
 *
 * Validated features are POSTed to the risk model service under the
 * prediction policy; the service's JSON is returned unchanged.
 */

import { withRetry } from '@/core/resilience';
import { defineTool, ok } from '@/core/tools';
import type { PredictionClient } from '@/providers/prediction';
import { toToolFailure } from './failures';
import type { ToolDependencies } from './types';

function binary(description: string) {
  return {
    type: 'integer',
    required: true,
    description,
    constraints: { min: 0, max: 1 }
  } as const;
}

async function passthrough(
  client: PredictionClient,
  features: Record<string, unknown>,
  deps: ToolDependencies,
  signal: AbortSignal
) {
  try {
    const prediction = await withRetry(
      ({ signal: attemptSignal }) => client.predict(features, attemptSignal),
      deps.predictionPolicy,
      {
        operationName: `predict(${client.service})`,
        signal,
        random: deps.random,
        onRetry: deps.onRetry
      }
    );
    return ok(prediction);
  } catch (error) {
    return toToolFailure(error);
  }
}

export function predictDiabetesRiskTool(deps: ToolDependencies) {
  return defineTool({
    name: 'predict_diabetes_risk',
    description:
      'Estimate diabetes risk from clinical features. Returns the model output as-is ' +
      '(probability, risk level, explanation).',
    argumentSchema: {
      age: { type: 'number', required: true, description: 'Age in years', constraints: { min: 0 } },
      gender: {
        type: 'string',
        required: true,
        constraints: { enum: ['Female', 'Male', 'Other'] }
      },
      hypertension: binary('1 if the patient has hypertension'),
      heart_disease: binary('1 if the patient has heart disease'),
      smoking_history: {
        type: 'string',
        required: true,
        constraints: { enum: ['never', 'No Info', 'current', 'former', 'ever', 'not current'] }
      },
      bmi: { type: 'number', required: true, description: 'Body mass index', constraints: { min: 0 } },
      HbA1c_level: { type: 'number', required: true, description: 'HbA1c (%)', constraints: { min: 0 } },
      blood_glucose_level: {
        type: 'integer',
        required: true,
        description: 'Blood glucose (mg/dL)',
        constraints: { min: 0 }
      }
    },
    handler: (args, { signal }) => passthrough(deps.predictions.diabetes, args, deps, signal)
  });
}

export function predictCardiovascularRiskTool(deps: ToolDependencies) {
  return defineTool({
    name: 'predict_cardiovascular_risk',
    description:
      'Estimate cardiovascular disease risk from clinical features. Returns the model ' +
      'output as-is (probability, risk level, explanation).',
    argumentSchema: {
      age: {
        type: 'number',
        required: true,
        description: 'Age in years (values above 150 are read as days)',
        constraints: { min: 0 }
      },
      gender: {
        type: 'integer',
        required: true,
        description: '1 = female, 2 = male',
        constraints: { min: 1, max: 2 }
      },
      height: { type: 'number', required: true, description: 'Height (cm)', constraints: { min: 0 } },
      weight: { type: 'number', required: true, description: 'Weight (kg)', constraints: { min: 0 } },
      ap_hi: { type: 'integer', required: true, description: 'Systolic blood pressure' },
      ap_lo: { type: 'integer', required: true, description: 'Diastolic blood pressure' },
      cholesterol: {
        type: 'integer',
        required: true,
        description: '1 = normal, 2 = above normal, 3 = well above normal',
        constraints: { min: 1, max: 3 }
      },
      gluc: {
        type: 'integer',
        required: true,
        description: '1 = normal, 2 = above normal, 3 = well above normal',
        constraints: { min: 1, max: 3 }
      },
      smoke: binary('1 if the patient smokes'),
      alco: binary('1 if the patient drinks alcohol'),
      active: binary('1 if the patient is physically active')
    },
    handler: (args, { signal }) => passthrough(deps.predictions.cardio, args, deps, signal)
  });
}
