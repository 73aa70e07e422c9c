/**
 * Test Fixtures
 *
 * One made-up patient, as table rows and as a normalized snapshot.
 */

import { createSymptomConditionMap, type PatientSnapshot } from '@/core/synthesis';
import type { DbRow } from '@/providers/records/types';

export const PATIENT_ID = 1;

/**
 * Rows for patient 1, keyed by table name (see FakeDb).
 *
 * Expected subgraph: 7 nodes (patient, 2 conditions, 1 medication,
 * 1 encounter, 1 symptom, 1 lab) and 10 edges with TEST_SYMPTOM_MAP.
 */
export function patientTables(): Record<string, DbRow[]> {
  return {
    patient: [{ patient_id: 1, name: 'Test Patient', dob: '1970-01-01', sex: 'F' }],
    medical_history: [
      {
        history_id: 1,
        history_type: 'chronic_condition',
        history_item: 'Type 2 Diabetes',
        history_details: 'Diet and medication',
        history_date: '2020-03-01',
        severity: 'moderate',
        is_active: true
      },
      {
        history_id: 2,
        history_type: 'surgery',
        history_item: 'Appendectomy',
        history_details: null,
        history_date: '2001-07-15',
        severity: null,
        is_active: false
      },
      {
        history_id: 3,
        history_type: 'diagnosis',
        history_item: 'Hypertension',
        history_details: null,
        history_date: '2021-11-20',
        severity: 'mild',
        is_active: 1
      }
    ],
    medication: [
      {
        medication_id: 10,
        medicine_name: 'Metformin',
        is_continued: true,
        prescribed_date: '2020-03-02',
        discontinued_date: null,
        dosage: '500 mg',
        frequency: 'twice daily',
        prescribed_by: 'Dr. Example'
      }
    ],
    medication_purpose: [
      { medication_id: 10, condition_name: 'type 2 diabetes', purpose_description: 'Glucose control' }
    ],
    appointment: [
      {
        appointment_id: 100,
        appointment_date: '2024-05-01',
        appointment_time: '09:30:00',
        status: 'completed',
        appointment_type: 'follow-up',
        doctor_name: 'Dr. Example',
        notes: null
      }
    ],
    appointment_symptom: [
      {
        symptom_id: 1000,
        appointment_id: 100,
        symptom_name: 'Blurred Vision',
        symptom_description: 'Worse in the evening',
        severity: 'mild',
        duration: '2 weeks',
        onset_type: 'gradual'
      }
    ],
    lab_finding: [
      {
        finding_id: 5,
        lab_date: '2024-05-01',
        lab_type: 'blood',
        lab_facility: 'Main Lab',
        test_name: 'HbA1c',
        test_value: '7.2',
        test_unit: '%',
        reference_range: '4.0-5.6',
        is_abnormal: true,
        abnormal_flag: 'H'
      }
    ]
  };
}

export const TEST_SYMPTOM_MAP = createSymptomConditionMap({
  'blurred vision': ['type 2 diabetes', 'hypertension', 'glaucoma'],
  headache: ['hypertension', 'migraine']
});

/**
 * Minimal valid snapshot; pass overrides per test.
 */
export function createSnapshot(overrides: Partial<PatientSnapshot> = {}): PatientSnapshot {
  return {
    patientId: PATIENT_ID,
    patient: { name: 'Test Patient', dateOfBirth: '1970-01-01', sex: 'F' },
    conditions: [],
    medications: [],
    encounters: [],
    symptoms: [],
    labs: [],
    ...overrides
  };
}
