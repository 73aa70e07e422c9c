/**
 * Records Mapping
 *
 * Pure translation from table rows to a PatientSnapshot.
 */

import type {
  ConditionFact,
  EncounterFact,
  LabFact,
  MedicationFact,
  PatientSnapshot,
  Properties,
  Scalar,
  SymptomFact
} from '@/core/synthesis';
import type { DbRow, PatientRows } from './types';

/** medical_history.history_type values that describe a condition. */
export const CONDITION_HISTORY_TYPES: ReadonlySet<string> = new Set([
  'chronic_condition',
  'acute_condition',
  'condition',
  'diagnosis'
]);

// ═══════════════════════════════════════════════════════════════════════════════
// Column readers
// ═══════════════════════════════════════════════════════════════════════════════

/** Driver value → scalar property. Dates become ISO strings. */
export function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'bigint') return Number(value);
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function text(row: DbRow, column: string): string {
  const value = toScalar(row[column]);
  return value === null ? '' : String(value);
}

function flag(row: DbRow, column: string): boolean | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  return ['1', 'true', 't', 'yes'].includes(String(value).toLowerCase());
}

function pick(row: DbRow, columns: Record<string, string>): Properties {
  const properties: Properties = {};
  for (const [property, column] of Object.entries(columns)) {
    properties[property] = toScalar(row[column]);
  }
  return properties;
}

/** Appointments are identified by when they happened. */
export function encounterKey(row: DbRow): string {
  return `${text(row, 'appointment_date')} ${text(row, 'appointment_time')}`.trim();
}

/** Empty when both parts are missing, so synthesis rejects the fact. */
export function labKey(row: DbRow): string {
  const date = text(row, 'lab_date').trim();
  const testName = text(row, 'test_name').trim();
  if (date === '' && testName === '') return '';
  return `${date}|${testName}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Snapshot
// ═══════════════════════════════════════════════════════════════════════════════

export function rowsToSnapshot(patientId: number, rows: PatientRows): PatientSnapshot {
  const conditions: ConditionFact[] = rows.history
    .filter((row) => CONDITION_HISTORY_TYPES.has(text(row, 'history_type').toLowerCase()))
    .map((row) => ({
      naturalKey: text(row, 'history_item'),
      properties: {
        ...pick(row, {
          name: 'history_item',
          historyType: 'history_type',
          details: 'history_details',
          recordedOn: 'history_date',
          severity: 'severity'
        }),
        active: flag(row, 'is_active')
      }
    }));

  const indications = new Map<string, string[]>();
  for (const row of rows.purposes) {
    const medicationId = text(row, 'medication_id');
    const list = indications.get(medicationId) ?? [];
    list.push(text(row, 'condition_name'));
    indications.set(medicationId, list);
  }

  const medications: MedicationFact[] = rows.medications.map((row) => ({
    naturalKey: text(row, 'medicine_name'),
    properties: {
      ...pick(row, {
        name: 'medicine_name',
        dosage: 'dosage',
        frequency: 'frequency',
        prescribedOn: 'prescribed_date',
        discontinuedOn: 'discontinued_date',
        prescribedBy: 'prescribed_by'
      }),
      continued: flag(row, 'is_continued')
    },
    indications: indications.get(text(row, 'medication_id')) ?? []
  }));

  const encounterKeys = new Map<string, string>();
  const encounters: EncounterFact[] = rows.appointments.map((row) => {
    const key = encounterKey(row);
    encounterKeys.set(text(row, 'appointment_id'), key);
    return {
      naturalKey: key,
      properties: pick(row, {
        date: 'appointment_date',
        time: 'appointment_time',
        status: 'status',
        appointmentType: 'appointment_type',
        doctor: 'doctor_name',
        notes: 'notes'
      })
    };
  });

  const symptoms: SymptomFact[] = rows.symptoms.map((row) => ({
    naturalKey: text(row, 'symptom_name'),
    properties: pick(row, {
      name: 'symptom_name',
      description: 'symptom_description',
      severity: 'severity',
      duration: 'duration',
      onset: 'onset_type'
    }),
    encounterKey: encounterKeys.get(text(row, 'appointment_id')) ?? null
  }));

  const labs: LabFact[] = rows.labFindings.map((row) => ({
    naturalKey: labKey(row),
    properties: {
      ...pick(row, {
        testName: 'test_name',
        value: 'test_value',
        unit: 'test_unit',
        referenceRange: 'reference_range',
        abnormalFlag: 'abnormal_flag',
        labDate: 'lab_date',
        labType: 'lab_type',
        facility: 'lab_facility'
      }),
      abnormal: flag(row, 'is_abnormal')
    }
  }));

  return {
    patientId,
    patient: pick(rows.patient, { name: 'name', dateOfBirth: 'dob', sex: 'sex' }),
    conditions,
    medications,
    encounters,
    symptoms,
    labs
  };
}
