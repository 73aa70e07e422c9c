/**
 * Records Mapping Tests
 *
 * Table rows → PatientSnapshot facts.
 */

import { describe, expect, test } from 'vitest';
import { MalformedFactError } from '@/core/errors';
import { synthesize } from '@/core/synthesis';
import { encounterKey, labKey, rowsToSnapshot, toScalar } from '@/providers/records/mapping';
import type { DbRow, PatientRows } from '@/providers/records/types';
import { PATIENT_ID, patientTables } from '@tests/helpers/fixtures';

function rows(): PatientRows {
  const tables = patientTables();
  const table = (name: string): DbRow[] => tables[name] ?? [];
  return {
    patient: table('patient')[0] ?? {},
    history: table('medical_history'),
    medications: table('medication'),
    purposes: table('medication_purpose'),
    appointments: table('appointment'),
    symptoms: table('appointment_symptom'),
    labFindings: table('lab_finding')
  };
}

describe('toScalar', () => {
  test('passes strings, booleans and finite numbers through', () => {
    expect(toScalar('x')).toBe('x');
    expect(toScalar(false)).toBe(false);
    expect(toScalar(7.5)).toBe(7.5);
  });

  test('normalizes the rest', () => {
    expect(toScalar(undefined)).toBeNull();
    expect(toScalar(Number.NaN)).toBeNull();
    expect(toScalar(BigInt(12))).toBe(12);
    expect(toScalar(new Date(Date.UTC(2024, 4, 1)))).toBe('2024-05-01T00:00:00.000Z');
  });
});

describe('natural keys', () => {
  test('encounters are keyed by date and time', () => {
    expect(encounterKey({ appointment_date: '2024-05-01', appointment_time: '09:30:00' })).toBe(
      '2024-05-01 09:30:00'
    );
    expect(encounterKey({ appointment_date: '2024-05-01', appointment_time: null })).toBe('2024-05-01');
  });

  test('labs are keyed by date and test name', () => {
    expect(labKey({ lab_date: '2024-05-01', test_name: 'HbA1c' })).toBe('2024-05-01|HbA1c');
  });

  test('a lab with neither date nor test name has no key', () => {
    expect(labKey({ lab_date: null, test_name: null })).toBe('');
    expect(labKey({ lab_date: null, test_name: 'HbA1c' })).toBe('|HbA1c');
  });

  test('a keyless lab row is rejected by synthesis', () => {
    const input = rows();
    input.labFindings = [{ finding_id: 6, lab_date: null, test_name: null, test_value: '5.1' }];

    const snapshot = rowsToSnapshot(PATIENT_ID, input);
    expect(() => synthesize(snapshot)).toThrow(MalformedFactError);
    expect(() => synthesize(snapshot)).toThrow('labs[0]: missing natural key');
  });
});

describe('rowsToSnapshot', () => {
  const snapshot = rowsToSnapshot(PATIENT_ID, rows());

  test('maps the patient row', () => {
    expect(snapshot.patientId).toBe(1);
    expect(snapshot.patient).toEqual({ name: 'Test Patient', dateOfBirth: '1970-01-01', sex: 'F' });
  });

  test('keeps only condition history types', () => {
    expect(snapshot.conditions.map((fact) => fact.naturalKey)).toEqual(['Type 2 Diabetes', 'Hypertension']);
    expect(snapshot.conditions[1]?.properties).toEqual({
      name: 'Hypertension',
      historyType: 'diagnosis',
      details: null,
      recordedOn: '2021-11-20',
      severity: 'mild',
      active: true
    });
  });

  test('attaches medication purposes as indications', () => {
    expect(snapshot.medications).toHaveLength(1);
    expect(snapshot.medications[0]?.naturalKey).toBe('Metformin');
    expect(snapshot.medications[0]?.indications).toEqual(['type 2 diabetes']);
    expect(snapshot.medications[0]?.properties['continued']).toBe(true);
  });

  test('links symptoms to their appointment key', () => {
    expect(snapshot.encounters.map((fact) => fact.naturalKey)).toEqual(['2024-05-01 09:30:00']);
    expect(snapshot.symptoms[0]?.encounterKey).toBe('2024-05-01 09:30:00');
    expect(snapshot.symptoms[0]?.properties['onset']).toBe('gradual');
  });

  test('maps lab findings', () => {
    expect(snapshot.labs[0]?.naturalKey).toBe('2024-05-01|HbA1c');
    expect(snapshot.labs[0]?.properties['value']).toBe('7.2');
    expect(snapshot.labs[0]?.properties['abnormal']).toBe(true);
  });

  test('symptoms from an unknown appointment have no encounter', () => {
    const input = rows();
    input.symptoms = [{ symptom_id: 1, appointment_id: 999, symptom_name: 'Cough' }];
    expect(rowsToSnapshot(PATIENT_ID, input).symptoms[0]?.encounterKey).toBeNull();
  });

  test('string flags are read as booleans', () => {
    const input = rows();
    input.medications = [{ medication_id: 11, medicine_name: 'Lisinopril', is_continued: 'f' }];
    expect(rowsToSnapshot(PATIENT_ID, input).medications[0]?.properties['continued']).toBe(false);
  });
});
