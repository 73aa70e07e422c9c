/**
 * PostgreSQL Records Source
 *
 * Reads a patient's rows from the clinical database and normalizes them
 * into a PatientSnapshot. Every read runs under the records retry policy.
 */

import { Pool } from 'pg';
import { PatientNotFoundError } from '@/core/errors';
import {
  type RandomSource,
  type RetryEvent,
  type RetryPolicy,
  withRetry
} from '@/core/resilience';
import type { PatientSnapshot } from '@/core/synthesis';
import { rowsToSnapshot } from './mapping';
import {
  HEALTH_CHECK,
  SELECT_APPOINTMENT_SYMPTOMS,
  SELECT_APPOINTMENTS,
  SELECT_LAB_FINDINGS,
  SELECT_MEDICAL_HISTORY,
  SELECT_MEDICATION_PURPOSES,
  SELECT_MEDICATIONS,
  SELECT_PATIENT
} from './queries';
import type { DbExecutor, DbRow, PatientRows, RecordsSource } from './types';

export interface PostgresRecordsOptions {
  policy: RetryPolicy;
  random?: RandomSource;
  onRetry?: (event: RetryEvent) => void;
  /** Shown in logs and health output */
  location?: string;
  /** Called by close(); pools pass their own end() */
  onClose?: () => Promise<void>;
}

/**
 * Strip credentials from a connection string for display.
 */
export function redactConnectionString(connectionString: string): string {
  try {
    const url = new URL(connectionString);
    return `${url.protocol}//${url.host}${url.pathname}`;
  } catch {
    return 'postgres';
  }
}

export function createRecordsPool(connectionString: string, poolSize: number): Pool {
  return new Pool({ connectionString, max: poolSize });
}

export class PostgresRecordsSource implements RecordsSource {
  readonly location: string;

  constructor(
    private readonly db: DbExecutor,
    private readonly options: PostgresRecordsOptions
  ) {
    this.location = options.location ?? 'postgres';
  }

  private async select(sql: string, patientId: number): Promise<DbRow[]> {
    const result = await this.db.query(sql, [patientId]);
    return result.rows;
  }

  async loadPatientSnapshot(
    patientId: number,
    { signal }: { signal?: AbortSignal } = {}
  ): Promise<PatientSnapshot> {
    const rows = await withRetry(
      async (): Promise<PatientRows | null> => {
        const [patient] = await this.select(SELECT_PATIENT, patientId);
        if (!patient) return null;

        const [history, medications, purposes, appointments, symptoms, labFindings] =
          await Promise.all([
            this.select(SELECT_MEDICAL_HISTORY, patientId),
            this.select(SELECT_MEDICATIONS, patientId),
            this.select(SELECT_MEDICATION_PURPOSES, patientId),
            this.select(SELECT_APPOINTMENTS, patientId),
            this.select(SELECT_APPOINTMENT_SYMPTOMS, patientId),
            this.select(SELECT_LAB_FINDINGS, patientId)
          ]);
        return { patient, history, medications, purposes, appointments, symptoms, labFindings };
      },
      this.options.policy,
      {
        operationName: `loadPatient(${patientId})`,
        signal,
        random: this.options.random,
        onRetry: this.options.onRetry
      }
    );

    if (!rows) {
      throw new PatientNotFoundError(patientId);
    }
    return rowsToSnapshot(patientId, rows);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.db.query(HEALTH_CHECK);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.options.onClose?.();
  }
}
