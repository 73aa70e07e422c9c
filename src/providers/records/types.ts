/**
 * Records Source Types
 *
 * Contract for reading one patient's relational records as a snapshot.
 */

import type { PatientSnapshot } from '@/core/synthesis';

export type DbRow = Record<string, unknown>;

/** The slice of a pg Pool (or client) the source needs. */
export interface DbExecutor {
  query(text: string, values?: unknown[]): Promise<{ rows: DbRow[] }>;
}

export interface RecordsSource {
  /** Human-readable location, without credentials */
  readonly location: string;

  /**
   * Read every row for the patient and normalize them into facts.
   *
   * @throws PatientNotFoundError when the patient row does not exist
   * @throws FinalError after exhausting transient retries
   */
  loadPatientSnapshot(patientId: number, options?: { signal?: AbortSignal }): Promise<PatientSnapshot>;

  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Rows for one patient, grouped by table.
 */
export interface PatientRows {
  patient: DbRow;
  history: DbRow[];
  medications: DbRow[];
  purposes: DbRow[];
  appointments: DbRow[];
  symptoms: DbRow[];
  labFindings: DbRow[];
}
