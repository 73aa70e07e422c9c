/**
 * Records Provider Module
 *
 * Relational Extractor: patient rows in PostgreSQL → PatientSnapshot.
 */

export {
  CONDITION_HISTORY_TYPES,
  encounterKey,
  labKey,
  rowsToSnapshot,
  toScalar
} from './mapping';
export {
  createRecordsPool,
  type PostgresRecordsOptions,
  PostgresRecordsSource,
  redactConnectionString
} from './postgres';
export type { DbExecutor, DbRow, PatientRows, RecordsSource } from './types';
