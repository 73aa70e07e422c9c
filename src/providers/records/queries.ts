/**
 * Records Query Repository
 *
 * One statement per table, all keyed by patient_id. Dates are selected as
 * text so the driver never shifts them through a local-time Date.
 */

export const SELECT_PATIENT = `
  SELECT patient_id, name, dob::text AS dob, sex
  FROM patient
  WHERE patient_id = $1
`;

export const SELECT_MEDICAL_HISTORY = `
  SELECT history_id, history_type, history_item, history_details,
         history_date::text AS history_date, severity, is_active
  FROM medical_history
  WHERE patient_id = $1
  ORDER BY history_id ASC
`;

export const SELECT_MEDICATIONS = `
  SELECT medication_id, medicine_name, is_continued,
         prescribed_date::text AS prescribed_date,
         discontinued_date::text AS discontinued_date,
         dosage, frequency, prescribed_by
  FROM medication
  WHERE patient_id = $1
  ORDER BY medication_id ASC
`;

export const SELECT_MEDICATION_PURPOSES = `
  SELECT mp.medication_id, mp.condition_name, mp.purpose_description
  FROM medication_purpose mp
  JOIN medication m ON m.medication_id = mp.medication_id
  WHERE m.patient_id = $1
  ORDER BY mp.purpose_id ASC
`;

export const SELECT_APPOINTMENTS = `
  SELECT appointment_id, appointment_date::text AS appointment_date,
         appointment_time::text AS appointment_time,
         status, appointment_type, doctor_name, notes
  FROM appointment
  WHERE patient_id = $1
  ORDER BY appointment_date ASC, appointment_time ASC, appointment_id ASC
`;

export const SELECT_APPOINTMENT_SYMPTOMS = `
  SELECT s.symptom_id, s.appointment_id, s.symptom_name, s.symptom_description,
         s.severity, s.duration, s.onset_type
  FROM appointment_symptom s
  JOIN appointment a ON a.appointment_id = s.appointment_id
  WHERE a.patient_id = $1
  ORDER BY s.symptom_id ASC
`;

export const SELECT_LAB_FINDINGS = `
  SELECT f.finding_id, r.lab_date::text AS lab_date, r.lab_type, r.lab_facility,
         f.test_name, f.test_value, f.test_unit, f.reference_range,
         f.is_abnormal, f.abnormal_flag
  FROM lab_finding f
  JOIN lab_report r ON r.lab_report_id = f.lab_report_id
  WHERE r.patient_id = $1
  ORDER BY r.lab_date ASC, f.finding_id ASC
`;

export const HEALTH_CHECK = 'SELECT 1';
