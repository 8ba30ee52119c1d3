import { randomUUID } from 'node:crypto'
import { pool, withTransaction } from '../db/pool.js'
import { raw, sql } from '../db/sql.js'
import { cancerTypeFullName } from './cancerTypeRepo.js'

type PatientRecordRow = {
  id: string
  patient_id: number
  cancer_type_id: number | null
  cancer_type_name: string | null
  cancer_type_parent_id: number | null
  cancer_type_parent_name: string | null
  cancer_stage_text: string
  diagnosis_date: string | null
  stage_grouping: string
  recommended_treatment: string
  vital_status: boolean
  notes: string
  created_at: Date
  updated_at: Date
}

export type PatientRecord = {
  id: string
  patientId: number
  cancerTypeId: number | null
  cancerType: { id: number; name: string; parentId: number | null; fullName: string } | null
  cancerStageText: string
  diagnosisDate: string | null
  stageGrouping: string
  recommendedTreatment: string
  vitalStatus: boolean
  notes: string
  createdAt: Date
  updatedAt: Date
}

const SELECT_RECORD = raw(`
  SELECT r.id, r.patient_id, r.cancer_type_id, c.name AS cancer_type_name, c.parent_id AS cancer_type_parent_id,
         p.name AS cancer_type_parent_name, r.cancer_stage_text, to_char(r.diagnosis_date, 'YYYY-MM-DD') AS diagnosis_date,
         r.stage_grouping, r.recommended_treatment, r.vital_status, r.notes, r.created_at, r.updated_at
  FROM patient_records r
  LEFT JOIN cancer_types c ON c.id = r.cancer_type_id
  LEFT JOIN cancer_types p ON p.id = c.parent_id
`)

function toRecord(row: PatientRecordRow): PatientRecord {
  return {
    id: row.id,
    patientId: row.patient_id,
    cancerTypeId: row.cancer_type_id,
    cancerType:
      row.cancer_type_id !== null && row.cancer_type_name !== null
        ? {
            id: row.cancer_type_id,
            name: row.cancer_type_name,
            parentId: row.cancer_type_parent_id,
            fullName: cancerTypeFullName({ name: row.cancer_type_name, parentName: row.cancer_type_parent_name })
          }
        : null,
    cancerStageText: row.cancer_stage_text,
    diagnosisDate: row.diagnosis_date,
    stageGrouping: row.stage_grouping,
    recommendedTreatment: row.recommended_treatment,
    vitalStatus: row.vital_status,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  }
}

export async function findRecordByPatient(patientId: number) {
  const q = sql`${SELECT_RECORD} WHERE r.patient_id = ${patientId}`
  const res = await pool.query<PatientRecordRow>(q.text, q.values)
  return res.rows[0] ? toRecord(res.rows[0]) : null
}

export type RecordFields = {
  cancerTypeId: number | null
  cancerStageText: string
  diagnosisDate: string | null
  stageGrouping: string
  recommendedTreatment: string
  vitalStatus: boolean
  notes: string
}

/** Insert or replace the single record a patient has. */
export async function upsertRecord(patientId: number, fields: RecordFields) {
  const q = sql`
    INSERT INTO patient_records (id, patient_id, cancer_type_id, cancer_stage_text, diagnosis_date, stage_grouping,
                                 recommended_treatment, vital_status, notes)
    VALUES (${randomUUID()}::uuid, ${patientId}, ${fields.cancerTypeId}, ${fields.cancerStageText},
            ${fields.diagnosisDate}::date, ${fields.stageGrouping}, ${fields.recommendedTreatment},
            ${fields.vitalStatus}, ${fields.notes})
    ON CONFLICT (patient_id) DO UPDATE SET
      cancer_type_id = EXCLUDED.cancer_type_id,
      cancer_stage_text = EXCLUDED.cancer_stage_text,
      diagnosis_date = EXCLUDED.diagnosis_date,
      stage_grouping = EXCLUDED.stage_grouping,
      recommended_treatment = EXCLUDED.recommended_treatment,
      vital_status = EXCLUDED.vital_status,
      notes = EXCLUDED.notes,
      updated_at = now()
  `
  await pool.query(q.text, q.values)
  const record = await findRecordByPatient(patientId)
  if (!record) throw new Error('Patient record upsert returned no row')
  return record
}

export async function countRecords() {
  const res = await pool.query<{ total: number }>('SELECT count(*)::int AS total FROM patient_records')
  return res.rows[0]?.total ?? 0
}

export const REQUEST_STATUSES = ['pending', 'approved', 'rejected'] as const
export type RequestStatus = (typeof REQUEST_STATUSES)[number]

type DoctorRequestRow = {
  id: string
  patient_id: number
  patient_name: string
  patient_email: string
  doctor_id: number
  doctor_name: string
  doctor_specialty: string
  status: RequestStatus
  requested_at: Date
  processed_at: Date | null
  processed_by: number | null
  notes: string
}

export type DoctorAssignmentRequest = {
  id: string
  patientId: number
  patientName: string
  patientEmail: string
  doctorId: number
  doctorName: string
  doctorSpecialty: string
  status: RequestStatus
  requestedAt: Date
  processedAt: Date | null
  processedBy: number | null
  notes: string
}

const SELECT_REQUEST = raw(`
  SELECT d.id, d.patient_id, trim(pt.first_name || ' ' || pt.last_name) AS patient_name, pt.email AS patient_email,
         d.doctor_id, trim(dr.first_name || ' ' || dr.last_name) AS doctor_name, dr.specialty_name AS doctor_specialty,
         d.status, d.requested_at, d.processed_at, d.processed_by, d.notes
  FROM doctor_assignment_requests d
  JOIN users pt ON pt.id = d.patient_id
  JOIN users dr ON dr.id = d.doctor_id
`)

function toRequest(row: DoctorRequestRow): DoctorAssignmentRequest {
  return {
    id: row.id,
    patientId: row.patient_id,
    patientName: row.patient_name,
    patientEmail: row.patient_email,
    doctorId: row.doctor_id,
    doctorName: row.doctor_name,
    doctorSpecialty: row.doctor_specialty,
    status: row.status,
    requestedAt: row.requested_at,
    processedAt: row.processed_at,
    processedBy: row.processed_by,
    notes: row.notes
  }
}

export async function findDoctorRequest(id: string) {
  const q = sql`${SELECT_REQUEST} WHERE d.id = ${id}::uuid`
  const res = await pool.query<DoctorRequestRow>(q.text, q.values)
  return res.rows[0] ? toRequest(res.rows[0]) : null
}

export async function findPendingRequestForPatient(patientId: number) {
  const q = sql`${SELECT_REQUEST} WHERE d.patient_id = ${patientId} AND d.status = 'pending' ORDER BY d.requested_at DESC LIMIT 1`
  const res = await pool.query<DoctorRequestRow>(q.text, q.values)
  return res.rows[0] ? toRequest(res.rows[0]) : null
}

export async function listPendingRequests(limit: number) {
  const q = sql`${SELECT_REQUEST} WHERE d.status = 'pending' ORDER BY d.requested_at DESC LIMIT ${limit}`
  const res = await pool.query<DoctorRequestRow>(q.text, q.values)
  return res.rows.map(toRequest)
}

export async function createDoctorRequest(args: { patientId: number; doctorId: number }) {
  const id = randomUUID()
  const q = sql`
    INSERT INTO doctor_assignment_requests (id, patient_id, doctor_id)
    VALUES (${id}::uuid, ${args.patientId}, ${args.doctorId})
  `
  await pool.query(q.text, q.values)
  const created = await findDoctorRequest(id)
  if (!created) throw new Error('Doctor request insert returned no row')
  return created
}

/**
 * Close a pending request. Approval also assigns the doctor to the patient in
 * the same transaction. Returns null when the request was no longer pending.
 */
export async function processDoctorRequest(args: {
  id: string
  status: Exclude<RequestStatus, 'pending'>
  processedBy: number
  notes: string
}) {
  const updated = await withTransaction(async (client) => {
    const q = sql`
      UPDATE doctor_assignment_requests
      SET status = ${args.status}, processed_at = now(), processed_by = ${args.processedBy}, notes = ${args.notes}
      WHERE id = ${args.id}::uuid AND status = 'pending'
      RETURNING patient_id, doctor_id
    `
    const res = await client.query<{ patient_id: number; doctor_id: number }>(q.text, q.values)
    const row = res.rows[0]
    if (!row) return false
    if (args.status === 'approved') {
      const assign = sql`UPDATE users SET assigned_doctor_id = ${row.doctor_id} WHERE id = ${row.patient_id}`
      await client.query(assign.text, assign.values)
    }
    return true
  })
  return updated ? findDoctorRequest(args.id) : null
}

type ReviewRow = {
  id: string
  patient_record_id: string
  clinician_id: number
  clinician_name: string
  review_date: Date
  notes: string
}

export type ClinicianReview = {
  id: string
  patientRecordId: string
  clinicianId: number
  clinicianName: string
  reviewDate: Date
  notes: string
}

function toReview(row: ReviewRow): ClinicianReview {
  return {
    id: row.id,
    patientRecordId: row.patient_record_id,
    clinicianId: row.clinician_id,
    clinicianName: row.clinician_name,
    reviewDate: row.review_date,
    notes: row.notes
  }
}

export async function addReview(args: { patientRecordId: string; clinicianId: number; notes: string }) {
  const id = randomUUID()
  const q = sql`
    INSERT INTO clinician_reviews (id, patient_record_id, clinician_id, notes)
    VALUES (${id}::uuid, ${args.patientRecordId}::uuid, ${args.clinicianId}, ${args.notes})
    RETURNING id, patient_record_id, clinician_id, '' AS clinician_name, review_date, notes
  `
  const res = await pool.query<ReviewRow>(q.text, q.values)
  const row = res.rows[0]
  if (!row) throw new Error('Review insert returned no row')
  return toReview(row)
}

export async function listReviewsForRecord(patientRecordId: string) {
  const q = sql`
    SELECT r.id, r.patient_record_id, r.clinician_id, trim(u.first_name || ' ' || u.last_name) AS clinician_name,
           r.review_date, r.notes
    FROM clinician_reviews r JOIN users u ON u.id = r.clinician_id
    WHERE r.patient_record_id = ${patientRecordId}::uuid
    ORDER BY r.review_date DESC
  `
  const res = await pool.query<ReviewRow>(q.text, q.values)
  return res.rows.map(toReview)
}

export type PatientFeedback = { id: string; patientId: number; rating: number; comments: string; submittedAt: Date }

export async function createPatientFeedback(args: { patientId: number; rating: number; comments: string }) {
  const q = sql`
    INSERT INTO patient_feedback (id, patient_id, rating, comments)
    VALUES (${randomUUID()}::uuid, ${args.patientId}, ${args.rating}, ${args.comments})
    RETURNING id, patient_id, rating, comments, submitted_at
  `
  const res = await pool.query<{ id: string; patient_id: number; rating: number; comments: string; submitted_at: Date }>(
    q.text,
    q.values
  )
  const row = res.rows[0]
  if (!row) throw new Error('Feedback insert returned no row')
  const feedback: PatientFeedback = {
    id: row.id,
    patientId: row.patient_id,
    rating: row.rating,
    comments: row.comments,
    submittedAt: row.submitted_at
  }
  return feedback
}
