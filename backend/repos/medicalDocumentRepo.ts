import { randomUUID } from 'node:crypto'
import { pool } from '../db/pool.js'
import { paginate, type Page } from '../db/pagination.js'
import { raw, sql } from '../db/sql.js'

type MedicalDocumentRow = {
  id: string
  patient_id: number
  title: string
  document_type: string
  cancer_type_id: number | null
  description: string
  patient_notes: string
  file_path: string
  file_name: string
  file_hash: string
  uploaded_by: number | null
  uploaded_at: Date
}

export type MedicalDocument = {
  id: string
  patientId: number
  title: string
  documentType: string
  cancerTypeId: number | null
  description: string
  patientNotes: string
  filePath: string
  fileName: string
  fileHash: string
  uploadedBy: number | null
  uploadedAt: Date
}

const COLUMNS = raw(`
  id, patient_id, title, document_type, cancer_type_id, description, patient_notes, file_path, file_name,
  file_hash, uploaded_by, uploaded_at
`)

function toDocument(row: MedicalDocumentRow): MedicalDocument {
  return {
    id: row.id,
    patientId: row.patient_id,
    title: row.title,
    documentType: row.document_type,
    cancerTypeId: row.cancer_type_id,
    description: row.description,
    patientNotes: row.patient_notes,
    filePath: row.file_path,
    fileName: row.file_name,
    fileHash: row.file_hash,
    uploadedBy: row.uploaded_by,
    uploadedAt: row.uploaded_at
  }
}

export async function findMedicalDocument(id: string) {
  const q = sql`SELECT ${COLUMNS} FROM medical_documents WHERE id = ${id}::uuid`
  const res = await pool.query<MedicalDocumentRow>(q.text, q.values)
  return res.rows[0] ? toDocument(res.rows[0]) : null
}

export async function recentMedicalDocuments(patientId: number, limit: number) {
  const q = sql`
    SELECT ${COLUMNS} FROM medical_documents
    WHERE patient_id = ${patientId}
    ORDER BY uploaded_at DESC, id DESC
    LIMIT ${limit}
  `
  const res = await pool.query<MedicalDocumentRow>(q.text, q.values)
  return res.rows.map(toDocument)
}

export async function listMedicalDocuments(args: {
  patientId: number
  page?: unknown
  pageSize: number
}): Promise<Page<MedicalDocument>> {
  const countQ = sql`SELECT count(*)::int AS total FROM medical_documents WHERE patient_id = ${args.patientId}`
  const countRes = await pool.query<{ total: number }>(countQ.text, countQ.values)
  const pagination = paginate(countRes.rows[0]?.total ?? 0, args.page, args.pageSize)

  const q = sql`
    SELECT ${COLUMNS} FROM medical_documents
    WHERE patient_id = ${args.patientId}
    ORDER BY uploaded_at DESC, id DESC
    LIMIT ${pagination.pageSize} OFFSET ${pagination.offset}
  `
  const res = await pool.query<MedicalDocumentRow>(q.text, q.values)
  return { items: res.rows.map(toDocument), pagination }
}

export async function medicalDocumentHashExists(patientId: number, fileHash: string) {
  const q = sql`SELECT 1 FROM medical_documents WHERE patient_id = ${patientId} AND file_hash = ${fileHash}`
  const res = await pool.query(q.text, q.values)
  return (res.rowCount ?? 0) > 0
}

export async function createMedicalDocument(args: Omit<MedicalDocument, 'id' | 'uploadedAt'>) {
  const q = sql`
    INSERT INTO medical_documents (id, patient_id, title, document_type, cancer_type_id, description, patient_notes,
                                   file_path, file_name, file_hash, uploaded_by)
    VALUES (${randomUUID()}::uuid, ${args.patientId}, ${args.title}, ${args.documentType}, ${args.cancerTypeId},
            ${args.description}, ${args.patientNotes}, ${args.filePath}, ${args.fileName}, ${args.fileHash},
            ${args.uploadedBy})
    RETURNING ${COLUMNS}
  `
  const res = await pool.query<MedicalDocumentRow>(q.text, q.values)
  const row = res.rows[0]
  if (!row) throw new Error('Medical document insert returned no row')
  return toDocument(row)
}

export async function countMedicalDocuments() {
  const res = await pool.query<{ total: number }>('SELECT count(*)::int AS total FROM medical_documents')
  return res.rows[0]?.total ?? 0
}
