import { z } from 'zod'
import { badRequest, conflict, forbidden, notFound } from '../errors.js'
import { log } from '../logger.js'
import {
  cancerTypeNameTaken,
  createCancerType,
  deleteCancerType,
  findCancerType,
  updateCancerType,
  type CancerType
} from '../repos/cancerTypeRepo.js'
import {
  createDoctorRequest,
  findDoctorRequest,
  findPendingRequestForPatient,
  findRecordByPatient,
  processDoctorRequest,
  upsertRecord,
  type PatientRecord,
  type RecordFields
} from '../repos/medicalRepo.js'
import { createMedicalDocument, medicalDocumentHashExists, type MedicalDocument } from '../repos/medicalDocumentRepo.js'
import { findUserById, type ActivityCounts, type User } from '../repos/userRepo.js'
import { recordCreate, recordDelete, recordUpdate } from './audit.js'
import { fileExtension } from './rag/extract.js'
import { saveUploadThen, sha256 } from './storage/files.js'

export const MEDICAL_DOCUMENT_EXTENSIONS = ['pdf', 'doc', 'docx', 'txt', 'png', 'jpg', 'jpeg'] as const

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']
const DAY_MS = 24 * 60 * 60 * 1000

/** A patient's files are visible to the patient, their clinician and administrators. */
export function canAccessPatient(viewer: User, patient: Pick<User, 'id' | 'assignedDoctorId'>) {
  if (viewer.role === 'administrator') return true
  if (viewer.role === 'patient') return viewer.id === patient.id
  if (viewer.role === 'clinician') return patient.assignedDoctorId === viewer.id
  return false
}

export async function loadPatient(patientId: number) {
  const patient = await findUserById(patientId)
  if (!patient || patient.role !== 'patient') throw notFound('Patient not found.')
  return patient
}

/** The patient, when the clinician is the one assigned to them. */
export async function loadAssignedPatient(clinician: User, patientId: number) {
  const patient = await loadPatient(patientId)
  if (patient.assignedDoctorId !== clinician.id) throw forbidden()
  return patient
}

export function recordAuditState(record: PatientRecord) {
  return {
    cancerTypeId: record.cancerTypeId,
    cancerStageText: record.cancerStageText,
    diagnosisDate: record.diagnosisDate,
    stageGrouping: record.stageGrouping,
    recommendedTreatment: record.recommendedTreatment,
    vitalStatus: record.vitalStatus,
    notes: record.notes
  }
}

export const recordFieldsSchema = z.object({
  cancerTypeId: z.number().int().positive().nullable().default(null),
  cancerStageText: z.string().trim().max(100).default(''),
  diagnosisDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Enter a valid date (YYYY-MM-DD).')
    .nullable()
    .default(null),
  stageGrouping: z.string().trim().max(50).default(''),
  recommendedTreatment: z.string().trim().default(''),
  vitalStatus: z.boolean().default(true),
  notes: z.string().trim().default('')
})

async function requireOrgan(cancerTypeId: number | null, message: string) {
  if (cancerTypeId === null) return null
  const cancerType = await findCancerType(cancerTypeId)
  if (!cancerType) throw badRequest('Selected cancer type does not exist.')
  if (!cancerType.isOrgan) throw badRequest(message)
  return cancerType
}

/**
 * Create or replace the patient's record, auditing it as a create the first
 * time and as an update afterwards.
 */
export async function savePatientRecord(patient: Pick<User, 'id'>, fields: RecordFields) {
  await requireOrgan(fields.cancerTypeId, 'Please select an organ-level cancer type.')
  const before = await findRecordByPatient(patient.id)
  const record = await upsertRecord(patient.id, fields)
  if (before) {
    await recordUpdate('PatientRecord', record.id, recordAuditState(before), recordAuditState(record))
  } else {
    await recordCreate('PatientRecord', record.id, recordAuditState(record))
  }
  return record
}

export type UploadedFile = { originalname: string; buffer: Buffer }

export const medicalUploadFieldsSchema = z.object({
  title: z.string().trim().max(255).optional(),
  documentType: z.string().trim().max(50).optional(),
  description: z.string().trim().optional().default(''),
  patientNotes: z.string().trim().optional().default(''),
  cancerTypeId: z.preprocess(
    (v) => (v === '' || v === undefined || v === null ? null : v),
    z.coerce.number().int().positive().nullable()
  )
})

export type MedicalUploadFields = z.infer<typeof medicalUploadFieldsSchema>

function isMedicalExtension(ext: string) {
  return MEDICAL_DOCUMENT_EXTENSIONS.some((allowed) => allowed === ext)
}

/**
 * Store a document in a patient's file. Identical content uploaded twice for
 * the same patient is rejected.
 */
export async function uploadMedicalDocument(args: {
  uploader: User
  patient: User
  file: UploadedFile
  fields: MedicalUploadFields
}): Promise<MedicalDocument> {
  const { uploader, patient, file, fields } = args
  if (uploader.role === 'patient' || !canAccessPatient(uploader, patient)) throw forbidden()

  const ext = fileExtension(file.originalname)
  if (!isMedicalExtension(ext)) {
    throw badRequest(`Unsupported file extension. Allowed extensions: ${MEDICAL_DOCUMENT_EXTENSIONS.join(', ')}.`)
  }
  await requireOrgan(fields.cancerTypeId, 'Please select an organ-level cancer type.')
  if (await medicalDocumentHashExists(patient.id, sha256(file.buffer))) {
    throw conflict('This document has already been uploaded for this patient.')
  }

  const upload = { area: 'medical_documents', originalName: file.originalname, buffer: file.buffer }
  const { doc, size } = await saveUploadThen(upload, async (stored) => {
    const created = await createMedicalDocument({
      patientId: patient.id,
      title: fields.title || file.originalname.replace(/\.[^.]+$/, ''),
      documentType: fields.documentType || ext.toUpperCase(),
      cancerTypeId: fields.cancerTypeId,
      description: fields.description,
      patientNotes: fields.patientNotes,
      filePath: stored.filePath,
      fileName: stored.fileName,
      fileHash: stored.fileHash,
      uploadedBy: uploader.id
    })
    return { doc: created, size: stored.size }
  })
  await recordCreate('MedicalDocument', doc.id, {
    patientId: doc.patientId,
    title: doc.title,
    documentType: doc.documentType,
    fileName: doc.fileName
  })
  log('info', 'medical.document.uploaded', { documentId: doc.id, patientId: patient.id, size })
  return doc
}

/**
 * Ask for a clinician. Only one open request at a time, and none once a
 * doctor is assigned.
 */
export async function requestDoctor(patient: User, doctorId: number) {
  if (patient.assignedDoctorId !== null) throw conflict('You already have an assigned doctor.')
  if (await findPendingRequestForPatient(patient.id)) {
    throw conflict('You already have a pending doctor request.')
  }
  const doctor = await findUserById(doctorId)
  if (!doctor || doctor.role !== 'clinician' || !doctor.isActive) throw notFound('Clinician not found.')

  const request = await createDoctorRequest({ patientId: patient.id, doctorId: doctor.id })
  await recordCreate('DoctorAssignmentRequest', request.id, { patientId: patient.id, doctorId: doctor.id, status: 'pending' })
  return request
}

export async function decideDoctorRequest(args: {
  admin: User
  requestId: string
  approve: boolean
  notes: string
}) {
  const existing = await findDoctorRequest(args.requestId)
  if (!existing) throw notFound('Doctor request not found.')
  if (existing.status !== 'pending') throw conflict('This request has already been processed.')

  const status = args.approve ? 'approved' : 'rejected'
  const processed = await processDoctorRequest({
    id: existing.id,
    status,
    processedBy: args.admin.id,
    notes: args.notes
  })
  if (!processed) throw conflict('This request has already been processed.')

  await recordUpdate('DoctorAssignmentRequest', existing.id, { status: existing.status }, { status: processed.status })
  if (args.approve) {
    await recordUpdate(
      'User',
      existing.patientId,
      { assignedDoctorId: null },
      { assignedDoctorId: existing.doctorId }
    )
  }
  return processed
}

export const cancerTypeSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().trim().optional().default(''),
  parentId: z.number().int().positive().nullable().optional().default(null)
})

function cancerTypeAuditState(t: Pick<CancerType, 'name' | 'description' | 'parentId'>) {
  return { name: t.name, description: t.description, parentId: t.parentId }
}

async function validateCancerType(args: { name: string; parentId: number | null; excludeId?: number }) {
  if (args.parentId !== null) {
    if (args.parentId === args.excludeId) throw badRequest('A cancer type cannot be its own parent.')
    await requireOrgan(args.parentId, 'Subtypes can only be added under an organ-level cancer type.')
  }
  if (await cancerTypeNameTaken(args)) {
    throw badRequest('A cancer type with this name already exists under the same parent.')
  }
}

export async function addCancerType(input: z.infer<typeof cancerTypeSchema>) {
  await validateCancerType({ name: input.name, parentId: input.parentId })
  const created = await createCancerType(input)
  if (!created) throw new Error('Cancer type insert returned no row')
  await recordCreate('CancerType', created.id, cancerTypeAuditState(created))
  return created
}

export async function editCancerType(id: number, input: z.infer<typeof cancerTypeSchema>) {
  const existing = await findCancerType(id)
  if (!existing) throw notFound('Cancer type not found.')
  if (existing.isOrgan && input.parentId !== null) {
    throw badRequest('An organ-level cancer type cannot be moved under another type.')
  }
  await validateCancerType({ name: input.name, parentId: input.parentId, excludeId: id })
  const updated = await updateCancerType(id, input)
  if (!updated) throw notFound('Cancer type not found.')
  await recordUpdate('CancerType', id, cancerTypeAuditState(existing), cancerTypeAuditState(updated))
  return updated
}

export async function removeCancerType(id: number) {
  const existing = await findCancerType(id)
  if (!existing) throw notFound('Cancer type not found.')
  await deleteCancerType(id)
  await recordDelete('CancerType', id, cancerTypeAuditState(existing))
}

export type ActivityPercentages = { active: number; inactive: number; suspended: number }

/**
 * Share of users per activity bucket to one decimal. Rounding drift is
 * absorbed by the largest bucket so the three always add up to 100.
 */
export function activityPercentages(counts: ActivityCounts): ActivityPercentages {
  if (counts.total === 0) return { active: 0, inactive: 0, suspended: 0 }
  const tenths = {
    active: Math.round((counts.active / counts.total) * 1000),
    inactive: Math.round((counts.inactive / counts.total) * 1000),
    suspended: Math.round((counts.suspended / counts.total) * 1000)
  }
  const drift = 1000 - (tenths.active + tenths.inactive + tenths.suspended)
  if (drift !== 0) {
    const keys = ['active', 'inactive', 'suspended'] as const
    const largest = keys.reduce<(typeof keys)[number]>((best, key) => (tenths[key] > tenths[best] ? key : best), keys[0])
    tenths[largest] += drift
  }
  return { active: tenths.active / 10, inactive: tenths.inactive / 10, suspended: tenths.suspended / 10 }
}

/** `Jan 05` */
export function shortDayLabel(d: Date) {
  return `${MONTHS[d.getUTCMonth()] ?? ''} ${String(d.getUTCDate()).padStart(2, '0')}`
}

/** Oldest-first registrations for the seven UTC days ending today. */
export function registrationTrend(perDay: ReadonlyMap<string, number>, now = new Date()) {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate())
  return Array.from({ length: 7 }, (_, i) => {
    const day = new Date(today - (6 - i) * DAY_MS)
    const key = day.toISOString().slice(0, 10)
    return { date: key, label: shortDayLabel(day), count: perDay.get(key) ?? 0 }
  })
}

export function trendStart(now = new Date()) {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()) - 6 * DAY_MS)
}
