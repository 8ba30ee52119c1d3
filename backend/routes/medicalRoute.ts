import { Router, type Request } from 'express'
import { z } from 'zod'
import { badRequest, forbidden, notFound } from '../errors.js'
import { log } from '../logger.js'
import { authUser, requireAuth, requireRole } from '../middleware/auth.js'
import { requestIdOf } from '../middleware/requestContext.js'
import { singleFile } from '../middleware/upload.js'
import { findCancerType, listCancerTypes, listSubtypes } from '../repos/cancerTypeRepo.js'
import { recentActiveSessions } from '../repos/chatRepo.js'
import {
  addReview,
  createPatientFeedback,
  findPendingRequestForPatient,
  findRecordByPatient,
  listReviewsForRecord
} from '../repos/medicalRepo.js'
import { findMedicalDocument, listMedicalDocuments, recentMedicalDocuments } from '../repos/medicalDocumentRepo.js'
import { findUserById, listPatientsOfDoctor, searchClinicians, toPublicUser } from '../repos/userRepo.js'
import { recordCreate } from '../services/audit.js'
import {
  canAccessPatient,
  loadAssignedPatient,
  loadPatient,
  medicalUploadFieldsSchema,
  recordFieldsSchema,
  requestDoctor,
  savePatientRecord,
  uploadMedicalDocument
} from '../services/medical.js'
import { resolveMediaPath } from '../services/storage/files.js'
import { intParam, queryString, respond, route, uuidParam } from './handler.js'

const PATIENT_DOCUMENTS_PAGE_SIZE = 10
const DOCTOR_SEARCH_PAGE_SIZE = 5
const CLINICIAN_PATIENTS_PAGE_SIZE = 10

/**
 * Patient, clinician and shared medical endpoints, mounted at
 * /api/v1/medical. Administrator screens live in medicalAdminRoute.
 */
const router = Router()

router.use(requireAuth)

const patientOnly = requireRole('patient')
const clinicianOnly = requireRole('clinician')

router.get(
  '/patient/dashboard',
  patientOnly,
  route('medical.patient.dashboard', async (req, res) => {
    const patient = authUser(req)
    const [record, doctor, documents, sessions, pendingRequest] = await Promise.all([
      findRecordByPatient(patient.id),
      patient.assignedDoctorId === null ? Promise.resolve(null) : findUserById(patient.assignedDoctorId),
      recentMedicalDocuments(patient.id, 5),
      recentActiveSessions(patient.id, 3),
      patient.assignedDoctorId === null ? findPendingRequestForPatient(patient.id) : Promise.resolve(null)
    ])
    res.json({
      patient: toPublicUser(patient),
      record,
      doctor: doctor ? toPublicUser(doctor) : null,
      documents,
      recentSessions: sessions,
      pendingRequest
    })
  })
)

router.get(
  '/patient/record',
  patientOnly,
  route('medical.patient.record', async (req, res) => {
    const record = await findRecordByPatient(authUser(req).id)
    const reviews = record ? await listReviewsForRecord(record.id) : []
    res.json({ record, reviews })
  })
)

router.get(
  '/patient/documents',
  patientOnly,
  route('medical.patient.documents', async (req, res) => {
    const page = await listMedicalDocuments({
      patientId: authUser(req).id,
      page: req.query.page,
      pageSize: PATIENT_DOCUMENTS_PAGE_SIZE
    })
    res.json({ documents: page.items, pagination: page.pagination })
  })
)

router.get(
  '/patient/documents/:id',
  patientOnly,
  route('medical.patient.document', async (req, res) => {
    const doc = await findMedicalDocument(uuidParam(req, 'id'))
    if (!doc) throw notFound('Document not found.')
    if (doc.patientId !== authUser(req).id) throw forbidden()
    res.json({ document: doc })
  })
)

const patientFeedbackSchema = z.object({
  rating: z.number().int().min(1).max(5),
  comments: z.string().trim().max(2000).optional().default('')
})

router.post(
  '/patient/feedback',
  patientOnly,
  route('medical.patient.feedback', async (req, res) => {
    const patient = authUser(req)
    const body = patientFeedbackSchema.parse(req.body)
    const feedback = await createPatientFeedback({ patientId: patient.id, ...body })
    await recordCreate('PatientFeedback', feedback.id, { rating: feedback.rating, comments: feedback.comments })
    respond(req, res, { status: 'success', feedback }, { status: 201, notice: 'Thank you for your feedback!' })
  })
)

router.get(
  '/patient/doctors',
  patientOnly,
  route('medical.patient.doctor_search', async (req, res) => {
    const q = queryString(req, 'q')
    const page = await searchClinicians({ q: q || undefined, page: req.query.page, pageSize: DOCTOR_SEARCH_PAGE_SIZE })
    res.json({ doctors: page.items.map(toPublicUser), pagination: page.pagination, q })
  })
)

router.post(
  '/patient/doctors/:id/request',
  patientOnly,
  route('medical.patient.request_doctor', async (req, res) => {
    const request = await requestDoctor(authUser(req), intParam(req, 'id'))
    log('info', 'medical.doctor_request.created', { requestId: requestIdOf(res), doctorRequestId: request.id })
    respond(
      req,
      res,
      { status: 'success', request },
      { status: 201, notice: 'Your request has been sent to the administrator.', trigger: 'doctorRequested' }
    )
  })
)

router.get(
  '/clinician/dashboard',
  clinicianOnly,
  route('medical.clinician.dashboard', async (req, res) => {
    const q = queryString(req, 'q')
    const page = await listPatientsOfDoctor(authUser(req).id, {
      q: q || undefined,
      page: req.query.page,
      pageSize: CLINICIAN_PATIENTS_PAGE_SIZE
    })
    res.json({ patients: page.items.map(toPublicUser), pagination: page.pagination, q })
  })
)

async function patientFile(patientId: number) {
  const record = await findRecordByPatient(patientId)
  const [reviews, documents] = await Promise.all([
    record ? listReviewsForRecord(record.id) : Promise.resolve([]),
    recentMedicalDocuments(patientId, 10)
  ])
  return { record, reviews, documents }
}

router.get(
  '/clinician/patients/:id',
  clinicianOnly,
  route('medical.clinician.patient', async (req, res) => {
    const patient = await loadAssignedPatient(authUser(req), intParam(req, 'id'))
    res.json({ patient: toPublicUser(patient), ...(await patientFile(patient.id)) })
  })
)

router.put(
  '/clinician/patients/:id/record',
  clinicianOnly,
  route('medical.clinician.record', async (req, res) => {
    const patient = await loadAssignedPatient(authUser(req), intParam(req, 'id'))
    const fields = recordFieldsSchema.parse(req.body)
    const record = await savePatientRecord(patient, fields)
    respond(req, res, { status: 'success', record }, { notice: 'Patient record saved.', trigger: 'recordSaved' })
  })
)

const reviewSchema = z.object({ notes: z.string().trim().min(1) })

router.post(
  '/clinician/patients/:id/reviews',
  clinicianOnly,
  route('medical.clinician.review', async (req, res) => {
    const clinician = authUser(req)
    const patient = await loadAssignedPatient(clinician, intParam(req, 'id'))
    const { notes } = reviewSchema.parse(req.body)
    const record = await findRecordByPatient(patient.id)
    if (!record) throw badRequest('This patient has no medical record yet.')

    const review = await addReview({ patientRecordId: record.id, clinicianId: clinician.id, notes })
    await recordCreate('ClinicianReview', review.id, { patientRecordId: record.id, notes })
    respond(req, res, { status: 'success', review }, { status: 201, notice: 'Review added.', trigger: 'reviewAdded' })
  })
)

async function accessiblePatient(req: Request, patientId: number) {
  const patient = await loadPatient(patientId)
  if (!canAccessPatient(authUser(req), patient)) throw forbidden()
  return patient
}

router.post(
  '/patients/:id/documents',
  requireRole('clinician', 'administrator'),
  singleFile('file'),
  route('medical.documents.upload', async (req, res) => {
    const patient = await accessiblePatient(req, intParam(req, 'id'))
    if (!req.file) throw badRequest('Please choose a file to upload.')
    const fields = medicalUploadFieldsSchema.parse(req.body ?? {})
    const doc = await uploadMedicalDocument({ uploader: authUser(req), patient, file: req.file, fields })
    respond(
      req,
      res,
      { status: 'success', document: doc },
      { status: 201, notice: 'Document uploaded.', trigger: 'documentUploaded' }
    )
  })
)

router.get(
  '/documents/:id/download',
  route('medical.documents.download', async (req, res) => {
    const doc = await findMedicalDocument(uuidParam(req, 'id'))
    if (!doc) throw notFound('Document not found.')
    await accessiblePatient(req, doc.patientId)
    log('info', 'medical.documents.download', { requestId: requestIdOf(res), documentId: doc.id })
    await new Promise<void>((resolve, reject) => {
      res.download(resolveMediaPath(doc.filePath), doc.fileName, (err) => (err ? reject(err) : resolve()))
    })
  })
)

router.get(
  '/cancer-types',
  route('medical.cancer_types', async (req, res) => {
    const organsOnly = queryString(req, 'organsOnly') === 'true'
    res.json({ cancerTypes: await listCancerTypes({ organsOnly }) })
  })
)

router.get(
  '/cancer-types/:id/subtypes',
  route('medical.cancer_types.subtypes', async (req, res) => {
    const organ = await findCancerType(intParam(req, 'id'))
    if (!organ) throw notFound('Cancer type not found.')
    res.json({ organ, subtypes: await listSubtypes(organ.id) })
  })
)

export default router
