import { Router } from 'express'
import { z } from 'zod'
import { htmxTarget, isHtmx, sendFragment } from '../middleware/htmx.js'
import { authUser, requireAuth, requireRole } from '../middleware/auth.js'
import { countCancerTypes, listCancerTypes } from '../repos/cancerTypeRepo.js'
import { countSessionsSince } from '../repos/chatRepo.js'
import { countRecords, findRecordByPatient, listPendingRequests, listReviewsForRecord } from '../repos/medicalRepo.js'
import { countMedicalDocuments, recentMedicalDocuments } from '../repos/medicalDocumentRepo.js'
import {
  countUsersByRole,
  findUserById,
  listUsersByRole,
  recentUsers,
  registrationsPerDay,
  toPublicUser,
  userActivityCounts,
  type Role
} from '../repos/userRepo.js'
import {
  activityPercentages,
  addCancerType,
  cancerTypeSchema,
  decideDoctorRequest,
  editCancerType,
  loadPatient,
  registrationTrend,
  removeCancerType,
  trendStart
} from '../services/medical.js'
import { assignDoctor } from '../services/users.js'
import { doctorRequests } from '../views/fragments.js'
import { intParam, queryString, respond, route, uuidParam } from './handler.js'

const USERS_PAGE_SIZE = 20
const PENDING_REQUESTS_SHOWN = 5
const RECENT_USERS_SHOWN = 10
const PENDING_REQUESTS_TARGET = 'pendingDoctorRequestsContainer'

/**
 * Administrator screens of the medical area, mounted at /api/v1/medical/admin.
 */
const router = Router()

router.use(requireAuth, requireRole('administrator'))

router.get(
  '/dashboard',
  route('medical.admin.dashboard', async (req, res) => {
    if (isHtmx(req) && htmxTarget(req) === PENDING_REQUESTS_TARGET) {
      return sendFragment(res, doctorRequests(await listPendingRequests(PENDING_REQUESTS_SHOWN)))
    }

    const now = new Date()
    const [roles, activity, documents, records, cancerTypes, chatSessions24h, newest, perDay, pending] =
      await Promise.all([
        countUsersByRole(),
        userActivityCounts(),
        countMedicalDocuments(),
        countRecords(),
        countCancerTypes(),
        countSessionsSince(new Date(now.getTime() - 24 * 60 * 60 * 1000)),
        recentUsers(RECENT_USERS_SHOWN),
        registrationsPerDay(trendStart(now)),
        listPendingRequests(PENDING_REQUESTS_SHOWN)
      ])

    res.json({
      users: { ...roles, total: activity.total },
      activity: { ...activity, percentages: activityPercentages(activity) },
      documents,
      records,
      cancerTypes,
      chatSessions24h,
      recentUsers: newest.map(toPublicUser),
      registrationTrend: registrationTrend(perDay, now),
      pendingRequests: pending
    })
  })
)

function listByRole(role: Role, event: string) {
  return route(event, async (req, res) => {
    const q = queryString(req, 'q')
    const page = await listUsersByRole(role, { q: q || undefined, page: req.query.page, pageSize: USERS_PAGE_SIZE })
    res.json({ items: page.items.map(toPublicUser), pagination: page.pagination, q })
  })
}

router.get('/patients', listByRole('patient', 'medical.admin.patients'))
router.get('/clinicians', listByRole('clinician', 'medical.admin.clinicians'))

router.get(
  '/patients/:id',
  route('medical.admin.patient', async (req, res) => {
    const patient = await loadPatient(intParam(req, 'id'))
    const [record, doctor, documents] = await Promise.all([
      findRecordByPatient(patient.id),
      patient.assignedDoctorId === null ? Promise.resolve(null) : findUserById(patient.assignedDoctorId),
      recentMedicalDocuments(patient.id, 10)
    ])
    const reviews = record ? await listReviewsForRecord(record.id) : []
    res.json({
      patient: toPublicUser(patient),
      doctor: doctor ? toPublicUser(doctor) : null,
      record,
      reviews,
      documents
    })
  })
)

const assignSchema = z.object({ doctorId: z.number().int().positive().nullable() })

router.post(
  '/patients/:id/assign-doctor',
  route('medical.admin.assign_doctor', async (req, res) => {
    const { doctorId } = assignSchema.parse(req.body)
    const patient = await assignDoctor(intParam(req, 'id'), doctorId)
    respond(
      req,
      res,
      { status: 'success', patientId: patient.id, doctorId: patient.assignedDoctorId },
      { notice: doctorId === null ? 'Doctor unassigned.' : 'Doctor assigned.', trigger: 'doctorAssigned' }
    )
  })
)

const processSchema = z.object({
  action: z.enum(['approve', 'reject']),
  notes: z.string().trim().optional().default('')
})

router.post(
  '/doctor-requests/:id',
  route('medical.admin.doctor_request', async (req, res) => {
    const body = processSchema.parse(req.body)
    const request = await decideDoctorRequest({
      admin: authUser(req),
      requestId: uuidParam(req, 'id'),
      approve: body.action === 'approve',
      notes: body.notes
    })
    respond(
      req,
      res,
      { status: 'success', request },
      {
        notice: request.status === 'approved' ? 'Request approved.' : 'Request rejected.',
        trigger: 'doctorRequestProcessed'
      }
    )
  })
)

router.get(
  '/cancer-types',
  route('medical.admin.cancer_types', async (_req, res) => {
    res.json({ cancerTypes: await listCancerTypes() })
  })
)

router.post(
  '/cancer-types',
  route('medical.admin.cancer_types.create', async (req, res) => {
    const cancerType = await addCancerType(cancerTypeSchema.parse(req.body))
    respond(req, res, { status: 'success', cancerType }, { status: 201, notice: 'Cancer type created.' })
  })
)

router.put(
  '/cancer-types/:id',
  route('medical.admin.cancer_types.update', async (req, res) => {
    const cancerType = await editCancerType(intParam(req, 'id'), cancerTypeSchema.parse(req.body))
    respond(req, res, { status: 'success', cancerType }, { notice: 'Cancer type updated.' })
  })
)

router.delete(
  '/cancer-types/:id',
  route('medical.admin.cancer_types.delete', async (req, res) => {
    await removeCancerType(intParam(req, 'id'))
    respond(req, res, { status: 'success' }, { notice: 'Cancer type deleted.', trigger: 'cancerTypeDeleted' })
  })
)

export default router
