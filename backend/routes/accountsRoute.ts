import { Router } from 'express'
import { z } from 'zod'
import { notFound } from '../errors.js'
import { authUser, requireAuth, requireRole } from '../middleware/auth.js'
import { GENDERS, LANGUAGES, ROLES, findUserById, listUsers, toPublicUser } from '../repos/userRepo.js'
import { applyUserPatch, assignDoctor, updateProfile } from '../services/users.js'
import { setLanguageCookie } from './cookies.js'
import { intParam, queryString, respond, route } from './handler.js'

const USERS_PAGE_SIZE = 20

const router = Router()

router.use(requireAuth)

router.get(
  '/profile',
  route('accounts.profile', async (req, res) => {
    res.json({ user: toPublicUser(authUser(req)) })
  })
)

const profileSchema = z
  .object({
    firstName: z.string().trim().min(1).max(150),
    lastName: z.string().trim().min(1).max(150),
    phoneNumber: z.string().trim().max(20),
    dateOfBirth: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/)
      .nullable(),
    gender: z.enum(GENDERS).nullable(),
    languageCode: z.enum(LANGUAGES),
    specialtyName: z.string().trim().max(100)
  })
  .partial()

router.patch(
  '/profile',
  route('accounts.profile.update', async (req, res) => {
    const { languageCode, ...fields } = profileSchema.parse(req.body)
    const updated = await updateProfile(authUser(req), { ...fields, language: languageCode })
    if (languageCode) setLanguageCookie(res, languageCode)
    respond(req, res, { status: 'success', user: toPublicUser(updated) }, { notice: 'Profile updated.' })
  })
)

const languageSchema = z.object({ languageCode: z.enum(LANGUAGES) })

router.post(
  '/language',
  route('accounts.language', async (req, res) => {
    const { languageCode } = languageSchema.parse(req.body)
    await applyUserPatch(authUser(req), { language: languageCode })
    setLanguageCookie(res, languageCode)
    respond(req, res, { status: 'success', languageCode }, { notice: 'Language updated.' })
  })
)

router.get(
  '/users',
  requireRole('administrator'),
  route('accounts.users', async (req, res) => {
    const role = z.enum(ROLES).safeParse(queryString(req, 'role'))
    const page = await listUsers({
      q: queryString(req, 'q') || undefined,
      role: role.success ? role.data : undefined,
      page: req.query.page,
      pageSize: USERS_PAGE_SIZE
    })
    res.json({ items: page.items.map(toPublicUser), pagination: page.pagination })
  })
)

const editUserSchema = z
  .object({
    role: z.enum(ROLES).nullable(),
    isActive: z.boolean(),
    isEmailVerified: z.boolean(),
    languageCode: z.enum(LANGUAGES),
    firstName: z.string().trim().min(1).max(150),
    lastName: z.string().trim().min(1).max(150),
    specialtyName: z.string().trim().max(100)
  })
  .partial()

router.patch(
  '/users/:id',
  requireRole('administrator'),
  route('accounts.users.edit', async (req, res) => {
    const id = intParam(req, 'id')
    const { languageCode, ...fields } = editUserSchema.parse(req.body)
    const user = await findUserById(id)
    if (!user) throw notFound('User not found.')
    const updated = await applyUserPatch(user, { ...fields, language: languageCode })
    respond(req, res, { status: 'success', user: toPublicUser(updated) }, { notice: 'User updated.' })
  })
)

const assignSchema = z.object({ doctorId: z.number().int().positive().nullable() })

router.post(
  '/users/:id/assign-doctor',
  requireRole('administrator'),
  route('accounts.users.assign_doctor', async (req, res) => {
    const id = intParam(req, 'id')
    const { doctorId } = assignSchema.parse(req.body)
    const patient = await assignDoctor(id, doctorId)
    respond(
      req,
      res,
      { status: 'success', patientId: patient.id, doctorId: patient.assignedDoctorId },
      { notice: doctorId === null ? 'Doctor unassigned.' : 'Doctor assigned.' }
    )
  })
)

export default router
