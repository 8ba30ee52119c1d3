import { pool } from '../db/pool.js'
import { paginate, type Page } from '../db/pagination.js'
import { containsPattern, fragment, join, raw, sql, where } from '../db/sql.js'

export const ROLES = ['patient', 'clinician', 'administrator'] as const
export type Role = (typeof ROLES)[number]

export const LANGUAGES = ['en', 'es', 'fr', 'ar', 'hi'] as const
export type LanguageCode = (typeof LANGUAGES)[number]

export const LANGUAGE_NAMES: Record<LanguageCode, string> = {
  en: 'English',
  es: 'Spanish',
  fr: 'French',
  ar: 'Arabic',
  hi: 'Hindi'
}

export const GENDERS = ['M', 'F', 'O'] as const
export type Gender = (typeof GENDERS)[number]

type UserRow = {
  id: number
  email: string
  password_hash: string
  first_name: string
  last_name: string
  date_of_birth: string | null
  gender: Gender | null
  phone_number: string
  numerical_identifier: string | null
  role: Role | null
  language: LanguageCode
  assigned_doctor_id: number | null
  specialty_name: string
  is_active: boolean
  is_email_verified: boolean
  date_joined: Date
  last_login: Date | null
}

export type User = {
  id: number
  email: string
  passwordHash: string
  firstName: string
  lastName: string
  dateOfBirth: string | null
  gender: Gender | null
  phoneNumber: string
  numericalIdentifier: string | null
  role: Role | null
  language: LanguageCode
  assignedDoctorId: number | null
  specialtyName: string
  isActive: boolean
  isEmailVerified: boolean
  dateJoined: Date
  lastLogin: Date | null
}

export type PublicUser = Omit<User, 'passwordHash'> & { fullName: string }

const USER_COLUMNS = raw(`
  id, email, password_hash, first_name, last_name, to_char(date_of_birth, 'YYYY-MM-DD') AS date_of_birth,
  gender, phone_number, numerical_identifier, role, language, assigned_doctor_id, specialty_name,
  is_active, is_email_verified, date_joined, last_login
`)

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name,
    dateOfBirth: row.date_of_birth,
    gender: row.gender,
    phoneNumber: row.phone_number,
    numericalIdentifier: row.numerical_identifier,
    role: row.role,
    language: row.language,
    assignedDoctorId: row.assigned_doctor_id,
    specialtyName: row.specialty_name,
    isActive: row.is_active,
    isEmailVerified: row.is_email_verified,
    dateJoined: row.date_joined,
    lastLogin: row.last_login
  }
}

export function fullName(user: Pick<User, 'firstName' | 'lastName' | 'email'>) {
  const name = `${user.firstName} ${user.lastName}`.trim()
  return name || user.email
}

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user
  return { ...rest, fullName: fullName(user) }
}

export async function findUserById(id: number) {
  const q = sql`SELECT ${USER_COLUMNS} FROM users WHERE id = ${id}`
  const res = await pool.query<UserRow>(q.text, q.values)
  return res.rows[0] ? toUser(res.rows[0]) : null
}

export async function findUserByEmail(email: string) {
  const q = sql`SELECT ${USER_COLUMNS} FROM users WHERE lower(email) = lower(${email})`
  const res = await pool.query<UserRow>(q.text, q.values)
  return res.rows[0] ? toUser(res.rows[0]) : null
}

export async function emailExists(email: string) {
  const q = sql`SELECT 1 FROM users WHERE lower(email) = lower(${email})`
  const res = await pool.query(q.text, q.values)
  return (res.rowCount ?? 0) > 0
}

export type NewUser = {
  email: string
  passwordHash: string
  firstName: string
  lastName: string
  dateOfBirth?: string | null
  gender?: Gender | null
  phoneNumber?: string
  role: Role
  language?: LanguageCode
  specialtyName?: string
}

export async function createUser(args: NewUser) {
  const q = sql`
    INSERT INTO users (email, password_hash, first_name, last_name, date_of_birth, gender, phone_number, role, language, specialty_name)
    VALUES (
      ${args.email.trim().toLowerCase()}, ${args.passwordHash}, ${args.firstName}, ${args.lastName},
      ${args.dateOfBirth ?? null}::date, ${args.gender ?? null}, ${args.phoneNumber ?? ''}, ${args.role},
      ${args.language ?? 'en'}, ${args.specialtyName ?? ''}
    )
    RETURNING ${USER_COLUMNS}
  `
  const res = await pool.query<UserRow>(q.text, q.values)
  const row = res.rows[0]
  if (!row) throw new Error('User insert returned no row')
  return toUser(row)
}

export async function deleteUser(id: number) {
  const q = sql`DELETE FROM users WHERE id = ${id}`
  await pool.query(q.text, q.values)
}

export type UserPatch = Partial<{
  firstName: string
  lastName: string
  dateOfBirth: string | null
  gender: Gender | null
  phoneNumber: string
  role: Role | null
  language: LanguageCode
  assignedDoctorId: number | null
  specialtyName: string
  isActive: boolean
  isEmailVerified: boolean
  passwordHash: string
  lastLogin: Date
}>

const PATCH_COLUMNS: Record<keyof UserPatch, string> = {
  firstName: 'first_name',
  lastName: 'last_name',
  dateOfBirth: 'date_of_birth',
  gender: 'gender',
  phoneNumber: 'phone_number',
  role: 'role',
  language: 'language',
  assignedDoctorId: 'assigned_doctor_id',
  specialtyName: 'specialty_name',
  isActive: 'is_active',
  isEmailVerified: 'is_email_verified',
  passwordHash: 'password_hash',
  lastLogin: 'last_login'
}

function isPatchKey(key: string): key is keyof UserPatch {
  return key in PATCH_COLUMNS
}

/**
 * Apply a partial update. Keys left undefined are not touched; explicit nulls clear the column.
 */
export async function updateUser(id: number, patch: UserPatch) {
  const assignments = Object.entries(patch).flatMap(([key, value]) => {
    if (value === undefined || !isPatchKey(key)) return []
    return [fragment`${raw(PATCH_COLUMNS[key])} = ${value}`]
  })

  if (assignments.length === 0) return findUserById(id)

  const q = sql`UPDATE users SET ${join(assignments, ', ')} WHERE id = ${id} RETURNING ${USER_COLUMNS}`
  const res = await pool.query<UserRow>(q.text, q.values)
  return res.rows[0] ? toUser(res.rows[0]) : null
}

function nameOrEmailMatches(q: string) {
  const pattern = containsPattern(q)
  return fragment`(first_name ILIKE ${pattern} OR last_name ILIKE ${pattern} OR email ILIKE ${pattern})`
}

async function pageOfUsers(args: {
  conditions: ReturnType<typeof fragment>[]
  orderBy: string
  page: unknown
  pageSize: number
}): Promise<Page<User>> {
  const filter = where(args.conditions)
  const countQ = sql`SELECT count(*)::int AS total FROM users ${filter}`
  const countRes = await pool.query<{ total: number }>(countQ.text, countQ.values)
  const pagination = paginate(countRes.rows[0]?.total ?? 0, args.page, args.pageSize)

  const q = sql`
    SELECT ${USER_COLUMNS} FROM users ${filter}
    ORDER BY ${raw(args.orderBy)}
    LIMIT ${pagination.pageSize} OFFSET ${pagination.offset}
  `
  const res = await pool.query<UserRow>(q.text, q.values)
  return { items: res.rows.map(toUser), pagination }
}

export function listUsers(args: { q?: string; role?: Role; page?: unknown; pageSize: number }) {
  const conditions = []
  if (args.q) conditions.push(nameOrEmailMatches(args.q))
  if (args.role) conditions.push(fragment`role = ${args.role}`)
  return pageOfUsers({ conditions, orderBy: 'date_joined DESC, id DESC', page: args.page, pageSize: args.pageSize })
}

/**
 * Clinician search used by patients looking for a doctor. A query also matches
 * the specialty and sorts by name; without one the newest clinicians come first.
 */
export function searchClinicians(args: { q?: string; page?: unknown; pageSize: number }) {
  const conditions = [fragment`role = 'clinician'`, fragment`is_active`]
  if (args.q) {
    const pattern = containsPattern(args.q)
    conditions.push(
      fragment`(first_name ILIKE ${pattern} OR last_name ILIKE ${pattern} OR specialty_name ILIKE ${pattern} OR email ILIKE ${pattern})`
    )
  }
  return pageOfUsers({
    conditions,
    orderBy: args.q ? 'first_name, last_name, id' : 'date_joined DESC, id DESC',
    page: args.page,
    pageSize: args.pageSize
  })
}

export function listPatientsOfDoctor(doctorId: number, args: { q?: string; page?: unknown; pageSize: number }) {
  const conditions = [fragment`assigned_doctor_id = ${doctorId}`]
  if (args.q) conditions.push(nameOrEmailMatches(args.q))
  return pageOfUsers({ conditions, orderBy: 'last_name, first_name, id', page: args.page, pageSize: args.pageSize })
}

export function listUsersByRole(role: Role, args: { q?: string; page?: unknown; pageSize: number }) {
  const conditions = [fragment`role = ${role}`]
  if (args.q) conditions.push(nameOrEmailMatches(args.q))
  return pageOfUsers({ conditions, orderBy: 'last_name, first_name, id', page: args.page, pageSize: args.pageSize })
}

export async function countUsersByRole(): Promise<Record<Role, number>> {
  const res = await pool.query<{ role: Role; total: number }>(
    `SELECT role, count(*)::int AS total FROM users WHERE role IS NOT NULL GROUP BY role`
  )
  const counts: Record<Role, number> = { patient: 0, clinician: 0, administrator: 0 }
  for (const row of res.rows) counts[row.role] = row.total
  return counts
}

export type ActivityCounts = { total: number; active: number; inactive: number; suspended: number }

export async function userActivityCounts(): Promise<ActivityCounts> {
  const res = await pool.query<ActivityCounts>(`
    SELECT
      count(*)::int AS total,
      count(*) FILTER (WHERE is_active AND is_email_verified)::int AS active,
      count(*) FILTER (WHERE is_active AND NOT is_email_verified)::int AS inactive,
      count(*) FILTER (WHERE NOT is_active)::int AS suspended
    FROM users
  `)
  return res.rows[0] ?? { total: 0, active: 0, inactive: 0, suspended: 0 }
}

export async function recentUsers(limit: number) {
  const q = sql`SELECT ${USER_COLUMNS} FROM users ORDER BY date_joined DESC, id DESC LIMIT ${limit}`
  const res = await pool.query<UserRow>(q.text, q.values)
  return res.rows.map(toUser)
}

/** Registrations per calendar day (UTC) since `since`, keyed YYYY-MM-DD. */
export async function registrationsPerDay(since: Date) {
  const q = sql`
    SELECT to_char(date_joined AT TIME ZONE 'UTC', 'YYYY-MM-DD') AS day, count(*)::int AS total
    FROM users
    WHERE date_joined >= ${since.toISOString()}::timestamptz
    GROUP BY 1
  `
  const res = await pool.query<{ day: string; total: number }>(q.text, q.values)
  return new Map(res.rows.map((r) => [r.day, r.total]))
}
