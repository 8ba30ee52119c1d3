import { z } from 'zod'
import { env } from '../../env.js'
import { HttpError, badRequest, forbidden, gone, notFound } from '../../errors.js'
import { log } from '../../logger.js'
import {
  completeEmailVerification,
  completePasswordReset,
  createEmailVerification,
  createPasswordReset,
  findEmailVerification,
  findPasswordReset,
  isExpired
} from '../../repos/authTokenRepo.js'
import { recentFailures, recordLoginAttempt } from '../../repos/loginAttemptRepo.js'
import {
  GENDERS,
  LANGUAGES,
  createUser,
  deleteUser,
  emailExists,
  findUserByEmail,
  updateUser,
  type Role,
  type User
} from '../../repos/userRepo.js'
import { recordAuth, recordCreate, type AuditState } from '../audit.js'
import { passwordResetEmail, sendMail, verificationEmail } from './mailer.js'
import { MIN_PASSWORD_LENGTH, hashPassword, verifyPassword } from './passwords.js'
import { accessTokenTtlMs, expiresIn, generateOneTimeToken, signAccessToken } from './tokens.js'

export const MINIMUM_AGE = 18

export const BAD_CREDENTIALS = 'Please enter a correct email and password.'

const USED_RESET_LINK = 'This password reset link has already been used.'

/** Audit snapshot of a user: every column except the password hash. */
export function userAuditState(user: User): AuditState {
  const { passwordHash: _passwordHash, ...rest } = user
  return rest
}

export function dashboardPath(role: Role | null) {
  switch (role) {
    case 'administrator':
      return '/admin'
    case 'clinician':
      return '/clinician'
    case 'patient':
      return '/patient'
    default:
      return null
  }
}

/** Whole years between an ISO date of birth and `today`. */
export function ageOn(dateOfBirth: string, today = new Date()) {
  const [y, m, d] = dateOfBirth.split('-').map(Number)
  if (y === undefined || m === undefined || d === undefined) return Number.NaN
  let age = today.getUTCFullYear() - y
  const beforeBirthday = today.getUTCMonth() + 1 < m || (today.getUTCMonth() + 1 === m && today.getUTCDate() < d)
  if (beforeBirthday) age -= 1
  return age
}

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Enter a valid date (YYYY-MM-DD).')

export const signupSchema = z
  .object({
    email: z.string().trim().toLowerCase().email(),
    password1: z.string(),
    password2: z.string(),
    firstName: z.string().trim().min(1).max(150),
    lastName: z.string().trim().min(1).max(150),
    dateOfBirth: isoDate.optional(),
    gender: z.enum(GENDERS).optional(),
    phoneNumber: z.string().trim().max(20).optional(),
    roleName: z.enum(['patient', 'clinician', 'administrator']),
    languageCode: z.enum(LANGUAGES).optional(),
    specialtyName: z.string().trim().max(100).optional(),
    terms: z.literal(true, { errorMap: () => ({ message: 'You must accept the terms and conditions.' }) })
  })
  .superRefine((v, ctx) => {
    if (v.password1 !== v.password2) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['password2'], message: "The two password fields didn't match." })
    }
    if (v.password1.length < MIN_PASSWORD_LENGTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['password1'],
        message: `This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`
      })
    }
    if (v.roleName === 'administrator') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['roleName'], message: 'You cannot register as an administrator.' })
    }
    if (v.dateOfBirth) {
      const today = new Date()
      if (v.dateOfBirth > today.toISOString().slice(0, 10)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['dateOfBirth'], message: 'Date of birth cannot be in the future.' })
      } else if (ageOn(v.dateOfBirth, today) < MINIMUM_AGE) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['dateOfBirth'],
          message: `You must be at least ${MINIMUM_AGE} years old to register.`
        })
      }
    }
  })

export type SignupInput = z.infer<typeof signupSchema>

function verificationLink(token: string) {
  return `${env.PUBLIC_BASE_URL}/api/v1/auth/verify-email/${token}`
}

function resetLink(token: string) {
  return `${env.PUBLIC_BASE_URL}/api/v1/auth/password-reset/${token}`
}

/**
 * Create an unverified account and mail the verification link. A user whose
 * email could not be sent is removed again so the address can be reused.
 */
export async function signup(input: SignupInput) {
  if (input.roleName === 'administrator') throw badRequest('You cannot register as an administrator.')
  if (await emailExists(input.email)) {
    throw badRequest('A user with that email already exists.', { field: 'email' })
  }

  const user = await createUser({
    email: input.email,
    passwordHash: await hashPassword(input.password1),
    firstName: input.firstName,
    lastName: input.lastName,
    dateOfBirth: input.dateOfBirth ?? null,
    gender: input.gender ?? null,
    phoneNumber: input.phoneNumber,
    role: input.roleName,
    language: input.languageCode,
    specialtyName: input.roleName === 'clinician' ? input.specialtyName : undefined
  })

  const token = generateOneTimeToken()
  await createEmailVerification({
    userId: user.id,
    token,
    expiresAt: expiresIn(env.EMAIL_VERIFICATION_TTL_HOURS)
  })

  try {
    const mail = verificationEmail({
      firstName: user.firstName,
      link: verificationLink(token),
      ttlHours: env.EMAIL_VERIFICATION_TTL_HOURS
    })
    await sendMail({ to: user.email, ...mail })
  } catch (err) {
    log('error', 'auth.signup.mail_failed', { userId: user.id, error: String(err) })
    await deleteUser(user.id)
    throw new HttpError(500, 'Failed to send verification email. Please try again later.')
  }

  await recordCreate('User', user.id, userAuditState(user))
  return user
}

export type LoginResult = {
  user: User
  token: string
  maxAgeMs: number
  redirect: string | null
}

/**
 * Check credentials with per-email lockout. Every attempt is recorded,
 * successful or not.
 */
export async function login(args: {
  email: string
  password: string
  rememberMe: boolean
  ipAddress: string | null
  userAgent: string
  now?: Date
}): Promise<LoginResult> {
  const now = args.now ?? new Date()
  const lockoutMs = env.LOGIN_LOCKOUT_MINUTES * 60 * 1000
  const { failures, latest } = await recentFailures(args.email, new Date(now.getTime() - lockoutMs))

  if (failures >= env.LOGIN_FAILURE_LIMIT) {
    const unlockAt = (latest ?? now).getTime() + lockoutMs
    const retryAfterSeconds = Math.max(1, Math.ceil((unlockAt - now.getTime()) / 1000))
    log('warn', 'auth.login.locked', { email: args.email, failures, retryAfterSeconds })
    throw new HttpError(429, 'Too many failed login attempts. Please try again later.', { retryAfterSeconds })
  }

  const attempt = { email: args.email, ipAddress: args.ipAddress, userAgent: args.userAgent }
  const user = await findUserByEmail(args.email)
  const passwordOk = user ? await verifyPassword(user.passwordHash, args.password) : false

  if (!user || !passwordOk || !user.isActive) {
    await recordLoginAttempt({ ...attempt, successful: false })
    throw badRequest(BAD_CREDENTIALS)
  }

  if (!user.isEmailVerified) {
    await recordLoginAttempt({ ...attempt, successful: false })
    throw forbidden('Please verify your email address before logging in.')
  }

  await recordLoginAttempt({ ...attempt, successful: true })
  const updated = (await updateUser(user.id, { lastLogin: now })) ?? user
  await recordAuth('LOGIN', { id: user.id, email: user.email })

  return {
    user: updated,
    token: signAccessToken(updated, args.rememberMe),
    maxAgeMs: accessTokenTtlMs(args.rememberMe),
    redirect: dashboardPath(updated.role)
  }
}

export type VerificationOutcome = 'verified' | 'already_verified' | 'expired'

export async function verifyEmail(token: string, now = new Date()): Promise<VerificationOutcome> {
  const verification = await findEmailVerification(token)
  if (!verification) throw notFound('Invalid verification link.')
  if (verification.verified) return 'already_verified'
  if (isExpired(verification, now)) return 'expired'
  await completeEmailVerification(verification)
  log('info', 'auth.email_verified', { userId: verification.userId })
  return 'verified'
}

/**
 * Issue and mail a reset token. Unknown addresses are silently ignored so the
 * response does not reveal which emails are registered.
 */
export async function requestPasswordReset(email: string) {
  const user = await findUserByEmail(email)
  if (!user) {
    log('info', 'auth.password_reset.unknown_email')
    return
  }

  const token = generateOneTimeToken()
  await createPasswordReset({ userId: user.id, token, expiresAt: expiresIn(env.PASSWORD_RESET_TTL_HOURS) })

  try {
    const mail = passwordResetEmail({
      firstName: user.firstName,
      link: resetLink(token),
      ttlHours: env.PASSWORD_RESET_TTL_HOURS
    })
    await sendMail({ to: user.email, ...mail })
  } catch (err) {
    log('error', 'auth.password_reset.mail_failed', { userId: user.id, error: String(err) })
    throw new HttpError(500, 'Failed to send reset email. Please try again later.')
  }
}

export type ResetTokenStatus = 'valid' | 'used' | 'expired'

export async function checkPasswordReset(token: string, now = new Date()): Promise<ResetTokenStatus> {
  const reset = await findPasswordReset(token)
  if (!reset) throw notFound('Invalid password reset link.')
  if (reset.used) return 'used'
  if (isExpired(reset, now)) return 'expired'
  return 'valid'
}

export async function confirmPasswordReset(args: { token: string; password1: string; password2: string; now?: Date }) {
  const reset = await findPasswordReset(args.token)
  if (!reset) throw notFound('Invalid password reset link.')
  if (reset.used) throw gone(USED_RESET_LINK)
  if (isExpired(reset, args.now)) throw gone('This password reset link has expired.')

  if (args.password1 !== args.password2) throw badRequest("The two password fields didn't match.")
  if (args.password1.length < MIN_PASSWORD_LENGTH) {
    throw badRequest(`This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`)
  }

  if (!(await completePasswordReset(reset, await hashPassword(args.password1)))) {
    throw gone(USED_RESET_LINK)
  }
  log('info', 'auth.password_reset.completed', { userId: reset.userId })
}
