import { Router, type Request, type Response } from 'express'
import { z } from 'zod'
import { HttpError, forbidden, sendError } from '../errors.js'
import { log } from '../logger.js'
import { authUser, readAccessToken, requireAuth } from '../middleware/auth.js'
import { clientIp, requestIdOf } from '../middleware/requestContext.js'
import { findUserById, toPublicUser } from '../repos/userRepo.js'
import {
  checkPasswordReset,
  confirmPasswordReset,
  dashboardPath,
  login,
  requestPasswordReset,
  signup,
  signupSchema,
  verifyEmail
} from '../services/auth/accounts.js'
import { recordAuth } from '../services/audit.js'
import { ACCESS_TOKEN_COOKIE, verifyAccessToken } from '../services/auth/tokens.js'
import { accessCookieOptions, setLanguageCookie } from './cookies.js'
import { route } from './handler.js'

function noCache(res: Response) {
  res.setHeader('Cache-Control', 'no-cache, no-store, must-revalidate')
  res.setHeader('Pragma', 'no-cache')
  res.setHeader('Expires', '0')
}

/**
 * Auth router, mounted at /api/v1/auth.
 */
const router = Router()

router.post(
  '/signup',
  route('auth.signup', async (req, res) => {
    const input = signupSchema.parse(req.body)
    const user = await signup(input)
    log('info', 'auth.signup.created', { requestId: requestIdOf(res), userId: user.id, role: user.role })
    if (input.languageCode) setLanguageCookie(res, input.languageCode)
    res.status(201).json({
      status: 'success',
      message: 'Account created. Please check your email to verify your account.',
      userId: user.id
    })
  })
)

const loginSchema = z.object({
  username: z.string().trim().toLowerCase().email(),
  password: z.string().min(1),
  rememberMe: z.boolean().optional().default(false)
})

router.post('/login', async (req: Request, res: Response) => {
  const requestId = requestIdOf(res)
  const startedAt = Date.now()
  noCache(res)

  const parsed = loginSchema.safeParse(req.body)
  if (!parsed.success) {
    log('warn', 'auth.login.validation_failed', { requestId, issues: parsed.error.issues })
    return res.status(400).json({ error: 'Please enter a correct email and password.' })
  }

  try {
    const result = await login({
      email: parsed.data.username,
      password: parsed.data.password,
      rememberMe: parsed.data.rememberMe,
      ipAddress: clientIp(req),
      userAgent: req.get('user-agent') ?? ''
    })

    res.cookie(ACCESS_TOKEN_COOKIE, result.token, accessCookieOptions(result.maxAgeMs))
    log('info', 'auth.login.finish', {
      requestId,
      userId: result.user.id,
      rememberMe: parsed.data.rememberMe,
      durationMs: Date.now() - startedAt
    })
    return res.json({
      status: 'success',
      token: result.token,
      redirect: result.redirect,
      user: toPublicUser(result.user)
    })
  } catch (err) {
    if (err instanceof HttpError && err.status === 429) {
      const retryAfter = err.details?.retryAfterSeconds
      if (typeof retryAfter === 'number') res.setHeader('Retry-After', String(retryAfter))
    }
    return sendError(req, res, err, 'auth.login')
  }
})

router.post(
  '/logout',
  route('auth.logout', async (req, res) => {
    const token = readAccessToken(req)
    const claims = token ? verifyAccessToken(token) : null
    const user = claims ? await findUserById(claims.userId) : null
    if (user) await recordAuth('LOGOUT', { id: user.id, email: user.email })
    res.clearCookie(ACCESS_TOKEN_COOKIE, accessCookieOptions())
    res.json({ status: 'success' })
  })
)

router.get(
  '/verify-email/:token',
  route('auth.verify_email', async (req, res) => {
    const status = await verifyEmail(req.params.token ?? '')
    res.json({ status })
  })
)

const resetRequestSchema = z.object({ email: z.string().trim().toLowerCase().email() })

router.post(
  '/password-reset',
  route('auth.password_reset', async (req, res) => {
    const { email } = resetRequestSchema.parse(req.body)
    await requestPasswordReset(email)
    res.json({
      status: 'success',
      message: 'If an account exists for that email, a password reset link has been sent.'
    })
  })
)

router.get(
  '/password-reset/:token',
  route('auth.password_reset.check', async (req, res) => {
    const status = await checkPasswordReset(req.params.token ?? '')
    res.json({ status })
  })
)

const resetConfirmSchema = z.object({ password1: z.string(), password2: z.string() })

router.post(
  '/password-reset/:token',
  route('auth.password_reset.confirm', async (req, res) => {
    const body = resetConfirmSchema.parse(req.body)
    await confirmPasswordReset({ token: req.params.token ?? '', ...body })
    res.json({ status: 'success', message: 'Your password has been reset. You can now log in.' })
  })
)

router.get(
  '/redirect',
  requireAuth,
  route('auth.redirect', async (req, res) => {
    const user = authUser(req)
    const redirect = dashboardPath(user.role)
    if (!redirect) {
      res.clearCookie(ACCESS_TOKEN_COOKIE, accessCookieOptions())
      throw forbidden()
    }
    res.json({ redirect })
  })
)

export default router
