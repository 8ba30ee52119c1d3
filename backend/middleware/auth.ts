import type { NextFunction, Request, Response } from 'express'
import { forbidden, sendError, unauthorized } from '../errors.js'
import { findUserById, type Role, type User } from '../repos/userRepo.js'
import { ACCESS_TOKEN_COOKIE, verifyAccessToken } from '../services/auth/tokens.js'
import { setContextUser } from './requestContext.js'

const authenticated = new WeakMap<Request, User>()

export function readAccessToken(req: Request) {
  const header = req.get('authorization')
  if (header?.startsWith('Bearer ')) {
    const token = header.slice('Bearer '.length).trim()
    if (token) return token
  }
  const cookies: Record<string, unknown> = req.cookies ?? {}
  const cookie = cookies[ACCESS_TOKEN_COOKIE]
  return typeof cookie === 'string' && cookie ? cookie : null
}

/**
 * Resolve the caller from the access token (Bearer header or cookie). Unknown
 * or deactivated accounts are treated as anonymous.
 */
export async function requireAuth(req: Request, res: Response, next: NextFunction) {
  try {
    const token = readAccessToken(req)
    const claims = token ? verifyAccessToken(token) : null
    if (!claims) throw unauthorized()

    const user = await findUserById(claims.userId)
    if (!user || !user.isActive) throw unauthorized()

    authenticated.set(req, user)
    setContextUser(req, { id: user.id, email: user.email })
    next()
  } catch (err) {
    sendError(req, res, err, 'auth.authenticate')
  }
}

/** The user resolved by requireAuth. */
export function authUser(req: Request): User {
  const user = authenticated.get(req)
  if (!user) throw unauthorized()
  return user
}

export function requireRole(...roles: Role[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const user = authenticated.get(req)
    if (!user) return sendError(req, res, unauthorized(), 'auth.role')
    if (!user.role || !roles.includes(user.role)) return sendError(req, res, forbidden(), 'auth.role')
    next()
  }
}

export function requireVerifiedEmail(req: Request, res: Response, next: NextFunction) {
  const user = authenticated.get(req)
  if (!user) return sendError(req, res, unauthorized(), 'auth.verified_email')
  if (!user.isEmailVerified) {
    return sendError(req, res, forbidden('Please verify your email address to access this page.'), 'auth.verified_email')
  }
  next()
}
