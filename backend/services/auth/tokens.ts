import { randomBytes } from 'node:crypto'
import jwt from 'jsonwebtoken'
import { z } from 'zod'
import { env } from '../../env.js'
import { ROLES, type Role } from '../../repos/userRepo.js'

export const ACCESS_TOKEN_COOKIE = 'access_token'

const HOUR_MS = 60 * 60 * 1000

const claimsSchema = z.object({
  sub: z.string().regex(/^\d+$/),
  role: z.enum(ROLES).nullable()
})

export type AccessClaims = { userId: number; role: Role | null }

export function accessTokenTtlMs(rememberMe: boolean) {
  return rememberMe ? env.REMEMBER_ME_TTL_DAYS * 24 * HOUR_MS : env.ACCESS_TOKEN_TTL_HOURS * HOUR_MS
}

export function signAccessToken(user: { id: number; role: Role | null }, rememberMe = false) {
  return jwt.sign({ role: user.role }, env.JWT_SECRET, {
    subject: String(user.id),
    expiresIn: Math.floor(accessTokenTtlMs(rememberMe) / 1000)
  })
}

/** Claims of a valid, unexpired token, or null. */
export function verifyAccessToken(token: string): AccessClaims | null {
  try {
    const decoded = jwt.verify(token, env.JWT_SECRET)
    const parsed = claimsSchema.safeParse(decoded)
    if (!parsed.success) return null
    return { userId: Number(parsed.data.sub), role: parsed.data.role }
  } catch {
    return null
  }
}

/** 32 hex characters, used for email verification and password reset links. */
export function generateOneTimeToken() {
  return randomBytes(16).toString('hex')
}

export function expiresIn(hours: number, from = new Date()) {
  return new Date(from.getTime() + hours * HOUR_MS)
}
