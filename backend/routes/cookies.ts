import type { CookieOptions, Response } from 'express'
import { isProduction } from '../env.js'
import type { LanguageCode } from '../repos/userRepo.js'

export const LANGUAGE_COOKIE = 'preferred_language'
const LANGUAGE_COOKIE_MAX_AGE_MS = 365 * 24 * 60 * 60 * 1000

export function accessCookieOptions(maxAgeMs?: number): CookieOptions {
  return {
    httpOnly: true,
    sameSite: 'lax',
    secure: isProduction,
    path: '/',
    ...(maxAgeMs === undefined ? {} : { maxAge: maxAgeMs })
  }
}

export function setLanguageCookie(res: Response, language: LanguageCode) {
  res.cookie(LANGUAGE_COOKIE, language, { maxAge: LANGUAGE_COOKIE_MAX_AGE_MS, sameSite: 'lax', path: '/' })
}
