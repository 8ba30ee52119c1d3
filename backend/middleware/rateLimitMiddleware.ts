import type { NextFunction, Request, Response } from 'express'
import { allowRequest, type RateLimitRule } from '../services/rateLimit.js'
import { log } from '../logger.js'
import { clientIp, requestIdOf } from './requestContext.js'

export const MESSAGE_SESSION_LIMIT: RateLimitRule = { windowMs: 10_000, max: 5 }
export const MESSAGE_IP_LIMIT: RateLimitRule = { windowMs: 60_000, max: 20 }
export const HISTORY_IP_LIMIT: RateLimitRule = { windowMs: 60_000, max: 120 }

function reject(res: Response, retryAfterMs: number, message: string) {
  res.setHeader('Retry-After', Math.ceil(retryAfterMs / 1000))
  return res.status(429).json({ error: message })
}

function bodySessionId(req: Request) {
  const body: unknown = req.body
  if (typeof body !== 'object' || body === null || !('sessionId' in body)) return undefined
  return typeof body.sessionId === 'string' && body.sessionId ? body.sessionId : undefined
}

/**
 * Rate limiter for POST /message. With a sessionId in the body we limit
 * per-session in a short window to stop rapid-fire messages; otherwise we
 * fall back to a per-IP limit.
 */
export function rateLimitMessage(req: Request, res: Response, next: NextFunction) {
  const requestId = requestIdOf(res)
  const ip = clientIp(req)
  const sessionId = bodySessionId(req)

  if (sessionId) {
    const perSession = allowRequest({ key: `msg:sess:${sessionId}`, ...MESSAGE_SESSION_LIMIT })
    if (!perSession.allowed) {
      log('warn', 'rate_limit.blocked', {
        requestId,
        route: 'POST /message',
        scope: 'session',
        sessionId,
        retryAfterMs: perSession.retryAfterMs
      })
      return reject(res, perSession.retryAfterMs, 'The system is overloaded. Please wait a moment before sending more messages.')
    }
    return next()
  }

  const perIp = allowRequest({ key: `msg:ip:${ip}`, ...MESSAGE_IP_LIMIT })
  if (!perIp.allowed) {
    log('warn', 'rate_limit.blocked', { requestId, route: 'POST /message', scope: 'ip', ip, retryAfterMs: perIp.retryAfterMs })
    return reject(res, perIp.retryAfterMs, 'The system is overloaded. Please try again shortly.')
  }
  return next()
}

/**
 * IP-based limiter for GET /history, permissive enough for paging and search.
 */
export function rateLimitHistory(req: Request, res: Response, next: NextFunction) {
  const requestId = requestIdOf(res)
  const ip = clientIp(req)
  const perIp = allowRequest({ key: `hist:ip:${ip}`, ...HISTORY_IP_LIMIT })
  if (!perIp.allowed) {
    log('warn', 'rate_limit.blocked', { requestId, route: 'GET /history', scope: 'ip', ip, retryAfterMs: perIp.retryAfterMs })
    return reject(res, perIp.retryAfterMs, 'The system is overloaded. Please try again shortly.')
  }
  return next()
}
