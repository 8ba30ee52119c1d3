import { AsyncLocalStorage } from 'node:async_hooks'
import type { NextFunction, Request, Response } from 'express'

export type ContextUser = { id: number; email: string }

export type RequestContext = {
  requestId?: string
  user: ContextUser | null
  ipAddress: string | null
  userAgent: string
}

const storage = new AsyncLocalStorage<RequestContext>()
const byRequest = new WeakMap<Request, RequestContext>()

export function requestIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.requestId
  return typeof id === 'string' ? id : undefined
}

/** First hop of X-Forwarded-For when present, otherwise the socket address. */
export function clientIp(req: Request) {
  const forwarded = req.get('x-forwarded-for')
  if (forwarded) {
    const first = forwarded.split(',')[0]?.trim()
    if (first) return first
  }
  return req.socket.remoteAddress ?? req.ip ?? null
}

/**
 * Capture who is calling so audit writes deep in services can attribute
 * changes without every function taking a request argument.
 */
export function requestContext(req: Request, res: Response, next: NextFunction) {
  const ctx: RequestContext = {
    requestId: requestIdOf(res),
    user: null,
    ipAddress: clientIp(req),
    userAgent: req.get('user-agent') ?? ''
  }
  byRequest.set(req, ctx)
  storage.run(ctx, next)
}

/**
 * Stream-driven middleware (multipart parsing) calls back outside the
 * original async context; mount this after it to get the context back.
 */
export function resumeRequestContext(req: Request, _res: Response, next: NextFunction) {
  const ctx = byRequest.get(req)
  if (!ctx) return next()
  storage.run(ctx, next)
}

export function setContextUser(req: Request, user: ContextUser) {
  const ctx = byRequest.get(req)
  if (ctx) ctx.user = user
}

export function currentContext(): RequestContext | undefined {
  return storage.getStore()
}
