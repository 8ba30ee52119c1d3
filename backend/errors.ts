import type { Request, Response } from 'express'
import { ZodError } from 'zod'
import { log } from './logger.js'
import { isHtmx } from './middleware/htmx.js'
import { requestIdOf } from './middleware/requestContext.js'

export class HttpError extends Error {
  readonly status: number
  readonly details?: Record<string, unknown>

  constructor(status: number, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.details = details
  }
}

export const badRequest = (message: string, details?: Record<string, unknown>) => new HttpError(400, message, details)
export const unauthorized = (message = 'Authentication required') => new HttpError(401, message)
export const forbidden = (message = 'You do not have permission to access this page.') => new HttpError(403, message)
export const gone = (message: string) => new HttpError(410, message)
export const notFound = (message = 'Not found') => new HttpError(404, message)
export const conflict = (message: string, details?: Record<string, unknown>) => new HttpError(409, message, details)

export function errorMeta(err: unknown) {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack }
  }
  return { error: String(err) }
}

/**
 * Single exit for failures raised inside route handlers.
 *
 * HttpError keeps its status and message, zod issues become a 400, and
 * everything else is logged with its stack and answered with a generic 500.
 */
export function sendError(req: Request, res: Response, err: unknown, event: string) {
  const requestId = requestIdOf(res)

  if (res.headersSent) {
    log('error', `${event}.failed`, { requestId, headersSent: true, ...errorMeta(err) })
    return res.end()
  }

  if (err instanceof ZodError) {
    log('warn', `${event}.validation_failed`, { requestId, issues: err.issues })
    if (isHtmx(req)) return res.status(400).type('text/plain').send('Invalid request')
    return res.status(400).json({ error: 'Invalid request', issues: err.issues })
  }

  if (err instanceof HttpError) {
    log(err.status >= 500 ? 'error' : 'warn', `${event}.rejected`, {
      requestId,
      status: err.status,
      message: err.message
    })
    if (isHtmx(req)) return res.status(err.status).type('text/plain').send(err.message)
    return res.status(err.status).json({ error: err.message, ...err.details })
  }

  log('error', `${event}.failed`, { requestId, ...errorMeta(err) })
  const message = 'Something went wrong. Please try again.'
  if (isHtmx(req)) return res.status(500).type('text/plain').send(message)
  return res.status(500).json({ error: message })
}
