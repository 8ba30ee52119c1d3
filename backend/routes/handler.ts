import type { Request, Response } from 'express'
import { z } from 'zod'
import { badRequest, sendError } from '../errors.js'
import { isHtmx } from '../middleware/htmx.js'

/**
 * Wrap an async handler so any rejection goes through sendError under the
 * given event name.
 */
export function route(event: string, fn: (req: Request, res: Response) => Promise<unknown>) {
  return async (req: Request, res: Response) => {
    try {
      await fn(req, res)
    } catch (err) {
      sendError(req, res, err, event)
    }
  }
}

const positiveInt = z.coerce.number().int().positive()

/** Numeric path parameter, or a 400 when it is not one. */
export function intParam(req: Request, name: string) {
  const parsed = positiveInt.safeParse(req.params[name])
  if (!parsed.success) throw badRequest(`Invalid ${name}`)
  return parsed.data
}

const uuid = z.string().uuid()

export function uuidParam(req: Request, name: string) {
  const parsed = uuid.safeParse(req.params[name])
  if (!parsed.success) throw badRequest(`Invalid ${name}`)
  return parsed.data
}

/** `YYYY-MM-DD` naming a day that exists on the calendar. */
export const isoDay = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .refine((s) => {
    const ms = Date.parse(`${s}T00:00:00Z`)
    return !Number.isNaN(ms) && new Date(ms).toISOString().slice(0, 10) === s
  }, 'Enter a valid date (YYYY-MM-DD).')

/** First value of a query parameter as a trimmed string. */
export function queryString(req: Request, name: string) {
  const raw: unknown = req.query[name]
  const value = Array.isArray(raw) ? raw[0] : raw
  return typeof value === 'string' ? value.trim() : ''
}

/** Plain-text notice for HTMX callers, JSON for everyone else. */
export function respond(
  req: Request,
  res: Response,
  body: Record<string, unknown>,
  opts: { status?: number; notice?: string; trigger?: string } = {}
) {
  const status = opts.status ?? 200
  if (isHtmx(req) && opts.notice !== undefined) {
    if (opts.trigger) res.setHeader('HX-Trigger', opts.trigger)
    return res.status(status).type('text/plain').send(opts.notice)
  }
  return res.status(status).json(body)
}
