import type { Request, Response } from 'express'

/**
 * HTMX sends `HX-Request: true` on every request it issues. Those callers
 * want an HTML fragment or a short notice they can swap into the page,
 * everyone else gets JSON.
 */
export function isHtmx(req: Request) {
  return req.get('hx-request') === 'true'
}

export function htmxTarget(req: Request) {
  return req.get('hx-target') ?? null
}

export function sendNotice(res: Response, text: string, opts: { status?: number; trigger?: string } = {}) {
  if (opts.trigger) res.setHeader('HX-Trigger', opts.trigger)
  return res
    .status(opts.status ?? 200)
    .type('text/plain')
    .send(text)
}

export function sendFragment(res: Response, html: string, status = 200) {
  return res.status(status).type('text/html').send(html)
}

export function sendRedirect(res: Response, location: string) {
  res.setHeader('HX-Redirect', location)
  return res.status(204).end()
}
