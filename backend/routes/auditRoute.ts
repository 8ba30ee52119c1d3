import { Router } from 'express'
import { z } from 'zod'
import { log } from '../logger.js'
import { isHtmx, sendFragment } from '../middleware/htmx.js'
import { requireAuth, requireRole } from '../middleware/auth.js'
import { requestIdOf } from '../middleware/requestContext.js'
import {
  AUDIT_ACTIONS,
  AUDIT_SORT_FIELDS,
  archiveAuditLogs,
  listAuditLogs,
  listAuditedModels,
  listAuditedUsers
} from '../repos/auditRepo.js'
import { formatChangesForDisplay, summarizeChanges } from '../services/audit.js'
import { auditLogRows } from '../views/fragments.js'
import { isoDay, respond, route } from './handler.js'

const DEFAULT_PAGE_SIZE = 20
const MAX_PAGE_SIZE = 100
const DAY_MS = 24 * 60 * 60 * 1000

const router = Router()

router.use(requireAuth, requireRole('administrator'))

/** Lenient: unknown filter values are dropped rather than rejected. */
export const logsQuerySchema = z.object({
  q: z.string().trim().optional().catch(undefined),
  model: z.string().trim().optional().catch(undefined),
  action: z.enum(AUDIT_ACTIONS).optional().catch(undefined),
  user: z.coerce.number().int().positive().optional().catch(undefined),
  startDate: isoDay.optional().catch(undefined),
  endDate: isoDay.optional().catch(undefined),
  sort: z.enum(AUDIT_SORT_FIELDS).catch('timestamp'),
  order: z.enum(['asc', 'desc']).catch('desc'),
  size: z.coerce.number().int().positive().max(MAX_PAGE_SIZE).catch(DEFAULT_PAGE_SIZE),
  page: z.unknown()
})

router.get(
  '/logs',
  route('audit.logs', async (req, res) => {
    const query = logsQuerySchema.parse(req.query)
    const page = await listAuditLogs({
      q: query.q || undefined,
      model: query.model || undefined,
      action: query.action,
      userId: query.user,
      startDate: query.startDate,
      endDate: query.endDate,
      sort: query.sort,
      order: query.order,
      page: query.page,
      pageSize: query.size
    })

    if (isHtmx(req)) return sendFragment(res, auditLogRows(page.items, page.pagination))

    const [models, users] = await Promise.all([listAuditedModels(), listAuditedUsers()])
    res.json({
      logs: page.items.map((entry) => ({
        ...entry,
        summary: summarizeChanges(entry),
        changesDisplay: formatChangesForDisplay(entry.changes)
      })),
      pagination: page.pagination,
      filters: { models, users, actions: AUDIT_ACTIONS }
    })
  })
)

const archiveSchema = z.object({ olderThanDays: z.number().int().min(1).default(90) })

router.post(
  '/archive',
  route('audit.archive', async (req, res) => {
    const { olderThanDays } = archiveSchema.parse(req.body ?? {})
    const cutoff = new Date(Date.now() - olderThanDays * DAY_MS)
    const archived = await archiveAuditLogs(cutoff)
    log('info', 'audit.archived', { requestId: requestIdOf(res), olderThanDays, archived })
    respond(
      req,
      res,
      { status: 'success', archived, cutoff: cutoff.toISOString() },
      { notice: `Archived ${archived} audit log entries.` }
    )
  })
)

export default router
