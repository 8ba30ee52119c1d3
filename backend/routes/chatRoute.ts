import { Router, type Request, type Response } from 'express'
import { z } from 'zod'
import { env } from '../env.js'
import { notFound, sendError } from '../errors.js'
import { log } from '../logger.js'
import { authUser, requireAuth } from '../middleware/auth.js'
import { isHtmx, sendFragment, sendNotice, sendRedirect } from '../middleware/htmx.js'
import { rateLimitHistory, rateLimitMessage } from '../middleware/rateLimitMiddleware.js'
import { requestIdOf } from '../middleware/requestContext.js'
import {
  createSession,
  deleteSession,
  findUserAssistantMessage,
  findUserSession,
  listMessages,
  listSessionHistory,
  recentActiveSessions,
  updateSession,
  upsertFeedback,
  type ChatSession
} from '../repos/chatRepo.js'
import { createOrContinueSession, generateResponse, sessionTitle } from '../services/chat/chatService.js'
import { chatMessage, sessionMessages } from '../views/fragments.js'
import { queryString, route, uuidParam } from './handler.js'

const SIDEBAR_SESSIONS = 20
const HISTORY_PAGE_SIZE = 20
const INVALID_MESSAGE = 'Please enter a valid message.'

/**
 * Chat router, mounted at /api/v1/chat. Every endpoint works on the caller's
 * own sessions only.
 */
const router = Router()

router.use(requireAuth)

function startOfLocalDay(now: Date) {
  const d = new Date(now)
  d.setHours(0, 0, 0, 0)
  return d
}

/** Split sidebar sessions into those created today and the rest. */
export function groupSessionsByDay(sessions: readonly ChatSession[], now = new Date()) {
  const midnight = startOfLocalDay(now).getTime()
  return {
    today: sessions.filter((s) => s.createdAt.getTime() >= midnight),
    previous: sessions.filter((s) => s.createdAt.getTime() < midnight)
  }
}

const interfaceQuerySchema = z.object({ session: z.string().uuid().optional() })

router.get(
  '/',
  route('chat.interface', async (req, res) => {
    const user = authUser(req)
    const { session: requested } = interfaceQuerySchema.parse(req.query)

    let current: ChatSession | null
    if (requested) {
      current = await findUserSession(user.id, requested)
      if (!current) throw notFound('Chat session not found.')
    } else {
      current = await createOrContinueSession(user)
    }

    const [sessions, messages] = await Promise.all([
      recentActiveSessions(user.id, SIDEBAR_SESSIONS),
      listMessages(current.id)
    ])
    res.json({ currentSession: current, messages, ...groupSessionsByDay(sessions) })
  })
)

// Zero-width characters sneak in from copy/paste and would pass the length check.
const ZERO_WIDTH = /[\u200B-\u200F\uFEFF]/g

const postMessageSchema = z.object({
  message: z.string(),
  sessionId: z.string().uuid().optional()
})

/**
 * POST /message
 * Validates input, hands the question to the chat service (which persists
 * both sides of the exchange) and returns the assistant reply.
 */
router.post('/message', rateLimitMessage, async (req: Request, res: Response) => {
  const requestId = requestIdOf(res)
  const startedAt = Date.now()

  const parsed = postMessageSchema.safeParse(req.body)
  const cleanMessage = parsed.success ? parsed.data.message.replace(ZERO_WIDTH, '').trim() : ''
  if (!parsed.success || cleanMessage.length === 0 || cleanMessage.length > env.MAX_MESSAGE_CHARS) {
    log('warn', 'chat.message.validation_failed', {
      requestId,
      issues: parsed.success ? undefined : parsed.error.issues,
      messageLength: cleanMessage.length,
      maxMessageChars: env.MAX_MESSAGE_CHARS
    })
    if (isHtmx(req)) return sendNotice(res, INVALID_MESSAGE, { status: 400 })
    return res.status(400).json({ error: INVALID_MESSAGE })
  }

  const { sessionId } = parsed.data
  try {
    const user = authUser(req)
    log('info', 'chat.message.start', {
      requestId,
      userId: user.id,
      sessionId,
      messageLength: cleanMessage.length
    })

    const result = await generateResponse(user, cleanMessage, sessionId)

    log('info', 'chat.message.finish', {
      requestId,
      sessionId: result.session.id,
      replyLength: result.response.length,
      durationMs: Date.now() - startedAt
    })

    if (isHtmx(req)) return sendFragment(res, chatMessage(result.assistantMessage))
    return res.json({
      status: 'success',
      response: result.response,
      messageId: result.assistantMessage.id,
      sessionId: result.session.id
    })
  } catch (err) {
    log('info', 'chat.message.aborted', { requestId, sessionId, durationMs: Date.now() - startedAt })
    return sendError(req, res, err, 'chat.message')
  }
})

const feedbackSchema = z.object({
  messageId: z.string().uuid(),
  helpful: z.boolean(),
  comment: z.string().trim().max(2000).optional().default('')
})

router.post(
  '/feedback',
  route('chat.feedback', async (req, res) => {
    const user = authUser(req)
    const body = feedbackSchema.parse(req.body)
    const message = await findUserAssistantMessage(user.id, body.messageId)
    if (!message) throw notFound('Message not found.')

    const feedback = await upsertFeedback({ messageId: message.id, helpful: body.helpful, comment: body.comment })
    log('info', 'chat.feedback.saved', { requestId: requestIdOf(res), messageId: message.id, helpful: body.helpful })

    if (isHtmx(req)) return sendNotice(res, 'Thank you for your feedback!', { trigger: 'feedbackSubmitted' })
    res.json({ status: 'success', feedbackId: feedback.id })
  })
)

const HISTORY_FILTERS = ['all', 'today', 'week', 'month'] as const
type HistoryFilter = (typeof HISTORY_FILTERS)[number]

export function historySince(filter: HistoryFilter, now = new Date()) {
  const day = 24 * 60 * 60 * 1000
  switch (filter) {
    case 'today':
      return startOfLocalDay(now)
    case 'week':
      return new Date(now.getTime() - 7 * day)
    case 'month':
      return new Date(now.getTime() - 30 * day)
    case 'all':
      return undefined
  }
}

/**
 * GET /history
 * The caller's active sessions, most recently updated first, optionally
 * filtered by age and by a search over titles and message text.
 */
router.get('/history', rateLimitHistory, async (req: Request, res: Response) => {
  const requestId = requestIdOf(res)
  const startedAt = Date.now()

  const filterParsed = z.enum(HISTORY_FILTERS).safeParse(queryString(req, 'filter') || 'all')
  const filter = filterParsed.success ? filterParsed.data : 'all'
  const q = queryString(req, 'q')

  try {
    const user = authUser(req)
    const page = await listSessionHistory({
      userId: user.id,
      q: q || undefined,
      updatedSince: historySince(filter),
      page: req.query.page,
      pageSize: HISTORY_PAGE_SIZE
    })

    log('info', 'chat.history.finish', {
      requestId,
      filter,
      q: q || undefined,
      returned: page.items.length,
      durationMs: Date.now() - startedAt
    })
    return res.json({ sessions: page.items, pagination: page.pagination, filter, q })
  } catch (err) {
    return sendError(req, res, err, 'chat.history')
  }
})

async function ownSession(req: Request) {
  const session = await findUserSession(authUser(req).id, uuidParam(req, 'id'))
  if (!session) throw notFound('Chat session not found.')
  return session
}

router.get(
  '/sessions/:id',
  route('chat.session.view', async (req, res) => {
    const session = await ownSession(req)
    const messages = await listMessages(session.id)
    if (isHtmx(req)) return sendFragment(res, sessionMessages(messages))
    res.json({ session, messages })
  })
)

const createSessionSchema = z.object({ title: z.string().trim().max(255).optional() })

router.post(
  '/sessions',
  route('chat.session.create', async (req, res) => {
    const user = authUser(req)
    const { title } = createSessionSchema.parse(req.body ?? {})
    const session = await createSession({ userId: user.id, title: title || sessionTitle('Chat') })
    log('info', 'chat.session.created', { requestId: requestIdOf(res), userId: user.id, sessionId: session.id })

    const redirect = `/chat?session=${session.id}`
    if (isHtmx(req)) return sendRedirect(res, redirect)
    res.status(201).json({ status: 'success', sessionId: session.id, redirect })
  })
)

const updateSessionSchema = z.object({
  title: z.string().trim().min(1).max(255).optional(),
  active: z.boolean().optional()
})

router.patch(
  '/sessions/:id',
  route('chat.session.update', async (req, res) => {
    const session = await ownSession(req)
    const patch = updateSessionSchema.parse(req.body)
    const updated = await updateSession(session.id, patch)
    if (!updated) throw notFound('Chat session not found.')
    if (isHtmx(req)) return sendNotice(res, 'Session updated.', { trigger: 'sessionUpdated' })
    res.json({ status: 'success', session: updated })
  })
)

router.delete(
  '/sessions/:id',
  route('chat.session.delete', async (req, res) => {
    const session = await ownSession(req)
    await deleteSession(session.id)
    log('info', 'chat.session.deleted', { requestId: requestIdOf(res), sessionId: session.id })
    if (isHtmx(req)) return sendNotice(res, 'Session deleted.', { trigger: 'sessionDeleted' })
    res.json({ status: 'success' })
  })
)

export default router
