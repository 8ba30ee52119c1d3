import { randomUUID } from 'node:crypto'
import { pool } from '../db/pool.js'
import { paginate, type Page } from '../db/pagination.js'
import { containsPattern, fragment, join, raw, sql, where } from '../db/sql.js'

export type MessageRole = 'user' | 'assistant' | 'system'

type SessionRow = {
  id: string
  user_id: number
  title: string
  created_at: Date
  updated_at: Date
  active: boolean
}

export type ChatSession = {
  id: string
  userId: number
  title: string
  createdAt: Date
  updatedAt: Date
  active: boolean
}

type MessageRow = {
  id: string
  session_id: string
  role: MessageRole
  content: string
  created_at: Date
}

export type ChatMessage = {
  id: string
  sessionId: string
  role: MessageRole
  content: string
  createdAt: Date
}

const SESSION_COLUMNS = raw('id, user_id, title, created_at, updated_at, active')
const MESSAGE_COLUMNS = raw('id, session_id, role, content, created_at')

function toSession(row: SessionRow): ChatSession {
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    active: row.active
  }
}

function toMessage(row: MessageRow): ChatMessage {
  return {
    id: row.id,
    sessionId: row.session_id,
    role: row.role,
    content: row.content,
    createdAt: row.created_at
  }
}

export async function createSession(args: { userId: number; title: string }) {
  const q = sql`
    INSERT INTO chat_sessions (id, user_id, title)
    VALUES (${randomUUID()}::uuid, ${args.userId}, ${args.title})
    RETURNING ${SESSION_COLUMNS}
  `
  const res = await pool.query<SessionRow>(q.text, q.values)
  const row = res.rows[0]
  if (!row) throw new Error('Session insert returned no row')
  return toSession(row)
}

/** A session only when it belongs to the given user. */
export async function findUserSession(userId: number, sessionId: string) {
  const q = sql`SELECT ${SESSION_COLUMNS} FROM chat_sessions WHERE id = ${sessionId}::uuid AND user_id = ${userId}`
  const res = await pool.query<SessionRow>(q.text, q.values)
  return res.rows[0] ? toSession(res.rows[0]) : null
}

export async function latestActiveSession(userId: number) {
  const q = sql`
    SELECT ${SESSION_COLUMNS} FROM chat_sessions
    WHERE user_id = ${userId} AND active
    ORDER BY updated_at DESC, id DESC
    LIMIT 1
  `
  const res = await pool.query<SessionRow>(q.text, q.values)
  return res.rows[0] ? toSession(res.rows[0]) : null
}

export async function recentActiveSessions(userId: number, limit: number) {
  const q = sql`
    SELECT ${SESSION_COLUMNS} FROM chat_sessions
    WHERE user_id = ${userId} AND active
    ORDER BY updated_at DESC, id DESC
    LIMIT ${limit}
  `
  const res = await pool.query<SessionRow>(q.text, q.values)
  return res.rows.map(toSession)
}

export async function touchSession(sessionId: string) {
  const q = sql`UPDATE chat_sessions SET updated_at = now() WHERE id = ${sessionId}::uuid`
  await pool.query(q.text, q.values)
}

export async function updateSession(sessionId: string, patch: { title?: string; active?: boolean }) {
  const assignments = [fragment`updated_at = now()`]
  if (patch.title !== undefined) assignments.push(fragment`title = ${patch.title}`)
  if (patch.active !== undefined) assignments.push(fragment`active = ${patch.active}`)
  const q = sql`
    UPDATE chat_sessions SET ${join(assignments, ', ')}
    WHERE id = ${sessionId}::uuid
    RETURNING ${SESSION_COLUMNS}
  `
  const res = await pool.query<SessionRow>(q.text, q.values)
  return res.rows[0] ? toSession(res.rows[0]) : null
}

export async function deleteSession(sessionId: string) {
  const q = sql`DELETE FROM chat_sessions WHERE id = ${sessionId}::uuid`
  await pool.query(q.text, q.values)
}

export type SessionSummary = ChatSession & { messageCount: number }

/**
 * Page through a user's active sessions, newest activity first. `q` matches
 * the title or the content of any message in the session.
 */
export async function listSessionHistory(args: {
  userId: number
  q?: string
  updatedSince?: Date
  page?: unknown
  pageSize: number
}): Promise<Page<SessionSummary>> {
  const conditions = [fragment`s.user_id = ${args.userId}`, fragment`s.active`]
  if (args.updatedSince) conditions.push(fragment`s.updated_at >= ${args.updatedSince.toISOString()}::timestamptz`)
  if (args.q) {
    const pattern = containsPattern(args.q)
    conditions.push(fragment`(
      s.title ILIKE ${pattern}
      OR EXISTS (SELECT 1 FROM chat_messages m WHERE m.session_id = s.id AND m.content ILIKE ${pattern})
    )`)
  }
  const filter = where(conditions)

  const countQ = sql`SELECT count(*)::int AS total FROM chat_sessions s ${filter}`
  const countRes = await pool.query<{ total: number }>(countQ.text, countQ.values)
  const pagination = paginate(countRes.rows[0]?.total ?? 0, args.page, args.pageSize)

  const q = sql`
    SELECT s.id, s.user_id, s.title, s.created_at, s.updated_at, s.active,
           (SELECT count(*)::int FROM chat_messages m WHERE m.session_id = s.id) AS message_count
    FROM chat_sessions s
    ${filter}
    ORDER BY s.updated_at DESC, s.id DESC
    LIMIT ${pagination.pageSize} OFFSET ${pagination.offset}
  `
  const res = await pool.query<SessionRow & { message_count: number }>(q.text, q.values)
  return {
    items: res.rows.map((row) => ({ ...toSession(row), messageCount: row.message_count })),
    pagination
  }
}

/**
 * Insert a single message and bump the session's updated_at so it sorts to
 * the top of the sidebar.
 */
export async function insertMessage(args: { sessionId: string; role: MessageRole; content: string; createdAt?: Date }) {
  const id = randomUUID()
  const createdAt = args.createdAt ?? new Date()

  const q = sql`
    INSERT INTO chat_messages (id, session_id, role, content, created_at)
    VALUES (${id}::uuid, ${args.sessionId}::uuid, ${args.role}, ${args.content}, ${createdAt.toISOString()}::timestamptz)
  `
  await pool.query(q.text, q.values)
  await touchSession(args.sessionId)

  const message: ChatMessage = { id, sessionId: args.sessionId, role: args.role, content: args.content, createdAt }
  return message
}

/**
 * Most recent messages of a session, returned oldest -> newest.
 */
export async function getRecentMessages(sessionId: string, limit: number) {
  const q = sql`
    SELECT ${MESSAGE_COLUMNS}
    FROM chat_messages
    WHERE session_id = ${sessionId}::uuid
    ORDER BY created_at DESC, id DESC
    LIMIT ${limit}
  `
  const res = await pool.query<MessageRow>(q.text, q.values)
  return res.rows.map(toMessage).reverse()
}

export async function listMessages(sessionId: string) {
  const q = sql`
    SELECT ${MESSAGE_COLUMNS}
    FROM chat_messages
    WHERE session_id = ${sessionId}::uuid
    ORDER BY created_at, id
  `
  const res = await pool.query<MessageRow>(q.text, q.values)
  return res.rows.map(toMessage)
}

/** An assistant message, but only when it sits in one of the user's sessions. */
export async function findUserAssistantMessage(userId: number, messageId: string) {
  const q = sql`
    SELECT m.id, m.session_id, m.role, m.content, m.created_at
    FROM chat_messages m
    JOIN chat_sessions s ON s.id = m.session_id
    WHERE m.id = ${messageId}::uuid AND s.user_id = ${userId} AND m.role = 'assistant'
  `
  const res = await pool.query<MessageRow>(q.text, q.values)
  return res.rows[0] ? toMessage(res.rows[0]) : null
}

export type ChatFeedback = { id: string; messageId: string; helpful: boolean; comment: string; createdAt: Date }

/** One feedback row per message; a second submission replaces the first. */
export async function upsertFeedback(args: { messageId: string; helpful: boolean; comment: string }) {
  const q = sql`
    INSERT INTO chat_feedback (id, message_id, helpful, comment)
    VALUES (${randomUUID()}::uuid, ${args.messageId}::uuid, ${args.helpful}, ${args.comment})
    ON CONFLICT (message_id) DO UPDATE SET helpful = EXCLUDED.helpful, comment = EXCLUDED.comment, created_at = now()
    RETURNING id, message_id, helpful, comment, created_at
  `
  const res = await pool.query<{ id: string; message_id: string; helpful: boolean; comment: string; created_at: Date }>(
    q.text,
    q.values
  )
  const row = res.rows[0]
  if (!row) throw new Error('Feedback upsert returned no row')
  const feedback: ChatFeedback = {
    id: row.id,
    messageId: row.message_id,
    helpful: row.helpful,
    comment: row.comment,
    createdAt: row.created_at
  }
  return feedback
}

export type FeedbackEntry = ChatFeedback & { messageContent: string; sessionTitle: string; userEmail: string }

export async function listFeedback(args: { helpful?: boolean; page?: unknown; pageSize: number }): Promise<Page<FeedbackEntry>> {
  const filter = where(args.helpful === undefined ? [] : [fragment`f.helpful = ${args.helpful}`])
  const countQ = sql`SELECT count(*)::int AS total FROM chat_feedback f ${filter}`
  const countRes = await pool.query<{ total: number }>(countQ.text, countQ.values)
  const pagination = paginate(countRes.rows[0]?.total ?? 0, args.page, args.pageSize)

  const q = sql`
    SELECT f.id, f.message_id, f.helpful, f.comment, f.created_at,
           m.content AS message_content, s.title AS session_title, u.email AS user_email
    FROM chat_feedback f
    JOIN chat_messages m ON m.id = f.message_id
    JOIN chat_sessions s ON s.id = m.session_id
    JOIN users u ON u.id = s.user_id
    ${filter}
    ORDER BY f.created_at DESC, f.id DESC
    LIMIT ${pagination.pageSize} OFFSET ${pagination.offset}
  `
  const res = await pool.query<{
    id: string
    message_id: string
    helpful: boolean
    comment: string
    created_at: Date
    message_content: string
    session_title: string
    user_email: string
  }>(q.text, q.values)

  return {
    items: res.rows.map((row) => ({
      id: row.id,
      messageId: row.message_id,
      helpful: row.helpful,
      comment: row.comment,
      createdAt: row.created_at,
      messageContent: row.message_content,
      sessionTitle: row.session_title,
      userEmail: row.user_email
    })),
    pagination
  }
}

export type ChatUsage = {
  totalSessions: number
  totalMessages: number
  uniqueUsers: number
  feedbackTotal: number
  feedbackHelpful: number
}

/**
 * Usage counters for [start, end). Each count is bounded by its own row's
 * created_at, so messages and feedback left in older sessions still count.
 */
export async function chatUsage(start: Date, end: Date): Promise<ChatUsage> {
  const from = start.toISOString()
  const to = end.toISOString()
  const inRange = (column: string) => fragment`${raw(column)} >= ${from}::timestamptz AND ${raw(column)} < ${to}::timestamptz`
  const q = sql`
    SELECT
      (SELECT count(*)::int FROM chat_sessions s WHERE ${inRange('s.created_at')}) AS total_sessions,
      (SELECT count(*)::int FROM chat_messages m WHERE ${inRange('m.created_at')}) AS total_messages,
      (SELECT count(DISTINCT s.user_id)::int FROM chat_sessions s WHERE ${inRange('s.created_at')}) AS unique_users,
      (SELECT count(*)::int FROM chat_feedback f WHERE ${inRange('f.created_at')}) AS feedback_total,
      (SELECT count(*)::int FROM chat_feedback f WHERE ${inRange('f.created_at')} AND f.helpful) AS feedback_helpful
  `
  const res = await pool.query<{
    total_sessions: number
    total_messages: number
    unique_users: number
    feedback_total: number
    feedback_helpful: number
  }>(q.text, q.values)
  const row = res.rows[0]
  return {
    totalSessions: row?.total_sessions ?? 0,
    totalMessages: row?.total_messages ?? 0,
    uniqueUsers: row?.unique_users ?? 0,
    feedbackTotal: row?.feedback_total ?? 0,
    feedbackHelpful: row?.feedback_helpful ?? 0
  }
}

export async function countSessionsSince(since: Date) {
  const q = sql`SELECT count(*)::int AS total FROM chat_sessions WHERE created_at >= ${since.toISOString()}::timestamptz`
  const res = await pool.query<{ total: number }>(q.text, q.values)
  return res.rows[0]?.total ?? 0
}
