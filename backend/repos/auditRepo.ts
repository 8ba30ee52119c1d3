import { randomUUID } from 'node:crypto'
import { pool, withTransaction } from '../db/pool.js'
import { paginate, type Page } from '../db/pagination.js'
import { containsPattern, fragment, raw, sql, where } from '../db/sql.js'

export const AUDIT_ACTIONS = ['CREATE', 'UPDATE', 'DELETE', 'LOGIN', 'LOGOUT'] as const
export type AuditAction = (typeof AUDIT_ACTIONS)[number]

export const AUDIT_SORT_FIELDS = ['timestamp', 'model_name', 'action', 'user', 'object_id'] as const
export type AuditSortField = (typeof AUDIT_SORT_FIELDS)[number]

const SORT_COLUMNS: Record<AuditSortField, string> = {
  timestamp: 'a.timestamp',
  model_name: 'a.model_name',
  action: 'a.action',
  user: 'u.email',
  object_id: 'a.object_id'
}

export type AuditChanges = Record<string, unknown>

type AuditLogRow = {
  id: string
  user_id: number | null
  user_email: string | null
  action: AuditAction
  model_name: string
  object_id: string
  changes: AuditChanges | null
  timestamp: Date
  ip_address: string | null
  user_agent: string | null
}

export type AuditLog = {
  id: string
  userId: number | null
  userEmail: string | null
  action: AuditAction
  modelName: string
  objectId: string
  changes: AuditChanges | null
  timestamp: Date
  ipAddress: string | null
  userAgent: string | null
}

function toAuditLog(row: AuditLogRow): AuditLog {
  return {
    id: row.id,
    userId: row.user_id,
    userEmail: row.user_email,
    action: row.action,
    modelName: row.model_name,
    objectId: row.object_id,
    changes: row.changes,
    timestamp: row.timestamp,
    ipAddress: row.ip_address,
    userAgent: row.user_agent
  }
}

export async function insertAuditLog(args: {
  userId: number | null
  action: AuditAction
  modelName: string
  objectId: string
  changes: AuditChanges | null
  ipAddress: string | null
  userAgent: string | null
}): Promise<string> {
  const id = randomUUID()
  const q = sql`
    INSERT INTO audit_logs (id, user_id, action, model_name, object_id, changes, ip_address, user_agent)
    VALUES (
      ${id}::uuid, ${args.userId}, ${args.action}, ${args.modelName}, ${args.objectId},
      ${args.changes === null ? null : JSON.stringify(args.changes)}::jsonb, ${args.ipAddress}, ${args.userAgent}
    )
  `
  await pool.query(q.text, q.values)
  return id
}

export type AuditLogFilters = {
  q?: string
  model?: string
  action?: AuditAction
  userId?: number
  startDate?: string
  endDate?: string
  sort: AuditSortField
  order: 'asc' | 'desc'
  page?: unknown
  pageSize: number
}

export async function listAuditLogs(filters: AuditLogFilters): Promise<Page<AuditLog>> {
  const conditions = []
  if (filters.q) {
    const pattern = containsPattern(filters.q)
    conditions.push(
      fragment`(a.model_name ILIKE ${pattern} OR a.object_id ILIKE ${pattern} OR u.email ILIKE ${pattern} OR a.changes::text ILIKE ${pattern})`
    )
  }
  if (filters.model) conditions.push(fragment`a.model_name = ${filters.model}`)
  if (filters.action) conditions.push(fragment`a.action = ${filters.action}`)
  if (filters.userId !== undefined) conditions.push(fragment`a.user_id = ${filters.userId}`)
  if (filters.startDate) conditions.push(fragment`a.timestamp >= ${filters.startDate}::date`)
  // end date is inclusive of the whole day
  if (filters.endDate) conditions.push(fragment`a.timestamp < ${filters.endDate}::date + 1`)

  const filter = where(conditions)
  const countQ = sql`SELECT count(*)::int AS total FROM audit_logs a LEFT JOIN users u ON u.id = a.user_id ${filter}`
  const countRes = await pool.query<{ total: number }>(countQ.text, countQ.values)
  const pagination = paginate(countRes.rows[0]?.total ?? 0, filters.page, filters.pageSize)

  const direction = filters.order === 'asc' ? 'ASC' : 'DESC'
  const q = sql`
    SELECT a.id, a.user_id, u.email AS user_email, a.action, a.model_name, a.object_id, a.changes,
           a.timestamp, a.ip_address, a.user_agent
    FROM audit_logs a
    LEFT JOIN users u ON u.id = a.user_id
    ${filter}
    ORDER BY ${raw(`${SORT_COLUMNS[filters.sort]} ${direction} NULLS LAST, a.id ${direction}`)}
    LIMIT ${pagination.pageSize} OFFSET ${pagination.offset}
  `
  const res = await pool.query<AuditLogRow>(q.text, q.values)
  return { items: res.rows.map(toAuditLog), pagination }
}

export async function listAuditedModels() {
  const res = await pool.query<{ model_name: string }>(
    'SELECT DISTINCT model_name FROM audit_logs ORDER BY model_name'
  )
  return res.rows.map((r) => r.model_name)
}

export async function listAuditedUsers() {
  const res = await pool.query<{ id: number; email: string }>(`
    SELECT DISTINCT u.id, u.email
    FROM audit_logs a JOIN users u ON u.id = a.user_id
    ORDER BY u.email
  `)
  return res.rows
}

/**
 * Move entries older than the cutoff into audit_log_archive. The user email
 * is copied so archived rows stay readable after the account is removed.
 */
export async function archiveAuditLogs(cutoff: Date) {
  return withTransaction(async (client) => {
    const copy = sql`
      INSERT INTO audit_log_archive (id, user_id, user_email, action, model_name, object_id, changes, timestamp, ip_address, user_agent)
      SELECT a.id, a.user_id::text, u.email, a.action, a.model_name, a.object_id, a.changes, a.timestamp, a.ip_address, a.user_agent
      FROM audit_logs a LEFT JOIN users u ON u.id = a.user_id
      WHERE a.timestamp < ${cutoff.toISOString()}::timestamptz
      ON CONFLICT (id) DO NOTHING
    `
    await client.query(copy.text, copy.values)
    const remove = sql`DELETE FROM audit_logs WHERE timestamp < ${cutoff.toISOString()}::timestamptz`
    const res = await client.query(remove.text, remove.values)
    return res.rowCount ?? 0
  })
}
