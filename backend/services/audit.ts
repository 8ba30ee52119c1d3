import { insertAuditLog, type AuditAction, type AuditChanges, type AuditLog } from '../repos/auditRepo.js'
import { currentContext, type ContextUser } from '../middleware/requestContext.js'
import { errorMeta } from '../errors.js'
import { log } from '../logger.js'

export type AuditState = Record<string, unknown>

export const MASK = '********'

const SENSITIVE_FIELDS = new Set(
  ['password', 'password1', 'password2', 'passwordHash', 'credit_card', 'ssn', 'social_security', 'security_answer'].map(
    (f) => f.toLowerCase()
  )
)

// Hashes change on every save and login timestamps on every login.
const IGNORED_FIELDS = new Set(['password', 'passwordHash', 'lastLogin'])

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v) && !(v instanceof Date)
}

/** Dates become ISO strings so the value can go into a jsonb column. */
export function toJsonValue(v: unknown): unknown {
  if (v instanceof Date) return v.toISOString()
  if (typeof v === 'bigint') return v.toString()
  if (Array.isArray(v)) return v.map(toJsonValue)
  if (isRecord(v)) return Object.fromEntries(Object.entries(v).map(([k, val]) => [k, toJsonValue(val)]))
  return v
}

function sameValue(a: unknown, b: unknown) {
  if (a instanceof Date && b instanceof Date) {
    return Math.floor(a.getTime() / 1000) === Math.floor(b.getTime() / 1000)
  }
  if (a === b) return true
  if (typeof a === 'object' && typeof b === 'object' && a !== null && b !== null) {
    return JSON.stringify(toJsonValue(a)) === JSON.stringify(toJsonValue(b))
  }
  return false
}

/** Fields of `after` whose value differs from `before`. */
export function getChangedFields(before: AuditState, after: AuditState) {
  return Object.keys(after).filter((field) => !IGNORED_FIELDS.has(field) && !sameValue(before[field], after[field]))
}

function maskFields(state: Record<string, unknown>) {
  return Object.fromEntries(
    Object.entries(state).map(([field, value]) => [field, SENSITIVE_FIELDS.has(field.toLowerCase()) ? MASK : value])
  )
}

/** Replace sensitive values inside the `original`, `new` and `deleted` sections. */
export function anonymizeSensitiveData(changes: AuditChanges): AuditChanges {
  const result: AuditChanges = {}
  for (const section of ['original', 'new', 'deleted']) {
    const value = changes[section]
    if (isRecord(value)) result[section] = maskFields(value)
  }
  return result
}

async function recordAudit(args: {
  action: AuditAction
  modelName: string
  objectId: string | number
  changes: AuditChanges | null
  user?: ContextUser | null
}) {
  const ctx = currentContext()
  const user = args.user ?? ctx?.user ?? null
  const changes = args.changes === null ? null : anonymizeSensitiveData(args.changes)
  try {
    await insertAuditLog({
      userId: user?.id ?? null,
      action: args.action,
      modelName: args.modelName,
      objectId: String(args.objectId),
      changes,
      ipAddress: ctx?.ipAddress ?? null,
      userAgent: ctx?.userAgent ?? null
    })
  } catch (err) {
    // never fail the operation being audited
    log('error', 'audit.write_failed', {
      requestId: ctx?.requestId,
      action: args.action,
      modelName: args.modelName,
      objectId: String(args.objectId),
      ...errorMeta(err)
    })
  }
}

export function recordCreate(modelName: string, objectId: string | number, state: AuditState) {
  return recordAudit({ action: 'CREATE', modelName, objectId, changes: { new: toJsonValue(state) } })
}

/** Records only the changed fields; nothing is written when none changed. */
export async function recordUpdate(modelName: string, objectId: string | number, before: AuditState, after: AuditState) {
  const changed = getChangedFields(before, after)
  if (changed.length === 0) return
  await recordAudit({
    action: 'UPDATE',
    modelName,
    objectId,
    changes: {
      original: toJsonValue(Object.fromEntries(changed.map((f) => [f, before[f]]))),
      new: toJsonValue(Object.fromEntries(changed.map((f) => [f, after[f]])))
    }
  })
}

export function recordDelete(modelName: string, objectId: string | number, state: AuditState) {
  return recordAudit({ action: 'DELETE', modelName, objectId, changes: { deleted: toJsonValue(state) } })
}

export function recordAuth(action: 'LOGIN' | 'LOGOUT', user: ContextUser) {
  return recordAudit({ action, modelName: 'User', objectId: user.id, changes: null, user })
}

function displayValue(v: unknown) {
  if (v === null || v === undefined) return 'None'
  if (typeof v === 'string') return v
  return JSON.stringify(v)
}

/** Multi-line, human readable description of a changes payload. */
export function formatChangesForDisplay(changes: AuditChanges | null) {
  if (!changes) return 'No changes recorded'
  const { original, new: next, deleted } = changes
  const lines: string[] = []

  if (isRecord(next) && !isRecord(original)) {
    lines.push('Created new record with:')
    for (const [field, value] of Object.entries(next)) lines.push(`  • ${field}: ${displayValue(value)}`)
  } else if (isRecord(original) && isRecord(next)) {
    lines.push('Updated the following fields:')
    for (const [field, value] of Object.entries(next)) {
      if (field in original && !sameValue(original[field], value)) {
        lines.push(`  • ${field}: ${displayValue(original[field])} → ${displayValue(value)}`)
      }
    }
  } else if (isRecord(deleted)) {
    lines.push('Deleted record with:')
    for (const [field, value] of Object.entries(deleted)) lines.push(`  • ${field}: ${displayValue(value)}`)
  }

  return lines.join('\n')
}

/** One-line summary used in list views. */
export function summarizeChanges(entry: Pick<AuditLog, 'action' | 'modelName' | 'objectId' | 'changes'>) {
  switch (entry.action) {
    case 'LOGIN':
      return 'User logged in'
    case 'LOGOUT':
      return 'User logged out'
    case 'CREATE':
      return `Created ${entry.modelName} ${entry.objectId}`
    case 'DELETE':
      return `Deleted ${entry.modelName} ${entry.objectId}`
    case 'UPDATE': {
      const next = entry.changes?.new
      const fields = isRecord(next) ? Object.keys(next) : []
      if (fields.length === 0) return `Updated ${entry.modelName} ${entry.objectId}`
      return `Updated ${entry.modelName} ${entry.objectId}: ${fields.join(', ')}`
    }
  }
}
