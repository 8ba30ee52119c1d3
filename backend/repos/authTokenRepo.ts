import { randomUUID } from 'node:crypto'
import { pool, withTransaction } from '../db/pool.js'
import { sql } from '../db/sql.js'

type TokenRow = {
  id: string
  user_id: number
  token: string
  created_at: Date
  expires_at: Date
  flag: boolean
}

export type EmailVerification = {
  id: string
  userId: number
  token: string
  createdAt: Date
  expiresAt: Date
  verified: boolean
}

export type PasswordReset = {
  id: string
  userId: number
  token: string
  createdAt: Date
  expiresAt: Date
  used: boolean
}

export function isExpired(token: { expiresAt: Date }, now = new Date()) {
  return token.expiresAt.getTime() <= now.getTime()
}

export async function createEmailVerification(args: { userId: number; token: string; expiresAt: Date }) {
  const id = randomUUID()
  const q = sql`
    INSERT INTO email_verifications (id, user_id, token, expires_at)
    VALUES (${id}::uuid, ${args.userId}, ${args.token}, ${args.expiresAt.toISOString()}::timestamptz)
  `
  await pool.query(q.text, q.values)
  return id
}

export async function findEmailVerification(token: string): Promise<EmailVerification | null> {
  const q = sql`
    SELECT id, user_id, token, created_at, expires_at, verified AS flag
    FROM email_verifications WHERE token = ${token}
  `
  const res = await pool.query<TokenRow>(q.text, q.values)
  const row = res.rows[0]
  if (!row) return null
  return {
    id: row.id,
    userId: row.user_id,
    token: row.token,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    verified: row.flag
  }
}

/** Flag the token and its user as verified together. */
export async function completeEmailVerification(verification: Pick<EmailVerification, 'id' | 'userId'>) {
  await withTransaction(async (client) => {
    const mark = sql`UPDATE email_verifications SET verified = true WHERE id = ${verification.id}::uuid`
    await client.query(mark.text, mark.values)
    const user = sql`UPDATE users SET is_email_verified = true WHERE id = ${verification.userId}`
    await client.query(user.text, user.values)
  })
}

export async function createPasswordReset(args: { userId: number; token: string; expiresAt: Date }) {
  const id = randomUUID()
  const q = sql`
    INSERT INTO password_resets (id, user_id, token, expires_at)
    VALUES (${id}::uuid, ${args.userId}, ${args.token}, ${args.expiresAt.toISOString()}::timestamptz)
  `
  await pool.query(q.text, q.values)
  return id
}

export async function findPasswordReset(token: string): Promise<PasswordReset | null> {
  const q = sql`
    SELECT id, user_id, token, created_at, expires_at, used AS flag
    FROM password_resets WHERE token = ${token}
  `
  const res = await pool.query<TokenRow>(q.text, q.values)
  const row = res.rows[0]
  if (!row) return null
  return {
    id: row.id,
    userId: row.user_id,
    token: row.token,
    createdAt: row.created_at,
    expiresAt: row.expires_at,
    used: row.flag
  }
}

/**
 * Burn the token and store the new hash in one transaction. False when the
 * token was already used, in which case the password is left alone.
 */
export async function completePasswordReset(reset: Pick<PasswordReset, 'id' | 'userId'>, passwordHash: string) {
  return withTransaction(async (client) => {
    const mark = sql`UPDATE password_resets SET used = true WHERE id = ${reset.id}::uuid AND NOT used RETURNING id`
    const marked = await client.query(mark.text, mark.values)
    if ((marked.rowCount ?? 0) === 0) return false
    const user = sql`UPDATE users SET password_hash = ${passwordHash} WHERE id = ${reset.userId}`
    await client.query(user.text, user.values)
    return true
  })
}
