import { randomUUID } from 'node:crypto'
import { pool } from '../db/pool.js'
import { sql } from '../db/sql.js'

export async function recordLoginAttempt(args: {
  email: string
  ipAddress: string | null
  userAgent: string
  successful: boolean
}) {
  const q = sql`
    INSERT INTO login_attempts (id, email, ip_address, user_agent, successful)
    VALUES (${randomUUID()}::uuid, ${args.email.trim().toLowerCase()}, ${args.ipAddress}, ${args.userAgent}, ${args.successful})
  `
  await pool.query(q.text, q.values)
}

/**
 * Failures for an email inside the lockout window that happened after its
 * most recent successful login. A successful login resets the count.
 */
export async function recentFailures(email: string, since: Date) {
  const q = sql`
    SELECT count(*)::int AS failures, max(attempted_at) AS latest
    FROM login_attempts a
    WHERE lower(a.email) = lower(${email})
      AND NOT a.successful
      AND a.attempted_at >= ${since.toISOString()}::timestamptz
      AND a.attempted_at > coalesce(
        (SELECT max(s.attempted_at) FROM login_attempts s WHERE lower(s.email) = lower(${email}) AND s.successful),
        '-infinity'::timestamptz
      )
  `
  const res = await pool.query<{ failures: number; latest: Date | null }>(q.text, q.values)
  return res.rows[0] ?? { failures: 0, latest: null }
}
