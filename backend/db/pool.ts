import pg from 'pg'
import { env } from '../env.js'
import { errorMeta } from '../errors.js'
import { log } from '../logger.js'

const { Pool } = pg

/**
 * Shared Postgres connection pool.
 *
 * All repositories go through this pool. The connection string comes from
 * DATABASE_URL so it works both locally and on hosted Postgres.
 */
export const pool = new Pool({
  connectionString: env.DATABASE_URL
})

export type Queryable = Pick<pg.PoolClient, 'query'>

/**
 * Run `fn` inside BEGIN/COMMIT on a dedicated client, rolling back when it throws.
 */
export async function withTransaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
  const client = await pool.connect()
  try {
    await client.query('BEGIN')
    const result = await fn(client)
    await client.query('COMMIT')
    return result
  } catch (err) {
    try {
      await client.query('ROLLBACK')
    } catch (rollbackErr) {
      log('error', 'db.rollback.failed', errorMeta(rollbackErr))
    }
    throw err
  } finally {
    client.release()
  }
}
