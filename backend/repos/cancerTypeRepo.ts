import { pool } from '../db/pool.js'
import { fragment, join, raw, sql, where } from '../db/sql.js'

type CancerTypeRow = {
  id: number
  name: string
  description: string
  parent_id: number | null
  parent_name: string | null
  is_organ: boolean
}

export type CancerType = {
  id: number
  name: string
  description: string
  parentId: number | null
  parentName: string | null
  isOrgan: boolean
  fullName: string
}

const SELECT_CANCER_TYPE = raw(`
  SELECT c.id, c.name, c.description, c.parent_id, p.name AS parent_name, c.is_organ
  FROM cancer_types c
  LEFT JOIN cancer_types p ON p.id = c.parent_id
`)

export function cancerTypeFullName(t: { name: string; parentName: string | null }) {
  return t.parentName ? `${t.parentName} - ${t.name}` : t.name
}

function toCancerType(row: CancerTypeRow): CancerType {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    parentId: row.parent_id,
    parentName: row.parent_name,
    isOrgan: row.is_organ,
    fullName: cancerTypeFullName({ name: row.name, parentName: row.parent_name })
  }
}

export async function listCancerTypes(opts: { organsOnly?: boolean } = {}) {
  const filter = where(opts.organsOnly ? [fragment`c.is_organ`] : [])
  const q = sql`${SELECT_CANCER_TYPE} ${filter} ORDER BY coalesce(p.name, c.name), c.parent_id NULLS FIRST, c.name`
  const res = await pool.query<CancerTypeRow>(q.text, q.values)
  return res.rows.map(toCancerType)
}

export async function listSubtypes(organId: number) {
  const q = sql`${SELECT_CANCER_TYPE} WHERE c.parent_id = ${organId} ORDER BY c.name`
  const res = await pool.query<CancerTypeRow>(q.text, q.values)
  return res.rows.map(toCancerType)
}

export async function findCancerType(id: number) {
  const q = sql`${SELECT_CANCER_TYPE} WHERE c.id = ${id}`
  const res = await pool.query<CancerTypeRow>(q.text, q.values)
  return res.rows[0] ? toCancerType(res.rows[0]) : null
}

/** True when another row already uses this name under the same parent. */
export async function cancerTypeNameTaken(args: { name: string; parentId: number | null; excludeId?: number }) {
  const conditions = [
    fragment`lower(name) = lower(${args.name})`,
    fragment`coalesce(parent_id, 0) = ${args.parentId ?? 0}`
  ]
  if (args.excludeId !== undefined) conditions.push(fragment`id <> ${args.excludeId}`)
  const q = sql`SELECT 1 FROM cancer_types ${where(conditions)}`
  const res = await pool.query(q.text, q.values)
  return (res.rowCount ?? 0) > 0
}

export async function createCancerType(args: { name: string; description: string; parentId: number | null }) {
  const q = sql`
    INSERT INTO cancer_types (name, description, parent_id, is_organ)
    VALUES (${args.name}, ${args.description}, ${args.parentId}, ${args.parentId === null})
    RETURNING id
  `
  const res = await pool.query<{ id: number }>(q.text, q.values)
  const id = res.rows[0]?.id
  if (id === undefined) throw new Error('Cancer type insert returned no row')
  return findCancerType(id)
}

export async function updateCancerType(
  id: number,
  patch: Partial<{ name: string; description: string; parentId: number | null }>
) {
  const assignments = []
  if (patch.name !== undefined) assignments.push(fragment`name = ${patch.name}`)
  if (patch.description !== undefined) assignments.push(fragment`description = ${patch.description}`)
  if (patch.parentId !== undefined) {
    assignments.push(fragment`parent_id = ${patch.parentId}`)
    assignments.push(fragment`is_organ = ${patch.parentId === null}`)
  }
  if (assignments.length > 0) {
    const q = sql`UPDATE cancer_types SET ${join(assignments, ', ')} WHERE id = ${id}`
    await pool.query(q.text, q.values)
  }
  return findCancerType(id)
}

export async function deleteCancerType(id: number) {
  const q = sql`DELETE FROM cancer_types WHERE id = ${id}`
  const res = await pool.query(q.text, q.values)
  return (res.rowCount ?? 0) > 0
}

export async function countCancerTypes() {
  const res = await pool.query<{ total: number }>('SELECT count(*)::int AS total FROM cancer_types')
  return res.rows[0]?.total ?? 0
}
