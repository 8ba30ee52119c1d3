export type SqlParams = unknown[]

export type SqlQuery = { text: string; values: SqlParams }

const FRAGMENT = Symbol('sql.fragment')

type SqlFragment = { [FRAGMENT]: true; strings: readonly string[]; values: unknown[] }

function isFragment(v: unknown): v is SqlFragment {
  return typeof v === 'object' && v !== null && FRAGMENT in v
}

/**
 * Tagged template helper that builds parameterized SQL.
 *
 * Usage:
 *   const q = sql`SELECT * FROM t WHERE id = ${id}`
 *   await pool.query(q.text, q.values)
 *
 * Each interpolation becomes a $1, $2, ... placeholder. Values produced by
 * `raw` or `fragment` are spliced in as SQL so optional WHERE clauses can be
 * composed without string concatenation at the call site.
 */
export const sql = (strings: TemplateStringsArray, ...values: unknown[]): SqlQuery => {
  let text = ''
  const params: SqlParams = []

  const append = (chunks: readonly string[], vals: unknown[]) => {
    chunks.forEach((chunk, i) => {
      text += chunk
      if (i >= vals.length) return
      const v = vals[i]
      if (isFragment(v)) {
        append(v.strings, v.values)
      } else {
        params.push(v)
        text += `$${params.length}`
      }
    })
  }

  append(strings, values)
  return { text, values: params }
}

/** A composable piece of SQL whose own interpolations stay parameterized. */
export const fragment = (strings: TemplateStringsArray, ...values: unknown[]): SqlFragment => ({
  [FRAGMENT]: true,
  strings: [...strings],
  values
})

/** Trusted SQL text (identifiers from a whitelist, keywords). Never pass user input. */
export const raw = (text: string): SqlFragment => ({ [FRAGMENT]: true, strings: [text], values: [] })

export const empty = raw('')

/** Join fragments with a separator, e.g. `AND` between WHERE conditions. */
export function join(parts: SqlFragment[], separator: string): SqlFragment {
  if (parts.length === 0) return empty
  const strings: string[] = ['']
  const values: unknown[] = []
  parts.forEach((part, i) => {
    if (i > 0) strings[strings.length - 1] += separator
    values.push(part)
    strings.push('')
  })
  return { [FRAGMENT]: true, strings, values }
}

/** `WHERE a AND b ...`, or nothing when there are no conditions. */
export function where(conditions: SqlFragment[]): SqlFragment {
  if (conditions.length === 0) return empty
  return fragment`WHERE ${join(conditions, ' AND ')}`
}

/**
 * `%text%` for a LIKE/ILIKE substring match, with the wildcards `%` and `_`
 * and the escape character `\` in `text` matched literally. Backslash is the
 * default LIKE escape in Postgres.
 */
export function containsPattern(text: string) {
  return `%${text.replace(/[\\%_]/g, '\\$&')}%`
}
