export type PageInfo = {
  page: number
  pageSize: number
  totalItems: number
  totalPages: number
  hasNext: boolean
  hasPrevious: boolean
  offset: number
}

export type Page<T> = { items: T[]; pagination: PageInfo }

/**
 * Resolve a requested page number against a row count.
 *
 * Mirrors the forgiving behaviour dashboards rely on: junk or values below 1
 * land on page 1, values past the end land on the last page, and an empty
 * result is still a single (empty) page.
 */
export function paginate(totalItems: number, requestedPage: unknown, pageSize: number): PageInfo {
  const totalPages = Math.max(1, Math.ceil(totalItems / pageSize))

  const rawPage = String(requestedPage ?? '').trim()
  let page = /^-?\d+$/.test(rawPage) ? Number(rawPage) : 1
  if (page < 1) page = 1
  if (page > totalPages) page = totalPages

  return {
    page,
    pageSize,
    totalItems,
    totalPages,
    hasNext: page < totalPages,
    hasPrevious: page > 1,
    offset: (page - 1) * pageSize
  }
}
