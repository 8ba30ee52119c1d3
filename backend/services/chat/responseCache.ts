import { createHash } from 'node:crypto'
import { env } from '../../env.js'

type CacheEntry = { response: string; expiresAt: number; hits: number }

export type CacheContext = Record<string, string | number | null>

export type CacheStats = {
  size: number
  exactHits: number
  misses: number
  evictions: number
  hitRate: number
  trackedQueries: number
}

export type ResponseCacheOptions = {
  ttlMs: number
  maxEntries: number
  popularTtlMs?: number
  /** A query asked more often than this is cached with popularTtlMs. */
  popularThreshold?: number
  now?: () => number
}

export function normalizeQuery(query: string) {
  return query.trim().toLowerCase().replace(/\s+/g, ' ')
}

/**
 * Process-local LRU cache of assistant answers with per-entry TTL.
 *
 * Map iteration order is insertion order, so re-inserting on every hit keeps
 * the least recently used entry first in line for eviction.
 */
export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly askedCounts = new Map<string, number>()
  private exactHits = 0
  private misses = 0
  private evictions = 0

  private readonly ttlMs: number
  private readonly maxEntries: number
  private readonly maxTrackedQueries: number
  private readonly popularTtlMs: number
  private readonly popularThreshold: number
  private readonly now: () => number

  constructor(opts: ResponseCacheOptions) {
    this.ttlMs = opts.ttlMs
    this.maxEntries = opts.maxEntries
    this.maxTrackedQueries = opts.maxEntries * 4
    this.popularTtlMs = opts.popularTtlMs ?? 24 * 60 * 60 * 1000
    this.popularThreshold = opts.popularThreshold ?? 10
    this.now = opts.now ?? Date.now
  }

  static key(query: string, context: CacheContext = {}) {
    const sorted = Object.fromEntries(Object.entries(context).sort(([a], [b]) => a.localeCompare(b)))
    const payload = JSON.stringify({ query: normalizeQuery(query), context: sorted })
    return createHash('sha256').update(payload).digest('hex')
  }

  get(query: string, context: CacheContext = {}) {
    this.countAsked(normalizeQuery(query))

    const key = ResponseCache.key(query, context)
    const entry = this.entries.get(key)
    if (!entry) {
      this.misses += 1
      return null
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key)
      this.misses += 1
      return null
    }

    this.entries.delete(key)
    entry.hits += 1
    this.entries.set(key, entry)
    this.exactHits += 1
    return entry.response
  }

  /** Popularity counts are kept for the most recently asked queries only. */
  private countAsked(normalized: string) {
    const count = (this.askedCounts.get(normalized) ?? 0) + 1
    this.askedCounts.delete(normalized)
    this.askedCounts.set(normalized, count)
    while (this.askedCounts.size > this.maxTrackedQueries) {
      const oldest = this.askedCounts.keys().next()
      if (oldest.done) break
      this.askedCounts.delete(oldest.value)
    }
  }

  isPopular(query: string) {
    return (this.askedCounts.get(normalizeQuery(query)) ?? 0) > this.popularThreshold
  }

  set(query: string, response: string, context: CacheContext = {}) {
    const key = ResponseCache.key(query, context)
    const ttl = this.isPopular(query) ? this.popularTtlMs : this.ttlMs
    this.entries.delete(key)
    this.entries.set(key, { response, expiresAt: this.now() + ttl, hits: 0 })

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
      this.evictions += 1
    }
  }

  /** Drop every cached answer, e.g. after the knowledge base changed. */
  clear() {
    this.entries.clear()
    this.askedCounts.clear()
  }

  stats(): CacheStats {
    const lookups = this.exactHits + this.misses
    return {
      size: this.entries.size,
      exactHits: this.exactHits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : Math.round((this.exactHits / lookups) * 1000) / 10,
      trackedQueries: this.askedCounts.size
    }
  }
}

export const responseCache = new ResponseCache({
  ttlMs: env.RESPONSE_CACHE_TTL_MS,
  maxEntries: env.RESPONSE_CACHE_MAX_ENTRIES
})
