import { describe, expect, it } from 'vitest'
import { ResponseCache, normalizeQuery } from './responseCache.js'

function clock(start = 0) {
  let t = start
  return { now: () => t, advance: (ms: number) => (t += ms) }
}

describe('normalizeQuery', () => {
  it('lowercases and collapses whitespace', () => {
    expect(normalizeQuery('  What   IS\nChemo? ')).toBe('what is chemo?')
  })
})

describe('ResponseCache', () => {
  it('returns cached answers for the same normalized query and context', () => {
    const cache = new ResponseCache({ ttlMs: 1_000, maxEntries: 10 })
    cache.set('What is chemo?', 'answer', { userId: 1, language: 'en' })
    expect(cache.get('what   is CHEMO?', { language: 'en', userId: 1 })).toBe('answer')
    expect(cache.get('what is chemo?', { userId: 2, language: 'en' })).toBeNull()
  })

  it('expires entries after the ttl', () => {
    const c = clock()
    const cache = new ResponseCache({ ttlMs: 1_000, maxEntries: 10, now: c.now })
    cache.set('q', 'a')
    c.advance(999)
    expect(cache.get('q')).toBe('a')
    c.advance(1)
    expect(cache.get('q')).toBeNull()
  })

  it('evicts the least recently used entry', () => {
    const cache = new ResponseCache({ ttlMs: 10_000, maxEntries: 2 })
    cache.set('one', '1')
    cache.set('two', '2')
    cache.get('one')
    cache.set('three', '3')
    expect(cache.get('two')).toBeNull()
    expect(cache.get('one')).toBe('1')
    expect(cache.stats().evictions).toBe(1)
  })

  it('keeps popular questions for the long ttl', () => {
    const c = clock()
    const cache = new ResponseCache({ ttlMs: 1_000, maxEntries: 10, popularTtlMs: 50_000, popularThreshold: 2, now: c.now })
    cache.get('popular')
    cache.get('popular')
    cache.get('popular')
    expect(cache.isPopular('popular')).toBe(true)
    cache.set('popular', 'a')
    c.advance(10_000)
    expect(cache.get('popular')).toBe('a')
  })

  it('reports hits, misses and the hit rate', () => {
    const cache = new ResponseCache({ ttlMs: 1_000, maxEntries: 10 })
    cache.get('x')
    cache.get('x')
    cache.set('x', 'a')
    cache.get('x')
    expect(cache.stats()).toEqual({ size: 1, exactHits: 1, misses: 2, evictions: 0, hitRate: 33.3, trackedQueries: 1 })
  })

  it('clear drops every entry and the popularity counts', () => {
    const cache = new ResponseCache({ ttlMs: 1_000, maxEntries: 10, popularThreshold: 1 })
    cache.set('x', 'a')
    cache.get('x')
    cache.get('x')
    expect(cache.isPopular('x')).toBe(true)
    cache.clear()
    expect(cache.isPopular('x')).toBe(false)
    expect(cache.stats().trackedQueries).toBe(0)
  })

  it('tracks popularity for a bounded number of distinct questions', () => {
    const cache = new ResponseCache({ ttlMs: 1_000, maxEntries: 10 })
    for (let i = 0; i < 5_000; i += 1) cache.get(`question ${i}`)
    expect(cache.stats().trackedQueries).toBe(40)
    cache.get('question 0')
    expect(cache.stats().trackedQueries).toBe(40)
  })
})
