import { describe, expect, it } from 'vitest'
import { formatMeta, formatValue } from './logger.js'

describe('formatMeta', () => {
  it('renders key=value pairs and skips empty values', () => {
    expect(formatMeta({ requestId: 'abc', status: 200, ok: true, missing: undefined, none: null })).toBe(
      ' requestId=abc status=200 ok=true'
    )
  })

  it('quotes strings with spaces and serializes objects', () => {
    expect(formatMeta({ message: 'two words', issues: [{ path: ['a'] }] })).toBe(
      ' message="two words" issues=[{"path":["a"]}]'
    )
  })

  it('returns nothing without meta', () => {
    expect(formatMeta(undefined)).toBe('')
    expect(formatMeta({})).toBe('')
  })
})

describe('formatValue', () => {
  it('writes dates as ISO strings', () => {
    expect(formatValue(new Date('2026-03-10T12:00:00Z'))).toBe('2026-03-10T12:00:00.000Z')
  })
})
