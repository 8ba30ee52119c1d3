import { beforeEach, describe, expect, it } from 'vitest'
import { allowRequest, resetRateLimits, sweepExpired } from './rateLimit.js'

const rule = { windowMs: 10_000, max: 2 }

describe('allowRequest', () => {
  beforeEach(() => resetRateLimits())

  it('allows up to max requests per window', () => {
    expect(allowRequest({ key: 'k', ...rule }, 1_000)).toEqual({ allowed: true })
    expect(allowRequest({ key: 'k', ...rule }, 2_000)).toEqual({ allowed: true })
    expect(allowRequest({ key: 'k', ...rule }, 3_000)).toEqual({ allowed: false, retryAfterMs: 8_000 })
  })

  it('starts a new window once the old one expires', () => {
    allowRequest({ key: 'k', ...rule }, 0)
    allowRequest({ key: 'k', ...rule }, 1)
    expect(allowRequest({ key: 'k', ...rule }, 10_000)).toEqual({ allowed: true })
  })

  it('counts keys independently', () => {
    allowRequest({ key: 'a', ...rule }, 0)
    allowRequest({ key: 'a', ...rule }, 0)
    expect(allowRequest({ key: 'b', ...rule }, 0)).toEqual({ allowed: true })
  })
})

describe('sweepExpired', () => {
  beforeEach(() => resetRateLimits())

  it('removes only expired windows', () => {
    allowRequest({ key: 'old', windowMs: 1_000, max: 1 }, 0)
    allowRequest({ key: 'fresh', windowMs: 60_000, max: 1 }, 0)
    expect(sweepExpired(5_000)).toBe(1)
    expect(allowRequest({ key: 'fresh', windowMs: 60_000, max: 1 }, 5_000)).toEqual({
      allowed: false,
      retryAfterMs: 55_000
    })
  })
})
