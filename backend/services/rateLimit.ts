type Entry = { count: number; resetAt: number }

export type RateLimitRule = { windowMs: number; max: number }

export type RateLimitDecision = { allowed: true } | { allowed: false; retryAfterMs: number }

const buckets = new Map<string, Entry>()

/**
 * In-memory fixed-window rate limiter keyed by a string.
 *
 * Process-local: with several instances each one counts on its own.
 */
export function allowRequest(args: { key: string } & RateLimitRule, now = Date.now()): RateLimitDecision {
  const entry = buckets.get(args.key)

  if (!entry || entry.resetAt <= now) {
    buckets.set(args.key, { count: 1, resetAt: now + args.windowMs })
    return { allowed: true }
  }

  if (entry.count >= args.max) {
    return { allowed: false, retryAfterMs: entry.resetAt - now }
  }

  entry.count += 1
  return { allowed: true }
}

/** Drop expired windows so long-running processes don't accumulate keys. */
export function sweepExpired(now = Date.now()) {
  let removed = 0
  for (const [key, entry] of buckets) {
    if (entry.resetAt <= now) {
      buckets.delete(key)
      removed += 1
    }
  }
  return removed
}

export function resetRateLimits() {
  buckets.clear()
}
