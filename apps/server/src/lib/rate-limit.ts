/**
 * In-memory fixed-window rate limiter for Hono.
 *
 * Every call builds its own counter store, so two limiters never share a
 * budget. Expired windows are swept at most once per window.
 */

import type { Context, Next } from 'hono'

export interface RateLimitConfig {
  /** Time window in milliseconds. */
  windowMs: number
  /** Maximum requests per window per key. */
  max: number
  /** Custom key extractor. Defaults to the first x-forwarded-for address. */
  keyFn?: (c: Context) => string
  /** Clock, in ms. */
  now?: () => number
}

interface Counter {
  count: number
  resetAt: number
}

function clientKey(c: Context): string {
  return c.req.header('x-forwarded-for')?.split(',')[0]?.trim() || 'unknown'
}

export function rateLimit(config: RateLimitConfig) {
  const store = new Map<string, Counter>()
  const clock = config.now ?? Date.now
  const keyOf = config.keyFn ?? clientKey
  let nextSweep = clock() + config.windowMs

  function sweep(now: number): void {
    if (now < nextSweep) return
    for (const [key, counter] of store) {
      if (now >= counter.resetAt) store.delete(key)
    }
    nextSweep = now + config.windowMs
  }

  return async (c: Context, next: Next): Promise<Response | void> => {
    const now = clock()
    sweep(now)

    const key = keyOf(c)
    const counter = store.get(key)
    if (!counter || now >= counter.resetAt) {
      store.set(key, { count: 1, resetAt: now + config.windowMs })
      return next()
    }

    if (counter.count >= config.max) {
      c.header('Retry-After', String(Math.ceil((counter.resetAt - now) / 1000)))
      return c.json({ error: 'Too many requests. Please try again later.' }, 429)
    }

    counter.count++
    return next()
  }
}
