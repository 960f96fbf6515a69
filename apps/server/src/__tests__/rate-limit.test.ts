import { describe, it, expect, beforeEach } from 'vitest'
import { Hono } from 'hono'
import { rateLimit } from '../lib/rate-limit'

describe('Rate Limiter', () => {
  let app: Hono

  beforeEach(() => {
    app = new Hono()
  })

  it('allows requests under the limit', async () => {
    app.get('/test', rateLimit({ windowMs: 60_000, max: 3 }), (c) => c.text('ok'))

    for (let i = 0; i < 3; i++) {
      const res = await app.request('/test', {
        headers: { 'x-forwarded-for': '10.0.0.1' },
      })
      expect(res.status).toBe(200)
    }
  })

  it('returns 429 when limit is exceeded', async () => {
    app.get('/test', rateLimit({ windowMs: 60_000, max: 2 }), (c) => c.text('ok'))

    const headers = { 'x-forwarded-for': '10.0.0.2' }
    // First 2 pass
    await app.request('/test', { headers })
    await app.request('/test', { headers })

    // Third should be rate limited
    const res = await app.request('/test', { headers })
    expect(res.status).toBe(429)
    const body = await res.json()
    expect(body.error).toBe('Too many requests. Please try again later.')
  })

  it('sets Retry-After to the seconds left in the window', async () => {
    let now = 1_000_000
    app.get('/test', rateLimit({ windowMs: 60_000, max: 1, now: () => now }), (c) => c.text('ok'))

    const headers = { 'x-forwarded-for': '10.0.0.3' }
    await app.request('/test', { headers })
    now += 15_500

    const res = await app.request('/test', { headers })
    expect(res.status).toBe(429)
    expect(res.headers.get('Retry-After')).toBe('45')
  })

  it('opens a fresh window once the old one expires', async () => {
    let now = 0
    app.get('/test', rateLimit({ windowMs: 1_000, max: 1, now: () => now }), (c) => c.text('ok'))

    const headers = { 'x-forwarded-for': '10.0.0.4' }
    expect((await app.request('/test', { headers })).status).toBe(200)
    expect((await app.request('/test', { headers })).status).toBe(429)
    now = 1_000
    expect((await app.request('/test', { headers })).status).toBe(200)
  })

  it('tracks different clients independently', async () => {
    app.get('/test', rateLimit({ windowMs: 60_000, max: 1 }), (c) => c.text('ok'))

    const res1 = await app.request('/test', { headers: { 'x-forwarded-for': '10.0.0.5' } })
    const res2 = await app.request('/test', { headers: { 'x-forwarded-for': '10.0.0.6' } })

    expect(res1.status).toBe(200)
    expect(res2.status).toBe(200)
  })

  it('keys on the first forwarded address', async () => {
    app.get('/test', rateLimit({ windowMs: 60_000, max: 1 }), (c) => c.text('ok'))

    await app.request('/test', { headers: { 'x-forwarded-for': '10.0.0.7, 192.168.0.1' } })
    const res = await app.request('/test', { headers: { 'x-forwarded-for': '10.0.0.7' } })
    expect(res.status).toBe(429)
  })

  it('gives separate limiters separate budgets', async () => {
    app.get('/a', rateLimit({ windowMs: 60_000, max: 1 }), (c) => c.text('a'))
    app.get('/b', rateLimit({ windowMs: 60_000, max: 1 }), (c) => c.text('b'))

    const headers = { 'x-forwarded-for': '10.0.0.8' }
    expect((await app.request('/a', { headers })).status).toBe(200)
    expect((await app.request('/b', { headers })).status).toBe(200)
    expect((await app.request('/a', { headers })).status).toBe(429)
  })

  it('supports custom key function', async () => {
    app.get(
      '/test',
      rateLimit({
        windowMs: 60_000,
        max: 1,
        keyFn: (c) => c.req.header('x-client-id') ?? 'anon',
      }),
      (c) => c.text('ok'),
    )

    const res1 = await app.request('/test', { headers: { 'x-client-id': 'client-1' } })
    const res2 = await app.request('/test', { headers: { 'x-client-id': 'client-1' } })

    expect(res1.status).toBe(200)
    expect(res2.status).toBe(429)
  })
})
