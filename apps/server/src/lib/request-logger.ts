/**
 * Request logging middleware: one entry per request with method, path,
 * response status and duration in ms. Registered first so the duration
 * covers every later middleware.
 */

import type { Context, Next } from 'hono'
import { jsonLogger, type Logger } from './logger'

export function requestLogger(logger: Logger = jsonLogger) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    logger.info({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms: Number((performance.now() - start).toFixed(1)),
    })
  }
}
