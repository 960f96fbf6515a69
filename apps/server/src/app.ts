import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { HTTPException } from 'hono/http-exception'
import {
  BandCache,
  CalibrationNonConvergenceError,
  InvalidParameterError,
} from '@stepped-pit/calibration-core'
import { env } from './lib/env'
import { jsonLogger, type Logger } from './lib/logger'
import { requestLogger } from './lib/request-logger'
import { rateLimit } from './lib/rate-limit'
import { diagnosticsRoutes } from './routes/diagnostics'
import { bandRoutes } from './routes/bands'
import { referenceRoutes } from './routes/reference'

export interface AppOptions {
  cache: BandCache
  maxSampleSize: number
  maxBandCells: number
  defaultSeed: number
  corsOrigins: string[]
  /** Compute requests per client per minute. */
  rateLimitMax: number
  logger: Logger
  /** Include stack traces in error logs. */
  logStacks: boolean
}

export function createApp(options: Partial<AppOptions> = {}): Hono {
  const config: AppOptions = {
    cache: new BandCache(env.BAND_CACHE_LIMIT),
    maxSampleSize: env.MAX_SAMPLE_SIZE,
    maxBandCells: env.MAX_BAND_CELLS,
    defaultSeed: env.DEFAULT_SEED,
    corsOrigins: env.CORS_ORIGINS,
    rateLimitMax: env.RATE_LIMIT_MAX,
    logger: jsonLogger,
    logStacks: env.NODE_ENV !== 'production',
    ...options,
  }

  const app = new Hono()

  // ───── Error mapping ─────────────────────────────────────────────────────

  app.onError((err, c) => {
    if (err instanceof InvalidParameterError) {
      return c.json({ error: err.message, code: err.code, parameter: err.parameter }, 400)
    }
    if (err instanceof CalibrationNonConvergenceError) {
      return c.json({ error: err.message, code: err.code }, 422)
    }
    if (err instanceof HTTPException) return err.getResponse()

    config.logger.error(`${c.req.method} ${c.req.path}`, err, {
      stack: config.logStacks ? err.stack : undefined,
    })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ───── Middleware (order matters) ────────────────────────────────────────

  app.use('*', requestLogger(config.logger))
  app.use(
    '*',
    cors({
      origin: config.corsOrigins,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )

  // Band calibration and KDE fitting are CPU-bound; one budget covers both
  const computeLimit = rateLimit({ windowMs: 60_000, max: config.rateLimitMax })
  app.use('/diagnostics', computeLimit)
  app.use('/bands', computeLimit)

  // ───── Routes ────────────────────────────────────────────────────────────

  app.get('/health', (c) => c.json({ status: 'healthy', bandCache: config.cache.stats() }))
  app.get('/', (c) => c.json({ name: 'stepped-pit', version: '0.1.0' }))

  const deps = {
    cache: config.cache,
    maxSampleSize: config.maxSampleSize,
    maxBandCells: config.maxBandCells,
    defaultSeed: config.defaultSeed,
  }
  app.route('/diagnostics', diagnosticsRoutes(deps))
  app.route('/bands', bandRoutes(deps))
  app.route('/reference', referenceRoutes)

  return app
}
