import { Hono } from 'hono'
import { computeBand, createPRNG, DEFAULT_BAND_OPTIONS } from '@stepped-pit/calibration-core'
import { bandRequestSchema } from '@stepped-pit/shared'
import { parseBody, isResponse } from '../lib/validate'
import type { RouteDeps } from './deps'

export function bandRoutes(deps: RouteDeps) {
  const routes = new Hono()

  /**
   * POST /bands: calibrate a simultaneous band. Requests on default
   * settings go through the shared cache; a seed or an iteration bound
   * makes the band request-specific.
   */
  routes.post('/', async (c) => {
    const data = await parseBody(c, bandRequestSchema)
    if (isResponse(data)) return data

    if (data.n > deps.maxSampleSize) {
      return c.json(
        { error: 'Validation failed.', fields: { n: [`Must not exceed ${deps.maxSampleSize}`] } },
        400,
      )
    }

    if (data.n * data.k > deps.maxBandCells) {
      return c.json(
        { error: 'Validation failed.', fields: { k: [`n × k must not exceed ${deps.maxBandCells}`] } },
        400,
      )
    }

    const { n, k, confidence, method, trials, maxIterations, seed } = data
    const cacheable = seed === undefined && maxIterations === DEFAULT_BAND_OPTIONS.maxIterations
    const band = cacheable
      ? deps.cache.get(n, k, confidence, { method, trials })
      : computeBand(n, k, confidence, {
          method,
          trials,
          maxIterations,
          rng: seed === undefined ? undefined : createPRNG(seed),
        })

    return c.json({ band, cached: cacheable })
  })

  return routes
}
