import { Hono } from 'hono'
import { bandGridSizes, runDiagnostics } from '@stepped-pit/calibration-core'
import { diagnosticsRequestSchema } from '@stepped-pit/shared'
import { parseBody, isResponse } from '../lib/validate'
import type { RouteDeps } from './deps'

export function diagnosticsRoutes(deps: RouteDeps) {
  const routes = new Hono()

  /** POST /diagnostics: draw one sample and diagnose every representation */
  routes.post('/', async (c) => {
    const data = await parseBody(c, diagnosticsRequestSchema)
    if (isResponse(data)) return data

    if (data.sampleSize > deps.maxSampleSize) {
      return c.json(
        {
          error: 'Validation failed.',
          fields: { sampleSize: [`Must not exceed ${deps.maxSampleSize}`] },
        },
        400,
      )
    }

    const grid = bandGridSizes(data)
    const largest = Math.max(grid.continuous, grid.dots)
    if (data.sampleSize * largest > deps.maxBandCells) {
      return c.json(
        {
          error: 'Validation failed.',
          fields: {
            sampleSize: [`sampleSize × band grid size (${largest}) must not exceed ${deps.maxBandCells}`],
          },
        },
        400,
      )
    }

    const report = runDiagnostics({ ...data, seed: data.seed ?? deps.defaultSeed }, deps.cache)
    return c.json(report)
  })

  return routes
}
