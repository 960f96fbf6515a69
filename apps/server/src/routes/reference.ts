import { Hono } from 'hono'
import {
  linearGrid,
  referenceDensityCurve,
  ReferenceDistribution,
} from '@stepped-pit/calibration-core'
import { densityCurveRequestSchema } from '@stepped-pit/shared'
import { parseBody, isResponse } from '../lib/validate'

const referenceRoutes = new Hono()

/** POST /reference/density: the true density along an even grid */
referenceRoutes.post('/density', async (c) => {
  const data = await parseBody(c, densityCurveRequestSchema)
  if (isResponse(data)) return data

  const reference = new ReferenceDistribution(data.reference)
  const points = referenceDensityCurve(reference, linearGrid(data.from, data.to, data.points))
  return c.json({ reference: reference.toParams(), points })
})

export { referenceRoutes }
