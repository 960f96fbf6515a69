import { z } from 'zod'
import { coverageMethodSchema } from './diagnostics'

export const bandRequestSchema = z.object({
  n: z.number().int().min(1),
  k: z.number().int().min(1).max(5000),
  confidence: z.number().gt(0).lt(1).default(0.95),
  method: coverageMethodSchema.default('exact'),
  trials: z.number().int().min(1).max(100_000).default(5000),
  maxIterations: z.number().int().min(1).max(200).default(60),
  seed: z.number().int().optional(),
})

export type BandRequest = z.infer<typeof bandRequestSchema>
