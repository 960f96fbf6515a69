import { z } from 'zod'
import { referenceParamsSchema } from './reference'

export const kernelSchema = z.enum(['gaussian', 'epanechnikov', 'rectangular', 'triangular'])

export const bandwidthRuleSchema = z.union([
  z.enum(['rule-of-thumb', 'plug-in']),
  z.object({ bandwidth: z.number().finite().positive() }),
])

export const binWidthRuleSchema = z.union([
  z.enum(['freedman-diaconis', 'scott', 'sturges']),
  z.object({ width: z.number().finite().min(1e-6) }),
])

export const histogramAnchorSchema = z.union([
  z.literal('min'),
  z.object({ boundary: z.number().finite() }),
])

export const coverageMethodSchema = z.enum(['exact', 'simulate'])

export const diagnosticsRequestSchema = z.object({
  reference: referenceParamsSchema,
  sampleSize: z.number().int().min(1).default(1000),
  seed: z.number().int().optional(),
  confidence: z.number().gt(0).lt(1).default(0.95),
  quantileCount: z.number().int().min(1).max(1000).default(100),
  dotBinWidth: z.number().finite().positive().optional(),
  dotOverflow: z.enum(['keep', 'compress']).default('keep'),
  maxStackHeight: z.number().int().min(1).max(1000).default(20),
  histogram: z
    .object({
      binWidth: binWidthRuleSchema.default('freedman-diaconis'),
      anchor: histogramAnchorSchema.default('min'),
    })
    .default({}),
  bandwidthRules: z.array(bandwidthRuleSchema).max(8).default(['rule-of-thumb', 'plug-in']),
  kernel: kernelSchema.default('gaussian'),
  gridSize: z.number().int().min(2).max(8192).default(512),
  continuousGridSize: z.number().int().min(1).max(5000).optional(),
  dotGridSize: z.number().int().min(1).max(5000).optional(),
  bandMethod: coverageMethodSchema.default('exact'),
  referenceCurvePoints: z.number().int().min(2).max(5000).default(401),
})

export type DiagnosticsRequest = z.infer<typeof diagnosticsRequestSchema>
