import { z } from 'zod'

export const referenceParamsSchema = z
  .object({
    splitLeft: z.number().finite(),
    splitRight: z.number().finite(),
    rightScale: z.number().finite().positive(),
    pLeft: z.number().gt(0).lt(1).optional(),
    pRight: z.number().gt(0).lt(1).optional(),
  })
  .refine((v) => v.splitLeft < v.splitRight, {
    message: 'splitLeft must be less than splitRight',
    path: ['splitRight'],
  })
  .refine((v) => v.pLeft === undefined || v.pRight === undefined || v.pLeft < v.pRight, {
    message: 'pLeft must be less than pRight',
    path: ['pRight'],
  })

export const densityCurveRequestSchema = z
  .object({
    reference: referenceParamsSchema,
    from: z.number().finite(),
    to: z.number().finite(),
    points: z.number().int().min(2).max(5000).default(401),
  })
  .refine((v) => v.from < v.to, { message: 'from must be less than to', path: ['to'] })

export type ReferenceParamsInput = z.infer<typeof referenceParamsSchema>
export type DensityCurveRequest = z.infer<typeof densityCurveRequestSchema>
