export {
  referenceParamsSchema,
  densityCurveRequestSchema,
  type ReferenceParamsInput,
  type DensityCurveRequest,
} from './reference'

export {
  kernelSchema,
  bandwidthRuleSchema,
  binWidthRuleSchema,
  histogramAnchorSchema,
  coverageMethodSchema,
  diagnosticsRequestSchema,
  type DiagnosticsRequest,
} from './diagnostics'

export { bandRequestSchema, type BandRequest } from './bands'
