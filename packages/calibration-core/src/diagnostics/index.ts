export {
  sampleFrom,
  referenceDensityCurve,
  fitDotLayout,
  fitHistogram,
  fitKernelDensity,
  runDiagnostics,
  bandGridSizes,
  DEFAULT_MAX_GRID_SIZE,
  DEFAULT_DIAGNOSTICS_CONFIG,
  type Fitted,
  type DiagnosticsConfig,
  type DiagnosticsReport,
  type RepresentationDiagnostic,
} from './pipeline.js';
