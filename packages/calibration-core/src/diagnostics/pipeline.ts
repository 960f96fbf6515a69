// ---------------------------------------------------------------------------
// Diagnostics pipeline: reference → sample → representations → PIT → bands
// ---------------------------------------------------------------------------

import { BandCache } from '../bands/band-cache.js';
import { bandwidthRuleName } from '../density/bandwidth.js';
import { estimateDensity, KernelDensity, linearGrid } from '../density/kernel-density.js';
import { DotLayout, layoutDots } from '../dots/dot-layout.js';
import { ecdfDeviation, bandExceedances, deviationEnvelope } from '../ecdf/ecdf.js';
import { assertPositiveInteger, assertProbability } from '../errors.js';
import { buildHistogram, Histogram } from '../histogram/histogram.js';
import { computePIT, type DensityRepresentation } from '../pit/pit.js';
import { ReferenceDistribution } from '../reference/reference-distribution.js';
import type {
  Band,
  BandwidthRule,
  CoverageMethod,
  DensityCurveGeometry,
  DotGeometry,
  DotLayoutOptions,
  EcdfDeviationPoint,
  Exceedance,
  HistogramGeometry,
  HistogramOptions,
  KernelDensityOptions,
  KernelType,
  OverflowPolicy,
  PITSample,
  Point,
  PRNG,
  ReferenceParams,
  RepresentationGeometry,
  Sample,
} from '../types.js';
import { createPRNG } from '../types.js';

// ---------------------------------------------------------------------------
// Building blocks handed to the presentation layer
// ---------------------------------------------------------------------------

export interface Fitted<R extends DensityRepresentation, G extends RepresentationGeometry> {
  representation: R;
  geometry: G;
}

/** n draws from the reference distribution. */
export function sampleFrom(reference: ReferenceDistribution, n: number, rng?: PRNG): number[] {
  return reference.sample(n, rng);
}

/** True density at each x, for overlaying on a representation. */
export function referenceDensityCurve(reference: ReferenceDistribution, xs: readonly number[]): Point[] {
  return xs.map((x) => ({ x, y: reference.density(x) }));
}

export function fitDotLayout(
  sample: Sample,
  options: Pick<DotLayoutOptions, 'quantileCount'> & Partial<DotLayoutOptions>,
): Fitted<DotLayout, DotGeometry> {
  const representation = layoutDots(sample, options);
  return { representation, geometry: representation.toGeometry() };
}

export function fitHistogram(
  sample: Sample,
  options: Partial<HistogramOptions> = {},
): Fitted<Histogram, HistogramGeometry> {
  const representation = buildHistogram(sample, options);
  return { representation, geometry: representation.toGeometry() };
}

export function fitKernelDensity(
  sample: Sample,
  rule: BandwidthRule,
  options: Partial<KernelDensityOptions> = {},
): Fitted<KernelDensity, DensityCurveGeometry> {
  const representation = estimateDensity(sample, rule, options);
  return { representation, geometry: representation.toGeometry() };
}

// ---------------------------------------------------------------------------
// Full run
// ---------------------------------------------------------------------------

export interface DiagnosticsConfig {
  reference: ReferenceParams;
  sampleSize: number;
  seed: number;
  confidence: number;
  quantileCount: number;
  dotBinWidth?: number;
  dotOverflow: OverflowPolicy;
  maxStackHeight: number;
  histogram: Partial<HistogramOptions>;
  bandwidthRules: BandwidthRule[];
  kernel: KernelType;
  gridSize: number;
  /** Band grid size for the histogram and KDE diagnostics; see bandGridSizes. */
  continuousGridSize?: number;
  /** Band grid size for the dot-plot diagnostic; defaults to quantileCount. */
  dotGridSize?: number;
  bandMethod: CoverageMethod;
  referenceCurvePoints: number;
}

export const DEFAULT_DIAGNOSTICS_CONFIG: Omit<DiagnosticsConfig, 'reference'> = {
  sampleSize: 1000,
  seed: 1,
  confidence: 0.95,
  quantileCount: 100,
  dotOverflow: 'keep',
  maxStackHeight: 20,
  histogram: {},
  bandwidthRules: ['rule-of-thumb', 'plug-in'],
  kernel: 'gaussian',
  gridSize: 512,
  bandMethod: 'exact',
  referenceCurvePoints: 401,
};

/**
 * Ceiling on the default continuous grid. Exact calibration cost grows
 * with n·K, so larger grids have to be asked for explicitly.
 */
export const DEFAULT_MAX_GRID_SIZE = 1000;

/** Band grid sizes a run with these settings calibrates. */
export function bandGridSizes(
  config: Pick<DiagnosticsConfig, 'sampleSize' | 'quantileCount' | 'continuousGridSize' | 'dotGridSize'>,
): { continuous: number; dots: number } {
  return {
    continuous: config.continuousGridSize ?? Math.min(config.sampleSize, DEFAULT_MAX_GRID_SIZE),
    dots: config.dotGridSize ?? config.quantileCount,
  };
}

export interface RepresentationDiagnostic {
  name: string;
  geometry: RepresentationGeometry;
  degenerate: boolean;
  pit: PITSample;
  deviation: EcdfDeviationPoint[];
  band: Band;
  envelope: { lower: Point[]; upper: Point[] };
  exceedances: Exceedance[];
  maxAbsDeviation: number;
  /** The ECDF left the simultaneous band somewhere. */
  miscalibrated: boolean;
}

export interface DiagnosticsReport {
  reference: Required<ReferenceParams>;
  sample: number[];
  referenceCurve: Point[];
  diagnostics: RepresentationDiagnostic[];
}

function diagnose(
  name: string,
  fitted: Fitted<DensityRepresentation, RepresentationGeometry>,
  sample: Sample,
  band: Band,
  degenerate: boolean,
): RepresentationDiagnostic {
  const pit = computePIT(fitted.representation, sample);
  const deviation = ecdfDeviation(pit, band.k);
  const exceedances = bandExceedances(deviation, band);
  return {
    name,
    geometry: fitted.geometry,
    degenerate,
    pit,
    deviation,
    band,
    envelope: deviationEnvelope(band),
    exceedances,
    maxAbsDeviation: deviation.reduce((m, p) => Math.max(m, Math.abs(p.y)), 0),
    miscalibrated: exceedances.length > 0,
  };
}

/**
 * Draw one sample and judge every representation of it against its
 * calibrated band. Bands come from `cache`, so repeated runs with the same
 * (n, K, confidence) only calibrate once.
 */
export function runDiagnostics(
  input: Pick<DiagnosticsConfig, 'reference'> & Partial<DiagnosticsConfig>,
  cache: BandCache = new BandCache(),
): DiagnosticsReport {
  const config: DiagnosticsConfig = { ...DEFAULT_DIAGNOSTICS_CONFIG, ...input };
  assertPositiveInteger('sampleSize', config.sampleSize);
  assertPositiveInteger('quantileCount', config.quantileCount);
  assertPositiveInteger('referenceCurvePoints', config.referenceCurvePoints);
  assertProbability('confidence', config.confidence);

  const reference = new ReferenceDistribution(config.reference);
  const sample = sampleFrom(reference, config.sampleSize, createPRNG(config.seed));
  const n = sample.length;
  const bandOptions = { method: config.bandMethod };
  const grid = bandGridSizes(config);
  const continuousBand = cache.get(n, grid.continuous, config.confidence, bandOptions);
  const dotBand = cache.get(n, grid.dots, config.confidence, bandOptions);

  const diagnostics: RepresentationDiagnostic[] = [];

  const dots = fitDotLayout(sample, {
    quantileCount: config.quantileCount,
    binWidth: config.dotBinWidth,
    overflow: config.dotOverflow,
    maxStackHeight: config.maxStackHeight,
  });
  diagnostics.push(diagnose('dots', dots, sample, dotBand, false));

  const histogram = fitHistogram(sample, config.histogram);
  diagnostics.push(diagnose('histogram', histogram, sample, continuousBand, histogram.representation.degenerate));

  for (const rule of config.bandwidthRules) {
    const kde = fitKernelDensity(sample, rule, { kernel: config.kernel, gridSize: config.gridSize });
    diagnostics.push(
      diagnose(`kde:${bandwidthRuleName(rule)}`, kde, sample, continuousBand, kde.representation.degenerate),
    );
  }

  let min = Infinity;
  let max = -Infinity;
  for (const x of sample) {
    if (x < min) min = x;
    if (x > max) max = x;
  }
  const margin = 0.1 * (max - min) || 1;
  const xs = linearGrid(min - margin, max + margin, config.referenceCurvePoints);

  return {
    reference: reference.toParams(),
    sample,
    referenceCurve: referenceDensityCurve(reference, xs),
    diagnostics,
  };
}
