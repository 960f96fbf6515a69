// ---------------------------------------------------------------------------
// Stepped-density PIT diagnostics: Core Types
// ---------------------------------------------------------------------------

/** Seedable PRNG function returning values in [0, 1). */
export type PRNG = () => number;

/** A sample is drawn once per run and only ever read afterwards. */
export type Sample = readonly number[];

/** PIT values in [0, 1], one per original observation. */
export type PITSample = number[];

export interface Point {
  x: number;
  y: number;
}

// ---------------------------------------------------------------------------
// Reference distribution
// ---------------------------------------------------------------------------

/** Which piece of the reference density a point falls in. */
export type Region = 'left' | 'middle' | 'right';

export interface ReferenceParams {
  splitLeft: number;
  splitRight: number;
  rightScale: number;
  pLeft?: number;   // Defaults to Φ(splitLeft)
  pRight?: number;  // Defaults to Φ(splitRight)
}

// ---------------------------------------------------------------------------
// Density representations
// ---------------------------------------------------------------------------

export type RepresentationKind = 'kernel-density' | 'histogram' | 'dot-layout';

/**
 * The one capability the PIT extractor needs from a representation:
 * its cumulative distribution at an arbitrary point.
 */
export interface CdfEvaluator {
  readonly kind: RepresentationKind;
  evaluateCDFAt(x: number): number;
}

export type KernelType = 'gaussian' | 'epanechnikov' | 'rectangular' | 'triangular';

export type BandwidthRule =
  | 'rule-of-thumb'
  | 'plug-in'
  | { bandwidth: number };

export interface KernelDensityOptions {
  kernel: KernelType;
  gridSize: number;  // Evaluation grid points
  cut: number;       // Grid extends cut * bandwidth beyond the sample range
}

export const DEFAULT_KERNEL_DENSITY_OPTIONS: KernelDensityOptions = {
  kernel: 'gaussian',
  gridSize: 512,
  cut: 3,
};

export type BinWidthRule =
  | 'freedman-diaconis'
  | 'scott'
  | 'sturges'
  | { width: number };

/** Where the first histogram edge goes. */
export type HistogramAnchor = 'min' | { boundary: number };

export interface HistogramOptions {
  binWidth: BinWidthRule;
  anchor: HistogramAnchor;
}

export const DEFAULT_HISTOGRAM_OPTIONS: HistogramOptions = {
  binWidth: 'freedman-diaconis',
  anchor: 'min',
};

export type OverflowPolicy = 'keep' | 'compress';

export type DotBinning = 'wilkinson' | 'none';

export interface DotLayoutOptions {
  quantileCount: number;
  binWidth?: number;         // Defaults to defaultDotBinWidth(quantiles)
  overflow: OverflowPolicy;
  binning: DotBinning;
  maxStackHeight: number;    // Slots available before a stack counts as overflowing
}

export const DEFAULT_DOT_LAYOUT_OPTIONS: Omit<DotLayoutOptions, 'quantileCount'> = {
  overflow: 'keep',
  binning: 'wilkinson',
  maxStackHeight: 20,
};

export interface Dot {
  x: number;
  slot: number;
}

// ---------------------------------------------------------------------------
// Renderable geometry handed to the presentation layer
// ---------------------------------------------------------------------------

export interface DotGeometry {
  kind: 'dot-layout';
  binWidth: number;
  slotSpacing: number;  // Vertical distance between slots, in binWidth units
  dots: Array<Dot & { y: number }>;
}

export interface HistogramGeometry {
  kind: 'histogram';
  binEdges: number[];
  binHeights: number[];
}

export interface DensityCurveGeometry {
  kind: 'kernel-density';
  bandwidth: number;
  curve: Point[];
}

export type RepresentationGeometry = DotGeometry | HistogramGeometry | DensityCurveGeometry;

// ---------------------------------------------------------------------------
// Simultaneous bands
// ---------------------------------------------------------------------------

export type CoverageMethod = 'exact' | 'simulate';

export interface BandOptions {
  method: CoverageMethod;
  tolerance: number;       // Acceptable |coverage - target| at the iteration bound
  maxIterations: number;   // Bisection steps on log(gamma)
  trials: number;          // Monte Carlo trajectories ('simulate' only)
  rng?: PRNG;              // Monte Carlo source ('simulate' only)
}

export const DEFAULT_BAND_OPTIONS: BandOptions = {
  method: 'exact',
  tolerance: 1e-4,
  maxIterations: 60,
  trials: 5000,
};

/**
 * Simultaneous envelope for an ECDF evaluated at k/K, k = 1..K.
 * Index i of every array is grid point k = i + 1.
 */
export interface Band {
  n: number;
  k: number;
  confidence: number;
  gamma: number;          // Calibrated per-point tail probability
  coverage: number;       // Simultaneous coverage achieved at gamma
  grid: number[];
  lowerCount: number[];
  upperCount: number[];
  lower: number[];        // lowerCount / n
  upper: number[];        // upperCount / n
}

// ---------------------------------------------------------------------------
// ECDF comparison
// ---------------------------------------------------------------------------

/** ECDF minus identity at one grid point; x is the grid point. */
export type EcdfDeviationPoint = Point;

export interface Exceedance {
  index: number;       // Grid index (k - 1)
  gridPoint: number;
  deviation: number;
  excess: number;      // Signed distance past the nearest band limit
}

// ---------------------------------------------------------------------------
// PRNG
// ---------------------------------------------------------------------------

/** Seedable PRNG (mulberry32). */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
