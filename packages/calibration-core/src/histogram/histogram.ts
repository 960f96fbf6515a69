// ---------------------------------------------------------------------------
// Density histogram
// ---------------------------------------------------------------------------

import { assertFinite, assertNonEmptySample, assertPositive, InvalidParameterError } from '../errors.js';
import { interquartileRange, lastIndexAtOrBelow, sampleStdDev, sortAscending } from '../math/descriptive.js';
import type {
  BinWidthRule,
  CdfEvaluator,
  HistogramAnchor,
  HistogramGeometry,
  HistogramOptions,
  Sample,
} from '../types.js';
import { DEFAULT_HISTOGRAM_OPTIONS } from '../types.js';

/** Width used when the sample has no spread at all. */
export const DEGENERATE_BIN_WIDTH = 1;

/** Upper bound on the number of bins a width may produce over the sample range. */
export const MAX_HISTOGRAM_BINS = 100_000;

export interface BinWidthSelection {
  binWidth: number;
  degenerate: boolean;
}

function scottWidth(sorted: readonly number[]): BinWidthSelection {
  const sd = sampleStdDev(sorted);
  if (sd > 0) return { binWidth: (3.49 * sd) / Math.cbrt(sorted.length), degenerate: false };
  return { binWidth: DEGENERATE_BIN_WIDTH, degenerate: true };
}

/**
 * Bin width for `sample` under `rule`.
 *
 * Freedman–Diaconis falls back to Scott when the IQR is zero, and every
 * rule falls back to DEGENERATE_BIN_WIDTH for a constant sample.
 */
export function histogramBinWidth(sample: Sample, rule: BinWidthRule): BinWidthSelection {
  assertNonEmptySample(sample);
  const sorted = sortAscending(sample);
  const n = sorted.length;

  if (typeof rule === 'object') {
    assertPositive('binWidth', rule.width);
    return { binWidth: rule.width, degenerate: false };
  }

  switch (rule) {
    case 'freedman-diaconis': {
      const iqr = interquartileRange(sorted);
      if (iqr > 0) return { binWidth: (2 * iqr) / Math.cbrt(n), degenerate: false };
      return { ...scottWidth(sorted), degenerate: true };
    }
    case 'scott':
      return scottWidth(sorted);
    case 'sturges': {
      const range = (sorted[n - 1] ?? 0) - (sorted[0] ?? 0);
      if (range > 0) return { binWidth: range / Math.ceil(Math.log2(n) + 1), degenerate: false };
      return { binWidth: DEGENERATE_BIN_WIDTH, degenerate: true };
    }
  }
}

/** First bin edge: at the minimum, or on the lattice boundary + i·w at or below it. */
function firstEdge(min: number, width: number, anchor: HistogramAnchor): number {
  if (anchor === 'min') return min;
  assertFinite('anchor.boundary', anchor.boundary);
  return anchor.boundary + Math.floor((min - anchor.boundary) / width) * width;
}

/**
 * Piecewise-constant density. Bins are [e_i, e_{i+1}); the last bin also
 * holds its right edge. Heights are scaled so the total area is 1.
 */
export class Histogram implements CdfEvaluator {
  readonly kind = 'histogram' as const;
  private readonly cumulative: number[];

  constructor(
    readonly binWidth: number,
    readonly binEdges: readonly number[],
    readonly counts: readonly number[],
    readonly degenerate = false,
  ) {
    const n = counts.reduce((a, b) => a + b, 0);
    this.cumulative = [0];
    let acc = 0;
    for (const c of counts) {
      acc += c / n;
      this.cumulative.push(acc);
    }
  }

  get binHeights(): number[] {
    const n = this.counts.reduce((a, b) => a + b, 0);
    return this.counts.map((c, i) => c / (n * ((this.binEdges[i + 1] ?? 0) - (this.binEdges[i] ?? 0))));
  }

  /** Area of the histogram to the left of x. */
  evaluateCDFAt(x: number): number {
    const edges = this.binEdges;
    const last = edges.length - 1;
    if (x <= (edges[0] ?? 0)) return 0;
    if (x >= (edges[last] ?? 0)) return 1;

    const i = Math.min(lastIndexAtOrBelow(edges, x), last - 1);
    const left = edges[i] ?? 0;
    const right = edges[i + 1] ?? left;
    const below = this.cumulative[i] ?? 0;
    const within = (this.cumulative[i + 1] ?? below) - below;
    return below + (within * (x - left)) / (right - left);
  }

  toGeometry(): HistogramGeometry {
    return {
      kind: 'histogram',
      binEdges: [...this.binEdges],
      binHeights: this.binHeights,
    };
  }
}

export function buildHistogram(sample: Sample, options: Partial<HistogramOptions> = {}): Histogram {
  assertNonEmptySample(sample);
  const config = { ...DEFAULT_HISTOGRAM_OPTIONS, ...options };
  const { binWidth: w, degenerate } = histogramBinWidth(sample, config.binWidth);

  const sorted = sortAscending(sample);
  const min = sorted[0] ?? 0;
  const max = sorted[sorted.length - 1] ?? 0;
  const e0 = firstEdge(min, w, config.anchor);

  const span = Math.ceil((max - e0) / w);
  if (!(span < MAX_HISTOGRAM_BINS)) {
    throw new InvalidParameterError('binWidth', w, `needs ${MAX_HISTOGRAM_BINS} or more bins over the sample range`);
  }
  let nBins = Math.max(1, span);
  if (e0 + nBins * w < max) nBins++;
  const edges = Array.from({ length: nBins + 1 }, (_, i) => e0 + i * w);

  const counts = new Array<number>(nBins).fill(0);
  for (const x of sorted) {
    let idx = Math.min(nBins - 1, Math.max(0, Math.floor((x - e0) / w)));
    // Floor can land one bin off when x sits on an edge
    if (idx > 0 && x < (edges[idx] ?? 0)) idx--;
    else if (idx < nBins - 1 && x >= (edges[idx + 1] ?? Infinity)) idx++;
    counts[idx] = (counts[idx] ?? 0) + 1;
  }

  return new Histogram(w, edges, counts, degenerate);
}
