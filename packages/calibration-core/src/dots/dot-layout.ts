// ---------------------------------------------------------------------------
// Quantile dot plot layout
// ---------------------------------------------------------------------------

import { assertNonEmptySample, assertPositive, assertPositiveInteger } from '../errors.js';
import { lastIndexAtOrBelow, quantileSorted, sortAscending } from '../math/descriptive.js';
import type {
  CdfEvaluator,
  Dot,
  DotBinning,
  DotGeometry,
  DotLayoutOptions,
  OverflowPolicy,
  Sample,
} from '../types.js';
import { DEFAULT_DOT_LAYOUT_OPTIONS } from '../types.js';

/** Dots closer than binWidth·(1 - SLOT_EPSILON) count as overlapping. */
const SLOT_EPSILON = 1e-9;

/** Width used when every quantile coincides. */
export const DEGENERATE_DOT_WIDTH = 1;

/**
 * quantileCount quantiles of `sample` at the median-unbiased plotting
 * positions (i - 0.5) / quantileCount, ascending.
 */
export function dotQuantiles(sample: Sample, quantileCount: number): number[] {
  assertNonEmptySample(sample);
  assertPositiveInteger('quantileCount', quantileCount);
  const sorted = sortAscending(sample);
  return Array.from({ length: quantileCount }, (_, i) => quantileSorted(sorted, (i + 0.5) / quantileCount));
}

/** Quantile range split into 2·⌈√Q⌉ columns. */
export function defaultDotBinWidth(quantiles: readonly number[]): number {
  const range = (quantiles[quantiles.length - 1] ?? 0) - (quantiles[0] ?? 0);
  if (!(range > 0)) return DEGENERATE_DOT_WIDTH;
  return range / (2 * Math.ceil(Math.sqrt(quantiles.length)));
}

/**
 * Horizontal position of each dot. Wilkinson binning opens a bin at the
 * first unbinned quantile, absorbs every later quantile within binWidth of
 * it, and centres the bin between its first and last member.
 */
export function binDotPositions(quantiles: readonly number[], binWidth: number, binning: DotBinning): number[] {
  if (binning === 'none') return [...quantiles];

  const xs: number[] = [];
  let i = 0;
  while (i < quantiles.length) {
    const start = quantiles[i] ?? 0;
    let j = i;
    while (j + 1 < quantiles.length && (quantiles[j + 1] ?? Infinity) - start < binWidth) j++;
    const center = (start + (quantiles[j] ?? start)) / 2;
    for (let k = i; k <= j; k++) xs.push(center);
    i = j + 1;
  }
  return xs;
}

/**
 * Greedy stacking in ascending x: each dot takes the lowest slot whose most
 * recent dot is at least binWidth to its left. Slots count up from 0.
 */
export function stackDots(xs: readonly number[], binWidth: number): Dot[] {
  const lastInSlot: number[] = [];
  const minGap = binWidth * (1 - SLOT_EPSILON);
  const dots: Dot[] = [];

  for (const x of xs) {
    let slot = lastInSlot.findIndex((prev) => x - prev >= minGap);
    if (slot === -1) {
      slot = lastInSlot.length;
      lastInSlot.push(x);
    } else {
      lastInSlot[slot] = x;
    }
    dots.push({ x, slot });
  }
  return dots;
}

export class DotLayout implements CdfEvaluator {
  readonly kind = 'dot-layout' as const;
  readonly stackHeight: number;
  private readonly knotX: number[];
  private readonly knotF: number[];

  constructor(
    readonly quantileCount: number,
    readonly binWidth: number,
    readonly dots: readonly Dot[],
    readonly overflow: OverflowPolicy,
    readonly maxStackHeight: number,
  ) {
    this.stackHeight = dots.reduce((h, d) => Math.max(h, d.slot + 1), 0);
    const [knotX, knotF] = cdfKnots(dots.map((d) => d.x), binWidth);
    this.knotX = knotX;
    this.knotF = knotF;
  }

  get overflowed(): boolean {
    return this.stackHeight > this.maxStackHeight;
  }

  /** Vertical distance between slots, in binWidth units. */
  get slotSpacing(): number {
    if (this.overflow === 'compress' && this.overflowed) {
      return this.maxStackHeight / this.stackHeight;
    }
    return 1;
  }

  get dotPositions(): number[] {
    return this.dots.map((d) => d.x);
  }

  /**
   * Piecewise-linear CDF of the binned quantile set: each dot column is a
   * knot at the midpoint of its jump, and the curve runs from 0 half a dot
   * left of the first column to 1 half a dot right of the last.
   */
  evaluateCDFAt(x: number): number {
    const xs = this.knotX;
    const fs = this.knotF;
    const last = xs.length - 1;
    if (x <= (xs[0] ?? 0)) return 0;
    if (x >= (xs[last] ?? 0)) return 1;

    const i = Math.min(lastIndexAtOrBelow(xs, x), last - 1);
    const x0 = xs[i] ?? 0;
    const x1 = xs[i + 1] ?? x0;
    const f0 = fs[i] ?? 0;
    const f1 = fs[i + 1] ?? f0;
    return f0 + ((x - x0) / (x1 - x0)) * (f1 - f0);
  }

  toGeometry(): DotGeometry {
    const spacing = this.slotSpacing;
    return {
      kind: 'dot-layout',
      binWidth: this.binWidth,
      slotSpacing: spacing,
      dots: this.dots.map((d) => ({ ...d, y: (d.slot + 0.5) * this.binWidth * spacing })),
    };
  }
}

function cdfKnots(xs: readonly number[], binWidth: number): [number[], number[]] {
  const total = xs.length;
  const columns: Array<{ x: number; count: number }> = [];
  for (const x of xs) {
    const top = columns[columns.length - 1];
    if (top && top.x === x) top.count++;
    else columns.push({ x, count: 1 });
  }

  const first = columns[0]?.x ?? 0;
  const lastColumn = columns[columns.length - 1]?.x ?? 0;
  const knotX = [first - binWidth / 2];
  const knotF = [0];
  let below = 0;
  for (const { x, count } of columns) {
    knotX.push(x);
    knotF.push((below + count / 2) / total);
    below += count;
  }
  knotX.push(lastColumn + binWidth / 2);
  knotF.push(1);
  return [knotX, knotF];
}

export function layoutDots(
  sample: Sample,
  options: Pick<DotLayoutOptions, 'quantileCount'> & Partial<DotLayoutOptions>,
): DotLayout {
  const config = { ...DEFAULT_DOT_LAYOUT_OPTIONS, ...options };
  assertPositiveInteger('maxStackHeight', config.maxStackHeight);
  const quantiles = dotQuantiles(sample, config.quantileCount);
  const binWidth = config.binWidth ?? defaultDotBinWidth(quantiles);
  assertPositive('binWidth', binWidth);

  const xs = binDotPositions(quantiles, binWidth, config.binning);
  const dots = stackDots(xs, binWidth);
  return new DotLayout(config.quantileCount, binWidth, dots, config.overflow, config.maxStackHeight);
}
