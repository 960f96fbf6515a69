// ---------------------------------------------------------------------------
// Tests for PIT extraction
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import { computePIT } from '../pit/pit.js';
import { ecdfDeviation } from '../ecdf/ecdf.js';
import { buildHistogram } from '../histogram/histogram.js';
import { DotLayout } from '../dots/dot-layout.js';
import { estimateDensity, KernelDensity, linearGrid } from '../density/kernel-density.js';
import { ReferenceDistribution } from '../reference/reference-distribution.js';
import { InvalidParameterError } from '../errors.js';
import { normalQuantile } from '../math/normal.js';
import { createPRNG, type CdfEvaluator } from '../types.js';

const reference = new ReferenceDistribution({
  splitLeft: -0.5,
  splitRight: 0.5,
  rightScale: 0.5,
  pLeft: 0.4,
  pRight: 0.6,
});

function maxAbsDeviation(pit: number[], k: number): number {
  return ecdfDeviation(pit, k).reduce((m, p) => Math.max(m, Math.abs(p.y)), 0);
}

describe('computePIT', () => {
  it('maps each observation through a histogram CDF', () => {
    const sample = [0, 0.5, 1.5, 2.5, 3.9];
    const hist = buildHistogram(sample, { binWidth: { width: 1 } });
    const pit = computePIT(hist, sample);
    const expected = [0, 0.2, 0.5, 0.7, 0.98];
    expect(pit).toHaveLength(5);
    pit.forEach((u, i) => expect(u).toBeCloseTo(expected[i] ?? NaN, 12));
  });

  it('maps each observation through a dot layout CDF', () => {
    const layout = new DotLayout(
      4,
      1,
      [
        { x: 0, slot: 0 },
        { x: 0, slot: 1 },
        { x: 2, slot: 0 },
        { x: 3, slot: 0 },
      ],
      'keep',
      10,
    );
    const pit = computePIT(layout, [0, 1, 3.25]);
    expect(pit[0]).toBeCloseTo(0.25, 12);
    expect(pit[1]).toBeCloseTo(0.4375, 12);
    expect(pit[2]).toBeCloseTo(0.9375, 12);
  });

  it('clamps CDF values into [0, 1]', () => {
    const overshoot: CdfEvaluator = { kind: 'histogram', evaluateCDFAt: (x) => x };
    expect(computePIT(overshoot, [-0.5, 0.3, 1.5])).toEqual([0, 0.3, 1]);
  });

  it('rejects an empty sample', () => {
    expect(() => computePIT(buildHistogram([1]), [])).toThrow(InvalidParameterError);
  });
});

describe('PIT against the true density', () => {
  const grid = linearGrid(-6, 6, 4001);
  const truth = KernelDensity.fromDensity((x) => reference.density(x), grid);

  it('is uniform up to sampling noise across seeds', () => {
    const n = 1000;
    for (let seed = 1; seed <= 20; seed++) {
      const sample = reference.sample(n, createPRNG(seed));
      const pit = computePIT(truth, sample);
      expect(maxAbsDeviation(pit, 1000)).toBeLessThan(3 / Math.sqrt(n));
    }
  });

  it('agrees with the analytic CDF', () => {
    for (const x of [-2, -0.5, 0, 0.5, 0.75, 1.5]) {
      expect(truth.evaluateCDFAt(x)).toBeCloseTo(reference.cdf(x), 2);
    }
  });
});

describe('PIT against a kernel density estimate', () => {
  it('stays close to uniform for a smooth target', () => {
    const rng = createPRNG(13);
    const sample = Array.from({ length: 1000 }, () => normalQuantile(Math.max(rng(), 1e-12)));
    const kde = estimateDensity(sample, 'rule-of-thumb');
    const pit = computePIT(kde, sample);
    expect(pit.every((u) => u >= 0 && u <= 1)).toBe(true);
    expect(maxAbsDeviation(pit, 1000)).toBeLessThan(0.1);
  });
});
