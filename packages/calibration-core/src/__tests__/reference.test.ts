// ---------------------------------------------------------------------------
// Tests for the stepped reference distribution
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { ReferenceDistribution } from '../reference/reference-distribution.js';
import { InvalidParameterError } from '../errors.js';
import { normalPdf } from '../math/normal.js';
import { sortAscending } from '../math/descriptive.js';
import { createPRNG } from '../types.js';

const stepped = new ReferenceDistribution({
  splitLeft: -0.5,
  splitRight: 0.5,
  rightScale: 0.5,
  pLeft: 0.4,
  pRight: 0.6,
});

describe('ReferenceDistribution construction', () => {
  it('derives piece weights from the standard normal by default', () => {
    const ref = new ReferenceDistribution({ splitLeft: -0.5, splitRight: 0.5, rightScale: 1 });
    expect(ref.pLeft).toBeCloseTo(0.3085375, 6);
    expect(ref.pRight).toBeCloseTo(0.6914625, 6);
    // With default weights the outer pieces are plain standard normal
    expect(ref.density(-2)).toBeCloseTo(normalPdf(-2), 12);
    expect(ref.density(2)).toBeCloseTo(normalPdf(2), 6);
  });

  it('rejects splitLeft >= splitRight', () => {
    expect(() => new ReferenceDistribution({ splitLeft: 1, splitRight: 1, rightScale: 1 })).toThrow(
      InvalidParameterError,
    );
  });

  it('rejects a non-positive rightScale', () => {
    expect(() => new ReferenceDistribution({ splitLeft: 0, splitRight: 1, rightScale: 0 })).toThrow(
      InvalidParameterError,
    );
  });

  it('rejects weights outside 0 < pLeft < pRight < 1', () => {
    expect(
      () => new ReferenceDistribution({ splitLeft: 0, splitRight: 1, rightScale: 1, pLeft: 0.7, pRight: 0.6 }),
    ).toThrow(InvalidParameterError);
    expect(
      () => new ReferenceDistribution({ splitLeft: 0, splitRight: 1, rightScale: 1, pLeft: 0.2, pRight: 1 }),
    ).toThrow(InvalidParameterError);
  });

  it('rejects a left split so far out that Φ(splitLeft) underflows', () => {
    let caught: unknown;
    try {
      new ReferenceDistribution({ splitLeft: -40, splitRight: 0, rightScale: 1, pLeft: 0.1, pRight: 0.5 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidParameterError);
    if (caught instanceof InvalidParameterError) expect(caught.parameter).toBe('splitLeft');
  });

  it('rejects a right tail whose normaliser underflows', () => {
    let caught: unknown;
    try {
      new ReferenceDistribution({ splitLeft: 0, splitRight: 5, rightScale: 0.1, pLeft: 0.3, pRight: 0.9 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidParameterError);
    if (caught instanceof InvalidParameterError) expect(caught.parameter).toBe('splitRight/rightScale');
  });

  it('stays finite for a far but representable right tail', () => {
    const far = new ReferenceDistribution({ splitLeft: 0, splitRight: 3, rightScale: 0.5, pLeft: 0.3, pRight: 0.9 });
    expect(Number.isFinite(far.density(3.1))).toBe(true);
    expect(far.cdf(3.05)).toBeGreaterThan(0.9);
    expect(far.cdf(3.05)).toBeLessThan(far.cdf(3.2));
    expect(Number.isFinite(far.quantile(0.95))).toBe(true);
    expect(far.sample(200, createPRNG(11)).every(Number.isFinite)).toBe(true);
  });

  it('round-trips its parameters', () => {
    expect(stepped.toParams()).toEqual({
      splitLeft: -0.5,
      splitRight: 0.5,
      rightScale: 0.5,
      pLeft: 0.4,
      pRight: 0.6,
    });
  });
});

describe('ReferenceDistribution regions', () => {
  it('assigns both split points to the middle piece', () => {
    expect(stepped.regionOf(-0.5)).toBe('middle');
    expect(stepped.regionOf(0.5)).toBe('middle');
    expect(stepped.regionOf(-0.5000001)).toBe('left');
    expect(stepped.regionOf(0.5000001)).toBe('right');
  });

  it('has a flat middle of height (pRight - pLeft) / width', () => {
    expect(stepped.density(0)).toBeCloseTo(0.2, 12);
    expect(stepped.density(-0.5)).toBeCloseTo(0.2, 12);
    expect(stepped.density(0.5)).toBeCloseTo(0.2, 12);
  });

  it('jumps at the right split', () => {
    // 0.4 · φ(1) / 0.5 / Φ(-1)
    expect(stepped.density(0.5000001)).toBeCloseTo(1.2202, 3);
  });
});

describe('ReferenceDistribution CDF', () => {
  it('equals the piece weights at the splits', () => {
    expect(stepped.cdf(-0.5)).toBe(0.4);
    expect(stepped.cdf(0.5)).toBeCloseTo(0.6, 12);
    expect(stepped.cdf(-0.5 - 1e-12)).toBeCloseTo(0.4, 9);
    expect(stepped.cdf(0.5 + 1e-12)).toBeCloseTo(0.6, 9);
  });

  it('tends to 0 and 1', () => {
    expect(stepped.cdf(-Infinity)).toBe(0);
    expect(stepped.cdf(Infinity)).toBe(1);
    expect(stepped.cdf(-40)).toBeCloseTo(0, 12);
    expect(stepped.cdf(40)).toBeCloseTo(1, 12);
  });

  it('is monotone', () => {
    fc.assert(
      fc.property(
        fc.double({ min: -10, max: 10, noNaN: true }),
        fc.double({ min: -10, max: 10, noNaN: true }),
        (a, b) => {
          const [lo, hi] = a <= b ? [a, b] : [b, a];
          return stepped.cdf(lo) <= stepped.cdf(hi) + 1e-12;
        },
      ),
      { numRuns: 500 },
    );
  });

  it('integrates the density to 1', () => {
    const lo = -10;
    const hi = 10;
    const steps = 200_000;
    const dx = (hi - lo) / steps;
    let area = 0;
    let prev = stepped.density(lo);
    for (let i = 1; i <= steps; i++) {
      const next = stepped.density(lo + i * dx);
      area += 0.5 * dx * (prev + next);
      prev = next;
    }
    expect(Math.abs(area - 1)).toBeLessThan(1e-3);
  });

  it('quantile inverts cdf in every piece', () => {
    fc.assert(
      fc.property(fc.double({ min: 0.001, max: 0.999, noNaN: true }), (p) => {
        return Math.abs(stepped.cdf(stepped.quantile(p)) - p) < 1e-6;
      }),
      { numRuns: 500 },
    );
    expect(stepped.quantile(0.4)).toBe(-0.5);
    expect(stepped.quantile(0)).toBe(-Infinity);
    expect(stepped.quantile(1)).toBe(Infinity);
  });
});

describe('ReferenceDistribution sampling', () => {
  it('is reproducible under a seeded generator', () => {
    expect(stepped.sample(50, createPRNG(7))).toEqual(stepped.sample(50, createPRNG(7)));
  });

  it('puts the right share of draws in each piece', () => {
    const draws = stepped.sample(20_000, createPRNG(11));
    const left = draws.filter((x) => x < -0.5).length / draws.length;
    const middle = draws.filter((x) => x >= -0.5 && x <= 0.5).length / draws.length;
    expect(Math.abs(left - 0.4)).toBeLessThan(0.02);
    expect(Math.abs(middle - 0.2)).toBeLessThan(0.02);
  });

  it('matches the CDF (Kolmogorov distance)', () => {
    const n = 20_000;
    const sorted = sortAscending(stepped.sample(n, createPRNG(42)));
    let distance = 0;
    sorted.forEach((x, i) => {
      const f = stepped.cdf(x);
      distance = Math.max(distance, Math.abs((i + 1) / n - f), Math.abs(i / n - f));
    });
    expect(distance).toBeLessThan(2 / Math.sqrt(n));
  });

  it('rejects a non-positive sample size', () => {
    expect(() => stepped.sample(0)).toThrow(InvalidParameterError);
  });
});
