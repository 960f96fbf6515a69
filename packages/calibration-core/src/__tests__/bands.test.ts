// ---------------------------------------------------------------------------
// Tests for simultaneous band calibration and the band cache
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import {
  computeBand,
  exactCoverage,
  pointwiseLimits,
  simulatedCoverage,
  simulateTrajectories,
} from '../bands/simultaneous-band.js';
import { BandCache } from '../bands/band-cache.js';
import { bandExceedances, ecdfDeviation } from '../ecdf/ecdf.js';
import { CalibrationNonConvergenceError, InvalidParameterError } from '../errors.js';
import { createPRNG } from '../types.js';

describe('exactCoverage', () => {
  it('is P(U > 1/2) when the single draw must land in the upper half', () => {
    expect(exactCoverage(1, { lowerCount: [0, 1], upperCount: [0, 1] })).toBeCloseTo(0.5, 12);
  });

  it('is 1 - P(both draws <= 1/2) when at most one may land low', () => {
    expect(exactCoverage(2, { lowerCount: [0, 2], upperCount: [1, 2] })).toBeCloseTo(0.75, 12);
  });

  it('is 1 for limits that exclude nothing', () => {
    expect(exactCoverage(2, { lowerCount: [0, 2], upperCount: [2, 2] })).toBeCloseTo(1, 12);
  });
});

describe('pointwiseLimits', () => {
  it('ends at n at the last grid point', () => {
    const { lowerCount, upperCount } = pointwiseLimits(50, 5, 0.05);
    expect(lowerCount[4]).toBe(50);
    expect(upperCount[4]).toBe(50);
  });
});

describe('simulated coverage', () => {
  it('records cumulative counts per grid point', () => {
    const traj = simulateTrajectories(30, 3, 4, createPRNG(1));
    expect(traj).toHaveLength(12);
    for (let t = 0; t < 4; t++) expect(traj[t * 3 + 2]).toBe(30);
  });

  it('counts trajectories that stay inside', () => {
    // Two trials, two grid points
    const traj = Int32Array.from([1, 2, 2, 2]);
    expect(simulatedCoverage(traj, { lowerCount: [0, 2], upperCount: [1, 2] })).toBe(0.5);
  });
});

describe('computeBand', () => {
  it('returns ordered, monotone limits that reach 1', () => {
    const band = computeBand(200, 20, 0.9);
    expect(band.grid).toHaveLength(20);
    expect(band.grid[19]).toBe(1);
    for (let i = 0; i < 20; i++) {
      expect(band.lower[i] ?? NaN).toBeLessThanOrEqual(band.upper[i] ?? NaN);
      if (i > 0) {
        expect(band.lower[i] ?? NaN).toBeGreaterThanOrEqual(band.lower[i - 1] ?? NaN);
        expect(band.upper[i] ?? NaN).toBeGreaterThanOrEqual(band.upper[i - 1] ?? NaN);
      }
    }
    expect(band.lower[19]).toBe(1);
    expect(band.upper[19]).toBe(1);
  });

  it('calibrates gamma between the Bonferroni and pointwise levels', () => {
    const band = computeBand(1000, 100, 0.95);
    expect(band.coverage).toBeGreaterThanOrEqual(0.95);
    expect(band.coverage).toBeLessThan(0.96);
    expect(band.gamma).toBeLessThan(0.05);
    expect(band.gamma).toBeGreaterThan(0.05 / 100 / 2);
  });

  it('holds its nominal coverage under repeated uniform sampling', () => {
    const n = 1000;
    const k = 100;
    const trials = 2000;
    const band = computeBand(n, k, 0.95);
    const rng = createPRNG(77);
    let inside = 0;
    for (let t = 0; t < trials; t++) {
      const pit = Array.from({ length: n }, () => rng());
      if (bandExceedances(ecdfDeviation(pit, k), band).length === 0) inside++;
    }
    const rate = inside / trials;
    expect(rate).toBeGreaterThanOrEqual(0.93);
    expect(rate).toBeLessThanOrEqual(0.97);
  });

  it('returns the widest level when a single grid point is checked', () => {
    const band = computeBand(10, 1, 0.95);
    expect(band.gamma).toBe(1);
    expect(band.lower).toEqual([1]);
    expect(band.upper).toEqual([1]);
    expect(band.coverage).toBeCloseTo(1, 12);
  });

  it('throws when the iteration bound runs out', () => {
    let caught: unknown;
    try {
      computeBand(100, 10, 0.95, { maxIterations: 2 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CalibrationNonConvergenceError);
    if (caught instanceof CalibrationNonConvergenceError) {
      expect(caught.iterations).toBe(2);
      expect(caught.code).toBe('CALIBRATION_NON_CONVERGENCE');
      expect(caught.n).toBe(100);
      expect(caught.k).toBe(10);
    }
  });

  it('is deterministic under the simulate method with a seeded generator', () => {
    const a = computeBand(200, 20, 0.9, { method: 'simulate', trials: 1000, rng: createPRNG(3) });
    const b = computeBand(200, 20, 0.9, { method: 'simulate', trials: 1000, rng: createPRNG(3) });
    expect(a).toEqual(b);
    expect(a.coverage).toBeGreaterThanOrEqual(0.9);
  });

  it('simulate and exact calibrations agree roughly', () => {
    const simulated = computeBand(200, 20, 0.9, { method: 'simulate', trials: 1000 });
    const exact = exactCoverage(200, simulated);
    expect(exact).toBeGreaterThan(0.85);
    expect(exact).toBeLessThan(0.95);
  });

  it('rejects invalid arguments', () => {
    expect(() => computeBand(0, 10, 0.95)).toThrow(InvalidParameterError);
    expect(() => computeBand(10, 2.5, 0.95)).toThrow(InvalidParameterError);
    expect(() => computeBand(10, 10, 1)).toThrow(InvalidParameterError);
    expect(() => computeBand(10, 10, 0.9, { trials: 0, method: 'simulate' })).toThrow(InvalidParameterError);
  });
});

describe('BandCache', () => {
  it('keys on n, K, confidence and method', () => {
    expect(BandCache.key(10, 5, 0.9)).toBe('10:5:0.9:exact');
    expect(BandCache.key(10, 5, 0.9, { method: 'simulate' })).toBe('10:5:0.9:simulate:5000');
    expect(BandCache.key(10, 5, 0.9, { method: 'simulate', trials: 200 })).toBe('10:5:0.9:simulate:200');
  });

  it('returns the same band on a hit', () => {
    const cache = new BandCache();
    const first = cache.get(50, 5, 0.9);
    const second = cache.get(50, 5, 0.9);
    expect(second).toBe(first);
    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1 });
  });

  it('evicts the oldest entry at its limit', () => {
    const cache = new BandCache(1);
    cache.get(50, 5, 0.9);
    cache.get(50, 4, 0.9);
    expect(cache.size).toBe(1);
    cache.get(50, 5, 0.9);
    expect(cache.stats()).toEqual({ hits: 0, misses: 3, size: 1 });
  });

  it('clears entries and counters', () => {
    const cache = new BandCache();
    cache.get(50, 5, 0.9);
    cache.clear();
    expect(cache.stats()).toEqual({ hits: 0, misses: 0, size: 0 });
  });
});
