// ---------------------------------------------------------------------------
// Simultaneous confidence bands for a uniform ECDF
// ---------------------------------------------------------------------------

import {
  assertPositiveInteger,
  assertProbability,
  CalibrationNonConvergenceError,
} from '../errors.js';
import {
  binomialLogPmf,
  binomialQuantileLower,
  binomialQuantileUpper,
  logFactorials,
} from '../math/binomial.js';
import type { Band, BandOptions, PRNG } from '../types.js';
import { createPRNG, DEFAULT_BAND_OPTIONS } from '../types.js';

const GAMMA_MIN = 1e-12;
const GAMMA_MAX = 1;

/**
 * Relative bracket width at which the coverage jump has been located.
 * Pointwise limits are integers, so coverage is a step function of gamma
 * and may never equal the target exactly.
 */
const GAMMA_RESOLUTION = 1e-9;

/** Transition terms below exp(-60) of their state are dropped. */
const LOG_NEGLIGIBLE = -60;

/** Seed used for Monte Carlo calibration when no generator is injected. */
export const DEFAULT_SIMULATION_SEED = 20240613;

export interface BandLimits {
  lowerCount: number[];
  upperCount: number[];
}

/**
 * Pointwise binomial limits at level gamma: under uniformity the count of
 * PIT values <= k/K is Binomial(n, k/K), so the per-point interval is its
 * gamma/2 and 1 - gamma/2 quantiles.
 */
export function pointwiseLimits(n: number, k: number, gamma: number, lf = logFactorials(n)): BandLimits {
  const lowerCount = new Array<number>(k);
  const upperCount = new Array<number>(k);
  const tail = gamma / 2;
  for (let i = 0; i < k; i++) {
    const p = (i + 1) / k;
    lowerCount[i] = binomialQuantileLower(tail, n, p, lf);
    upperCount[i] = binomialQuantileUpper(tail, n, p, lf);
  }
  return { lowerCount, upperCount };
}

/**
 * Exact probability that a Uniform(0,1) ECDF of size n stays inside the
 * limits at every grid point.
 *
 * Forward recursion over the grid: given c values at or below t_{i-1},
 * the others are uniform on (t_{i-1}, 1], so the number landing in
 * (t_{i-1}, t_i] is Binomial(n - c, 1 / (K - i + 1)). Only counts inside
 * the band are carried forward.
 */
export function exactCoverage(n: number, limits: BandLimits, lf = logFactorials(n)): number {
  const k = limits.lowerCount.length;
  let current = new Float64Array(n + 1);
  let next = new Float64Array(n + 1);
  current[0] = 1;
  let lo = 0;
  let hi = 0;

  for (let i = 0; i < k; i++) {
    const q = 1 / (k - i);
    const lower = limits.lowerCount[i] ?? 0;
    const upper = limits.upperCount[i] ?? n;
    next.fill(0);

    for (let c = lo; c <= hi; c++) {
      const pc = current[c] ?? 0;
      if (pc === 0) continue;
      const m = n - c;
      const mean = m * q;
      const jEnd = Math.min(m, upper - c);
      for (let j = Math.max(0, lower - c); j <= jEnd; j++) {
        const lp = binomialLogPmf(j, m, q, lf);
        if (lp < LOG_NEGLIGIBLE) {
          if (j > mean) break;
          continue;
        }
        next[c + j] = (next[c + j] ?? 0) + pc * Math.exp(lp);
      }
    }

    [current, next] = [next, current];
    lo = lower;
    hi = upper;
  }

  let total = 0;
  for (let c = lo; c <= hi; c++) total += current[c] ?? 0;
  return total;
}

/**
 * ECDF count trajectories of `trials` independent uniform samples of size n,
 * stored row-major (trial × grid point).
 */
export function simulateTrajectories(n: number, k: number, trials: number, rng: PRNG): Int32Array {
  const out = new Int32Array(trials * k);
  const buckets = new Int32Array(k);
  for (let t = 0; t < trials; t++) {
    buckets.fill(0);
    for (let i = 0; i < n; i++) {
      const idx = Math.min(k - 1, Math.floor(rng() * k));
      buckets[idx] = (buckets[idx] ?? 0) + 1;
    }
    let acc = 0;
    const row = t * k;
    for (let j = 0; j < k; j++) {
      acc += buckets[j] ?? 0;
      out[row + j] = acc;
    }
  }
  return out;
}

/** Share of simulated trajectories that never leave the limits. */
export function simulatedCoverage(trajectories: Int32Array, limits: BandLimits): number {
  const k = limits.lowerCount.length;
  const trials = trajectories.length / k;
  let inside = 0;
  for (let t = 0; t < trials; t++) {
    const row = t * k;
    let ok = true;
    for (let j = 0; j < k; j++) {
      const c = trajectories[row + j] ?? 0;
      if (c < (limits.lowerCount[j] ?? 0) || c > (limits.upperCount[j] ?? Infinity)) {
        ok = false;
        break;
      }
    }
    if (ok) inside++;
  }
  return inside / trials;
}

interface Candidate extends BandLimits {
  gamma: number;
  coverage: number;
}

/**
 * Calibrate a simultaneous band for an ECDF of n PIT values checked at the
 * K grid points k/K.
 *
 * The per-point level gamma is bisected on a log scale until the joint
 * coverage of the pointwise binomial band reaches `confidence`. Coverage
 * falls as gamma grows, so the lower bracket end always has coverage at or
 * above the target; that end is returned once its coverage is within
 * `tolerance` of the target or the bracket has closed on the jump.
 *
 * @throws CalibrationNonConvergenceError when the target cannot be
 *   bracketed, or the iteration bound runs out first.
 */
export function computeBand(
  n: number,
  k: number,
  confidence: number,
  options: Partial<BandOptions> = {},
): Band {
  assertPositiveInteger('n', n);
  assertPositiveInteger('k', k);
  assertProbability('confidence', confidence);
  const config = { ...DEFAULT_BAND_OPTIONS, ...options };
  assertPositiveInteger('maxIterations', config.maxIterations);
  assertPositiveInteger('trials', config.trials);

  const lf = logFactorials(n);
  const trajectories =
    config.method === 'simulate'
      ? simulateTrajectories(n, k, config.trials, config.rng ?? createPRNG(DEFAULT_SIMULATION_SEED))
      : null;

  const evaluate = (gamma: number): Candidate => {
    const limits = pointwiseLimits(n, k, gamma, lf);
    const coverage = trajectories ? simulatedCoverage(trajectories, limits) : exactCoverage(n, limits, lf);
    return { ...limits, gamma, coverage };
  };

  let low = evaluate(GAMMA_MIN);
  if (!Number.isFinite(low.coverage) || low.coverage < confidence) {
    throw new CalibrationNonConvergenceError(n, k, confidence, low.gamma, low.coverage, 0);
  }
  let high = evaluate(GAMMA_MAX);
  if (high.coverage >= confidence) return toBand(n, k, confidence, high);

  const converged = () =>
    Math.abs(low.coverage - confidence) <= config.tolerance ||
    high.gamma / low.gamma - 1 <= GAMMA_RESOLUTION;

  let iterations = 0;
  while (!converged() && iterations < config.maxIterations) {
    const mid = Math.exp(0.5 * (Math.log(low.gamma) + Math.log(high.gamma)));
    const candidate = evaluate(mid);
    if (!Number.isFinite(candidate.coverage)) {
      throw new CalibrationNonConvergenceError(n, k, confidence, mid, candidate.coverage, iterations + 1);
    }
    if (candidate.coverage >= confidence) low = candidate;
    else high = candidate;
    iterations++;
  }

  if (!converged()) {
    throw new CalibrationNonConvergenceError(n, k, confidence, low.gamma, low.coverage, iterations);
  }
  return toBand(n, k, confidence, low);
}

function toBand(n: number, k: number, confidence: number, c: Candidate): Band {
  return {
    n,
    k,
    confidence,
    gamma: c.gamma,
    coverage: c.coverage,
    grid: Array.from({ length: k }, (_, i) => (i + 1) / k),
    lowerCount: c.lowerCount,
    upperCount: c.upperCount,
    lower: c.lowerCount.map((v) => v / n),
    upper: c.upperCount.map((v) => v / n),
  };
}
