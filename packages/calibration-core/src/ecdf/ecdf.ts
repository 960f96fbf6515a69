// ---------------------------------------------------------------------------
// ECDF of a PIT sample, measured against the identity and a band
// ---------------------------------------------------------------------------

import { assertPositiveInteger, InvalidParameterError } from '../errors.js';
import { lastIndexAtOrBelow, sortAscending } from '../math/descriptive.js';
import type { Band, EcdfDeviationPoint, Exceedance, PITSample, Point } from '../types.js';

/**
 * ECDF(z) - z at z = k/K for k = 1..K. This is the curve drawn against
 * the band: it stays near zero when the PIT sample is uniform.
 */
export function ecdfDeviation(pit: PITSample, k: number): EcdfDeviationPoint[] {
  assertPositiveInteger('k', k);
  if (pit.length === 0) {
    throw new InvalidParameterError('pit', '[]', 'must contain at least one value');
  }
  const sorted = sortAscending(pit);
  const n = sorted.length;
  const out: EcdfDeviationPoint[] = new Array<EcdfDeviationPoint>(k);
  for (let i = 0; i < k; i++) {
    const z = (i + 1) / k;
    const count = lastIndexAtOrBelow(sorted, z) + 1;
    out[i] = { x: z, y: count / n - z };
  }
  return out;
}

/** Band limits on the deviation scale (limit minus grid point). */
export function deviationEnvelope(band: Band): { lower: Point[]; upper: Point[] } {
  return {
    lower: band.grid.map((z, i) => ({ x: z, y: (band.lower[i] ?? 0) - z })),
    upper: band.grid.map((z, i) => ({ x: z, y: (band.upper[i] ?? 1) - z })),
  };
}

/** Grid points where the deviation curve leaves the band. */
export function bandExceedances(deviation: readonly EcdfDeviationPoint[], band: Band): Exceedance[] {
  if (deviation.length !== band.k) {
    throw new InvalidParameterError('deviation', deviation.length, `must have one point per band grid point (${band.k})`);
  }
  const out: Exceedance[] = [];
  for (let i = 0; i < deviation.length; i++) {
    const point = deviation[i];
    if (!point) continue;
    const z = band.grid[i] ?? point.x;
    const lowerDev = (band.lower[i] ?? 0) - z;
    const upperDev = (band.upper[i] ?? 1) - z;
    if (point.y < lowerDev) {
      out.push({ index: i, gridPoint: z, deviation: point.y, excess: point.y - lowerDev });
    } else if (point.y > upperDev) {
      out.push({ index: i, gridPoint: z, deviation: point.y, excess: point.y - upperDev });
    }
  }
  return out;
}
