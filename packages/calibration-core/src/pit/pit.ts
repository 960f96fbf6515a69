// ---------------------------------------------------------------------------
// Probability Integral Transform against a fitted representation
// ---------------------------------------------------------------------------

import { assertNonEmptySample } from '../errors.js';
import type { DotLayout } from '../dots/dot-layout.js';
import type { Histogram } from '../histogram/histogram.js';
import type { KernelDensity } from '../density/kernel-density.js';
import type { CdfEvaluator, PITSample, Sample } from '../types.js';

/** The three ways a sample can be drawn, tagged by `kind`. */
export type DensityRepresentation = KernelDensity | Histogram | DotLayout;

/**
 * Map every observation through the representation's CDF.
 *
 * u_i = F̂(x_i), clamped to [0, 1]. If F̂ matched the sample's true CDF the
 * result would be Uniform(0, 1); any systematic departure is bias the
 * representation introduces.
 */
export function computePIT(representation: CdfEvaluator, sample: Sample): PITSample {
  assertNonEmptySample(sample);
  const pit = new Array<number>(sample.length);
  for (let i = 0; i < sample.length; i++) {
    const u = representation.evaluateCDFAt(sample[i] ?? 0);
    pit[i] = Math.max(0, Math.min(1, u));
  }
  return pit;
}
