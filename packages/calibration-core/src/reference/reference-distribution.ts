// ---------------------------------------------------------------------------
// Three-piece "stepped" reference distribution
// ---------------------------------------------------------------------------

import { assertFinite, assertPositive, assertPositiveInteger, InvalidParameterError } from '../errors.js';
import { normalCdf, normalPdf, normalQuantile } from '../math/normal.js';
import type { PRNG, ReferenceParams, Region } from '../types.js';

/**
 * Smallest tail normaliser accepted. Below it Φ underflows, and even a
 * draw scaled by Number.EPSILON would round to 0 in the inverse CDF.
 */
export const MIN_TAIL_MASS = 1e-300;

/**
 * Truncated standard normal below `splitLeft`, a flat middle on
 * [splitLeft, splitRight], and a truncated N(0, rightScale²) above
 * `splitRight`. The density jumps at both split points.
 *
 * Piece masses are pLeft, pRight - pLeft and 1 - pRight, so the density
 * integrates to 1 by construction.
 */
export class ReferenceDistribution {
  readonly splitLeft: number;
  readonly splitRight: number;
  readonly rightScale: number;
  readonly pLeft: number;
  readonly pRight: number;

  // Normalisers of the two truncated tails
  private readonly leftMass: number;   // Φ(a)
  private readonly rightMass: number;  // 1 - Φ(b/s), as Φ(-b/s)
  private readonly middleHeight: number;

  constructor(params: ReferenceParams) {
    const { splitLeft, splitRight, rightScale } = params;
    assertFinite('splitLeft', splitLeft);
    assertFinite('splitRight', splitRight);
    assertPositive('rightScale', rightScale);
    if (splitLeft >= splitRight) {
      throw new InvalidParameterError('splitLeft', splitLeft, `must be less than splitRight (${splitRight})`);
    }

    const pLeft = params.pLeft ?? normalCdf(splitLeft);
    const pRight = params.pRight ?? normalCdf(splitRight);
    assertFinite('pLeft', pLeft);
    assertFinite('pRight', pRight);
    if (!(pLeft > 0 && pLeft < pRight && pRight < 1)) {
      throw new InvalidParameterError('pLeft/pRight', `${pLeft}/${pRight}`, 'require 0 < pLeft < pRight < 1');
    }

    const leftMass = normalCdf(splitLeft);
    const rightMass = normalCdf(-splitRight / rightScale);
    if (!(leftMass >= MIN_TAIL_MASS)) {
      throw new InvalidParameterError('splitLeft', splitLeft, `left tail mass Φ(splitLeft) is below ${MIN_TAIL_MASS}`);
    }
    if (!(rightMass >= MIN_TAIL_MASS)) {
      throw new InvalidParameterError(
        'splitRight/rightScale',
        `${splitRight}/${rightScale}`,
        `right tail mass Φ(-splitRight/rightScale) is below ${MIN_TAIL_MASS}`,
      );
    }

    this.splitLeft = splitLeft;
    this.splitRight = splitRight;
    this.rightScale = rightScale;
    this.pLeft = pLeft;
    this.pRight = pRight;
    this.leftMass = leftMass;
    this.rightMass = rightMass;
    this.middleHeight = (pRight - pLeft) / (splitRight - splitLeft);
  }

  /** Inclusive-left: both split points belong to the middle piece. */
  regionOf(x: number): Region {
    if (x < this.splitLeft) return 'left';
    if (x <= this.splitRight) return 'middle';
    return 'right';
  }

  density(x: number): number {
    const s = this.rightScale;
    switch (this.regionOf(x)) {
      case 'left':
        return (this.pLeft * normalPdf(x)) / this.leftMass;
      case 'middle':
        return this.middleHeight;
      case 'right':
        return ((1 - this.pRight) * normalPdf(x / s)) / s / this.rightMass;
    }
  }

  cdf(x: number): number {
    if (x === -Infinity) return 0;
    if (x === Infinity) return 1;
    switch (this.regionOf(x)) {
      case 'left':
        return (this.pLeft * normalCdf(x)) / this.leftMass;
      case 'middle':
        return this.pLeft + this.middleHeight * (x - this.splitLeft);
      case 'right':
        return 1 - ((1 - this.pRight) * normalCdf(-x / this.rightScale)) / this.rightMass;
    }
  }

  quantile(p: number): number {
    if (p <= 0) return -Infinity;
    if (p >= 1) return Infinity;
    if (p < this.pLeft) {
      return normalQuantile((p / this.pLeft) * this.leftMass);
    }
    if (p <= this.pRight) {
      return this.splitLeft + (p - this.pLeft) / this.middleHeight;
    }
    return -this.rightScale * normalQuantile(((1 - p) / (1 - this.pRight)) * this.rightMass);
  }

  /**
   * n independent draws. A first uniform picks the piece; a second one is
   * pushed through that piece's (truncated) inverse CDF.
   */
  sample(n: number, rng: PRNG = Math.random): number[] {
    assertPositiveInteger('n', n);
    const out = new Array<number>(n);
    for (let i = 0; i < n; i++) {
      const u = rng();
      const v = Math.max(rng(), Number.EPSILON);
      if (u < this.pLeft) {
        out[i] = normalQuantile(v * this.leftMass);
      } else if (u < this.pRight) {
        out[i] = this.splitLeft + v * (this.splitRight - this.splitLeft);
      } else {
        out[i] = -this.rightScale * normalQuantile(v * this.rightMass);
      }
    }
    return out;
  }

  toParams(): Required<ReferenceParams> {
    return {
      splitLeft: this.splitLeft,
      splitRight: this.splitRight,
      rightScale: this.rightScale,
      pLeft: this.pLeft,
      pRight: this.pRight,
    };
  }
}
