// ---------------------------------------------------------------------------
// Smoothing kernels, each scaled so that `h` is the kernel's standard deviation
// ---------------------------------------------------------------------------

import type { KernelType } from '../types.js';

export interface Kernel {
  /** Density of the kernel with standard deviation h, at offset u. */
  evaluate(u: number, h: number): number;
  /** Offsets beyond support(h) contribute nothing. */
  support(h: number): number;
}

const SQRT2PI = Math.sqrt(2 * Math.PI);
const SQRT3 = Math.sqrt(3);
const SQRT5 = Math.sqrt(5);
const SQRT6 = Math.sqrt(6);

const gaussian: Kernel = {
  evaluate: (u, h) => {
    const z = u / h;
    return Math.exp(-0.5 * z * z) / (SQRT2PI * h);
  },
  support: (h) => 8 * h,
};

const epanechnikov: Kernel = {
  evaluate: (u, h) => {
    const a = SQRT5 * h;
    const z = u / a;
    return Math.abs(z) < 1 ? (0.75 * (1 - z * z)) / a : 0;
  },
  support: (h) => SQRT5 * h,
};

const rectangular: Kernel = {
  evaluate: (u, h) => {
    const a = SQRT3 * h;
    return Math.abs(u) < a ? 0.5 / a : 0;
  },
  support: (h) => SQRT3 * h,
};

const triangular: Kernel = {
  evaluate: (u, h) => {
    const a = SQRT6 * h;
    const z = Math.abs(u) / a;
    return z < 1 ? (1 - z) / a : 0;
  },
  support: (h) => SQRT6 * h,
};

const KERNELS: Record<KernelType, Kernel> = {
  gaussian,
  epanechnikov,
  rectangular,
  triangular,
};

export function getKernel(type: KernelType): Kernel {
  return KERNELS[type];
}
