// ---------------------------------------------------------------------------
// Binomial distribution on a shared log-factorial table
// ---------------------------------------------------------------------------

const logFactorialCache = new Map<number, Float64Array>();

/**
 * log(i!) for i = 0..n. Tables are cached per n; the band calibrator asks
 * for the same n on every bisection step.
 */
export function logFactorials(n: number): Float64Array {
  const cached = logFactorialCache.get(n);
  if (cached) return cached;

  const table = new Float64Array(n + 1);
  for (let i = 2; i <= n; i++) {
    table[i] = (table[i - 1] ?? 0) + Math.log(i);
  }
  logFactorialCache.set(n, table);
  return table;
}

/** log P(X = j) for X ~ Binomial(m, q). Requires a table covering m. */
export function binomialLogPmf(j: number, m: number, q: number, lf: Float64Array): number {
  if (j < 0 || j > m) return -Infinity;
  if (q <= 0) return j === 0 ? 0 : -Infinity;
  if (q >= 1) return j === m ? 0 : -Infinity;
  return (
    (lf[m] ?? 0) -
    (lf[j] ?? 0) -
    (lf[m - j] ?? 0) +
    j * Math.log(q) +
    (m - j) * Math.log1p(-q)
  );
}

export function binomialPmf(j: number, m: number, q: number, lf: Float64Array = logFactorials(m)): number {
  return Math.exp(binomialLogPmf(j, m, q, lf));
}

/**
 * Range outside of which Binomial(n, p) carries negligible mass
 * (beyond twelve standard deviations plus a Poisson-tail guard).
 */
function effectiveSupport(n: number, p: number): [number, number] {
  const mu = n * p;
  const sd = Math.sqrt(n * p * (1 - p));
  const lo = Math.max(0, Math.floor(mu - 12 * sd - 10));
  const hi = Math.min(n, Math.ceil(mu + 12 * sd + 10));
  return [lo, hi];
}

/** Smallest c with P(X <= c) >= prob, X ~ Binomial(n, p). */
export function binomialQuantileLower(
  prob: number,
  n: number,
  p: number,
  lf: Float64Array = logFactorials(n),
): number {
  if (p <= 0) return 0;
  if (p >= 1) return n;

  const [lo, hi] = effectiveSupport(n, p);
  let cum = 0;
  for (let c = lo; c <= hi; c++) {
    cum += Math.exp(binomialLogPmf(c, n, p, lf));
    if (cum >= prob) return c;
  }
  return hi;
}

/**
 * Smallest c with P(X > c) <= tail, X ~ Binomial(n, p).
 * Summed from the top so tiny tail levels keep their precision.
 */
export function binomialQuantileUpper(
  tail: number,
  n: number,
  p: number,
  lf: Float64Array = logFactorials(n),
): number {
  if (p <= 0) return 0;
  if (p >= 1) return n;

  const [lo, hi] = effectiveSupport(n, p);
  let above = 0;
  for (let c = hi; c > lo; c--) {
    const next = above + Math.exp(binomialLogPmf(c, n, p, lf));
    if (next > tail) return c;
    above = next;
  }
  return lo;
}
