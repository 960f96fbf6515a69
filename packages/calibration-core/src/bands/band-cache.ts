// ---------------------------------------------------------------------------
// Band memoisation keyed by (n, K, confidence, method)
// ---------------------------------------------------------------------------

import type { Band, BandOptions } from '../types.js';
import { DEFAULT_BAND_OPTIONS } from '../types.js';
import { computeBand } from './simultaneous-band.js';

/**
 * A band depends only on (n, K, confidence) and the coverage method, never
 * on sample content, so diagnostics sharing those can share one band.
 * Oldest entries are evicted first once `limit` is reached.
 */
export class BandCache {
  private readonly entries = new Map<string, Band>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly limit = 64) {}

  static key(n: number, k: number, confidence: number, options: Partial<BandOptions> = {}): string {
    const method = options.method ?? DEFAULT_BAND_OPTIONS.method;
    const trials = method === 'simulate' ? `:${options.trials ?? DEFAULT_BAND_OPTIONS.trials}` : '';
    return `${n}:${k}:${confidence}:${method}${trials}`;
  }

  get(n: number, k: number, confidence: number, options: Partial<BandOptions> = {}): Band {
    const key = BandCache.key(n, k, confidence, options);
    const cached = this.entries.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const band = computeBand(n, k, confidence, options);
    if (this.entries.size >= this.limit) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, band);
    return band;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }
}
