// ---------------------------------------------------------------------------
// @stepped-pit/calibration-core: PIT diagnostics for density representations
// ---------------------------------------------------------------------------

// Types + errors
export * from './types.js';
export * from './errors.js';

// Normal, binomial and descriptive helpers
export * from './math/index.js';

// Stepped reference distribution
export * from './reference/index.js';

// Representations: KDE, histogram, quantile dots
export * from './density/index.js';
export * from './histogram/index.js';
export * from './dots/index.js';

// PIT + ECDF comparison
export * from './pit/index.js';
export * from './ecdf/index.js';

// Simultaneous bands
export * from './bands/index.js';

// End-to-end pipeline
export * from './diagnostics/index.js';
