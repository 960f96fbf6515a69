export {
  computeBand,
  pointwiseLimits,
  exactCoverage,
  simulateTrajectories,
  simulatedCoverage,
  DEFAULT_SIMULATION_SEED,
  type BandLimits,
} from './simultaneous-band.js';
export { BandCache } from './band-cache.js';
