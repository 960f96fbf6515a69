export { ecdfDeviation, deviationEnvelope, bandExceedances } from './ecdf.js';
