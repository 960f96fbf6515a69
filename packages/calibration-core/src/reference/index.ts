export { ReferenceDistribution } from './reference-distribution.js';
