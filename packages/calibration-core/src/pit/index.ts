export { computePIT, type DensityRepresentation } from './pit.js';
