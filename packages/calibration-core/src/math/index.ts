export { normalPdf, normalCdf, normalQuantile, erfc } from './normal.js';
export {
  logFactorials,
  binomialLogPmf,
  binomialPmf,
  binomialQuantileLower,
  binomialQuantileUpper,
} from './binomial.js';
export {
  mean,
  sampleStdDev,
  sortAscending,
  quantileSorted,
  interquartileRange,
  lastIndexAtOrBelow,
} from './descriptive.js';
