export {
  Histogram,
  buildHistogram,
  histogramBinWidth,
  DEGENERATE_BIN_WIDTH,
  MAX_HISTOGRAM_BINS,
  type BinWidthSelection,
} from './histogram.js';
