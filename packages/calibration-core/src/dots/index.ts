export {
  DotLayout,
  layoutDots,
  dotQuantiles,
  defaultDotBinWidth,
  binDotPositions,
  stackDots,
  DEGENERATE_DOT_WIDTH,
} from './dot-layout.js';
