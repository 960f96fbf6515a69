export {
  ruleOfThumbBandwidth,
  pluginBandwidth,
  selectBandwidth,
  bandwidthRuleName,
  minBandwidth,
  type BandwidthSelection,
} from './bandwidth.js';
export { getKernel, type Kernel } from './kernels.js';
export { KernelDensity, estimateDensity, linearGrid } from './kernel-density.js';
