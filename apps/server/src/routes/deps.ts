import type { BandCache } from '@stepped-pit/calibration-core'

/** What the compute routes share with the app. */
export interface RouteDeps {
  cache: BandCache
  maxSampleSize: number
  /** Largest n × K a request may calibrate. */
  maxBandCells: number
  defaultSeed: number
}
