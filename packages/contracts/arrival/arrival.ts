import type { Us } from "../core/time";

/**
 * Summary of the operator's arrival-time picks for one signal.
 * std is the population standard deviation.
 */
export interface ArrivalStatistics {
  min: Us;
  max: Us;
  mean: Us;
  std: Us;
  /** Number of picks the statistics were computed from */
  count: number;
}

/**
 * Neutral prior reported before the operator has picked anything.
 */
export const DEFAULT_ARRIVAL_STATISTICS: Readonly<ArrivalStatistics> = {
  min: -1,
  max: 1,
  mean: 0,
  std: 0.25,
  count: 0,
};

/**
 * One point of the Gaussian density drawn over a pick histogram.
 */
export interface DensityPoint {
  time: Us;
  density: number;
}
