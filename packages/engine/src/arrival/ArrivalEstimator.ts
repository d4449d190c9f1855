/**
 * Arrival Estimator
 *
 * Turns the operator's repeated arrival-time picks for one signal into a
 * statistical estimate of transit time. Picks are append-only for the life
 * of a session.
 */

import type {
  ArrivalStatistics,
  DensityPoint,
  Us,
} from "@velopick/contracts";
import { DEFAULT_ARRIVAL_STATISTICS } from "@velopick/contracts";

/**
 * min, max, mean and population std of the picks, or the neutral default
 * when there are none.
 */
export function computeArrivalStatistics(picks: readonly Us[]): ArrivalStatistics {
  if (picks.length === 0) {
    return { ...DEFAULT_ARRIVAL_STATISTICS };
  }

  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const p of picks) {
    if (p < min) min = p;
    if (p > max) max = p;
    sum += p;
  }
  const mean = sum / picks.length;

  let sq = 0;
  for (const p of picks) {
    sq += (p - mean) * (p - mean);
  }

  return {
    min,
    max,
    mean,
    std: Math.sqrt(sq / picks.length),
    count: picks.length,
  };
}

/**
 * Gaussian pdf over [min - 2σ, max + 2σ], sampled at `points` evenly spaced
 * times. Empty when σ is 0.
 */
export function arrivalDensityCurve(
  stats: ArrivalStatistics,
  points = 50
): DensityPoint[] {
  if (stats.std === 0 || points < 2) return [];

  const lo = stats.min - 2 * stats.std;
  const hi = stats.max + 2 * stats.std;
  const step = (hi - lo) / (points - 1);
  const norm = 1 / (stats.std * Math.sqrt(2 * Math.PI));

  const curve: DensityPoint[] = [];
  for (let i = 0; i < points; i++) {
    const time = lo + i * step;
    const z = (time - stats.mean) / stats.std;
    curve.push({ time, density: norm * Math.exp(-0.5 * z * z) });
  }
  return curve;
}

export class ArrivalEstimator {
  private values: Us[] = [];

  get picks(): readonly Us[] {
    return this.values;
  }

  addPick(value: Us): void {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Arrival pick must be finite, got ${value}`);
    }
    this.values.push(value);
  }

  statistics(): ArrivalStatistics {
    return computeArrivalStatistics(this.values);
  }
}
