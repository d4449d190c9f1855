/**
 * Signal Types
 *
 * Waveform data as it flows through the windowing and analytic stages.
 * Times are in microseconds throughout the core.
 */

import type { Us } from "../core/time";

/**
 * An ordered waveform recording. Times are strictly increasing.
 * Loaded once by the caller and never mutated afterwards.
 */
export interface TimeSeries {
  readonly times: readonly Us[];
  readonly amplitudes: readonly number[];
}

/**
 * Time bounds selecting the part of a TimeSeries under study.
 * A window with start > finish selects nothing.
 */
export interface Window {
  start: Us;
  finish: Us;
}

/**
 * Samples inside a Window, amplitude-scaled so that the largest absolute
 * amplitude is exactly 1.
 */
export interface NormalizedSegment {
  times: Us[];
  amplitudes: number[];
  /** The absolute amplitude every sample was divided by */
  scale: number;
}

/**
 * Envelope and phase of the analytic signal of a NormalizedSegment.
 * Both arrays have the segment's length.
 */
export interface AnalyticRepresentation {
  /** |z|, always >= 0 */
  envelope: number[];
  /** arg(z) / π, in (-1, 1] */
  phase: number[];
}

/**
 * Build a TimeSeries, rejecting inputs that break its invariants.
 *
 * @throws RangeError if the arrays differ in length, are empty, hold
 * non-finite values, or the times are not strictly increasing
 */
export function createTimeSeries(
  times: readonly number[],
  amplitudes: readonly number[]
): TimeSeries {
  if (times.length !== amplitudes.length) {
    throw new RangeError(
      `TimeSeries needs one amplitude per time (${times.length} times, ${amplitudes.length} amplitudes)`
    );
  }
  if (times.length === 0) {
    throw new RangeError("TimeSeries needs at least one sample");
  }
  for (let i = 0; i < times.length; i++) {
    if (!Number.isFinite(times[i]) || !Number.isFinite(amplitudes[i])) {
      throw new RangeError(`TimeSeries sample ${i} is not finite`);
    }
    if (i > 0 && times[i] <= times[i - 1]) {
      throw new RangeError(
        `TimeSeries times must be strictly increasing (index ${i}: ${times[i]} after ${times[i - 1]})`
      );
    }
  }
  return { times: [...times], amplitudes: [...amplitudes] };
}
