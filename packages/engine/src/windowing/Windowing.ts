/**
 * Windowing & Normalization
 *
 * Selects a time-bounded slice of a waveform and scales it to unit peak
 * amplitude. All functions are pure; the caller owns the Window and replaces
 * it with the result of adjustBound.
 */

import type {
  TimeSeries,
  Window,
  NormalizedSegment,
  Us,
} from "@velopick/contracts";
import { DegenerateWindowError } from "../errors";

/**
 * Initial window: the two samples straddling the middle of the series.
 * A single-sample series gets a zero-width window on that sample.
 */
export function createDefaultWindow(series: TimeSeries): Window {
  const mid = Math.floor(series.times.length / 2);
  const last = series.times.length - 1;
  return {
    start: series.times[Math.min(mid, last)],
    finish: series.times[Math.min(mid + 1, last)],
  };
}

/**
 * Move whichever bound is closer to `time` onto it.
 * Equal distance moves the finish bound.
 */
export function adjustBound(window: Window, time: Us): Window {
  if (Math.abs(time - window.start) < Math.abs(time - window.finish)) {
    return { start: time, finish: window.finish };
  }
  return { start: window.start, finish: time };
}

/**
 * Samples with start <= t <= finish, divided by their largest absolute
 * amplitude.
 *
 * @throws DegenerateWindowError if no sample falls inside the window or
 * every sample inside it is zero
 */
export function extractNormalized(
  series: TimeSeries,
  window: Window
): NormalizedSegment {
  const times: Us[] = [];
  const raw: number[] = [];

  for (let i = 0; i < series.times.length; i++) {
    const t = series.times[i];
    if (window.start <= t && t <= window.finish) {
      times.push(t);
      raw.push(series.amplitudes[i]);
    }
  }

  if (times.length === 0) {
    throw new DegenerateWindowError("empty", window);
  }

  let scale = 0;
  for (const a of raw) {
    const abs = Math.abs(a);
    if (abs > scale) scale = abs;
  }

  if (scale === 0) {
    throw new DegenerateWindowError("zero-amplitude", window);
  }

  return {
    times,
    amplitudes: raw.map((a) => a / scale),
    scale,
  };
}
