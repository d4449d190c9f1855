/**
 * Waveform Adapter
 *
 * Converts recorder output (time in seconds, amplitude) into a TimeSeries on
 * the microsecond axis used throughout the core. Parsing the recorder's
 * file format is the loading layer's job; this adapter takes numbers.
 */

import { z } from "zod";
import type { Seconds, TimeSeries, Us } from "@velopick/contracts";
import { createTimeSeries } from "@velopick/contracts";

/**
 * Configuration for waveform conversion.
 */
export interface WaveformAdapterConfig {
  /**
   * Factor applied to recorder times.
   * @default 1e6 (seconds to microseconds)
   */
  timeScale?: number;

  /** Column holding time in each row. @default 0 */
  timeColumn?: number;

  /** Column holding amplitude in each row. @default 1 */
  amplitudeColumn?: number;
}

const DEFAULT_CONFIG: Required<WaveformAdapterConfig> = {
  timeScale: 1e6,
  timeColumn: 0,
  amplitudeColumn: 1,
};

export const WaveformColumns = z
  .object({
    seconds: z.array(z.number().finite()).nonempty(),
    amplitude: z.array(z.number().finite()).nonempty(),
  })
  .refine((c) => c.seconds.length === c.amplitude.length, {
    message: "seconds and amplitude must have the same length",
  });

export type TWaveformColumns = z.infer<typeof WaveformColumns>;

export const WaveformRows = z.array(z.array(z.number().finite())).nonempty();

/**
 * @throws ZodError on malformed columns, RangeError if times are not
 * strictly increasing
 */
export function waveformFromColumns(
  columns: unknown,
  config: WaveformAdapterConfig = {}
): TimeSeries {
  const { timeScale } = { ...DEFAULT_CONFIG, ...config };
  const { seconds, amplitude } = WaveformColumns.parse(columns);
  return createTimeSeries(
    seconds.map((s: Seconds): Us => s * timeScale),
    amplitude
  );
}

/**
 * Rows of numbers as read from a delimited recorder export; columns past
 * the time and amplitude columns are ignored.
 *
 * @throws ZodError on malformed rows or a row too short for the configured
 * columns
 */
export function waveformFromRows(
  rows: unknown,
  config: WaveformAdapterConfig = {}
): TimeSeries {
  const { timeColumn, amplitudeColumn } = { ...DEFAULT_CONFIG, ...config };
  const needed = Math.max(timeColumn, amplitudeColumn) + 1;
  const parsed = WaveformRows.refine((r) => r.every((row) => row.length >= needed), {
    message: `every row needs at least ${needed} columns`,
  }).parse(rows);

  return waveformFromColumns(
    {
      seconds: parsed.map((row) => row[timeColumn]),
      amplitude: parsed.map((row) => row[amplitudeColumn]),
    },
    config
  );
}
