/**
 * Alignment Types
 *
 * Output of dynamic time warping between a reference and a target sequence.
 */

import type { Us } from "../core/time";

/**
 * Which waveform representation a path was computed on.
 */
export type RepresentationKind = "raw" | "envelope" | "phase";

export const REPRESENTATION_KINDS: readonly RepresentationKind[] = [
  "raw",
  "envelope",
  "phase",
];

/**
 * A monotonic warping path between a reference sequence A and a target
 * sequence B.
 *
 * Invariants:
 * - referenceIndices.length === targetIndices.length
 * - both index sequences are 1-based and non-decreasing
 * - the path starts at (1, 1) and ends at (|A|, |B|)
 */
export interface AlignmentPath {
  referenceIndices: number[];
  targetIndices: number[];
  /** Accumulated cost at (|A|, |B|) */
  cost: number;
}

/**
 * The three paths computed for one template/query pair. The query is the
 * reference and the template the target in each of them.
 */
export type AlignmentSet = Record<RepresentationKind, AlignmentPath>;

/**
 * One point of a warping path expressed in the two signals' time axes.
 */
export interface AlignedTimePair {
  queryTime: Us;
  templateTime: Us;
}
