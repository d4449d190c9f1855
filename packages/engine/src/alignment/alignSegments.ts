/**
 * Runs DTW on the three representation pairs of a template/query pair and
 * maps paths back onto the signals' time axes.
 */

import type {
  AlignedTimePair,
  AlignmentPath,
  AlignmentSet,
  AnalyticRepresentation,
  NormalizedSegment,
  Us,
} from "@velopick/contracts";
import { dtw } from "./dtw";

/**
 * A segment together with its analytic representation.
 */
export interface SegmentAnalysis {
  segment: NormalizedSegment;
  analytic: AnalyticRepresentation;
}

/**
 * Align query (reference) against template (target) on the raw normalized
 * amplitudes, the envelopes and the phases.
 */
export function alignSegments(
  query: SegmentAnalysis,
  template: SegmentAnalysis
): AlignmentSet {
  return {
    raw: dtw(query.segment.amplitudes, template.segment.amplitudes),
    envelope: dtw(query.analytic.envelope, template.analytic.envelope),
    phase: dtw(query.analytic.phase, template.analytic.phase),
  };
}

/**
 * Express a query-referenced path as (queryTime, templateTime) points.
 */
export function alignmentTimePairs(
  path: AlignmentPath,
  querySegment: NormalizedSegment,
  templateSegment: NormalizedSegment
): AlignedTimePair[] {
  return path.referenceIndices.map((ref, k) => ({
    queryTime: querySegment.times[ref - 1],
    templateTime: templateSegment.times[path.targetIndices[k] - 1],
  }));
}

/**
 * The path point closest to (queryTime, templateTime); the first one wins
 * on equal distance. Null for an empty path.
 */
export function nearestAlignedPair(
  pairs: readonly AlignedTimePair[],
  queryTime: Us,
  templateTime: Us
): AlignedTimePair | null {
  let best: AlignedTimePair | null = null;
  let bestDistance = Infinity;
  for (const pair of pairs) {
    const d = Math.hypot(pair.queryTime - queryTime, pair.templateTime - templateTime);
    if (d < bestDistance) {
      best = pair;
      bestDistance = d;
    }
  }
  return best;
}
