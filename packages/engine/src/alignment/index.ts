export { dtw, cumulativeCost, type CostMatrix } from "./dtw";
export {
  alignSegments,
  alignmentTimePairs,
  nearestAlignedPair,
  type SegmentAnalysis,
} from "./alignSegments";
