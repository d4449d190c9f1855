export {
  ArrivalEstimator,
  computeArrivalStatistics,
  arrivalDensityCurve,
} from "./ArrivalEstimator";
