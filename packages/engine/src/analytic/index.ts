export {
  analyticSignal,
  computeAnalyticRepresentation,
  hilbertWeights,
} from "./AnalyticSignal";
export { dft, idft, isPowerOfTwo, type ComplexSignal } from "./fourier";
