// Session orchestrator
export * from "./session";

// Windowing & normalization
export * from "./windowing";

// Envelope and phase
export * from "./analytic";

// Dynamic time warping
export * from "./alignment";

// Arrival picks
export * from "./arrival";

// Monte Carlo propagation
export * from "./uncertainty";

export {
  DegenerateWindowError,
  NonFiniteDistributionError,
  type DegenerateWindowReason,
} from "./errors";
