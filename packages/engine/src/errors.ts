import type { ModulusName, Window } from "@velopick/contracts";

export type DegenerateWindowReason = "empty" | "zero-amplitude";

/**
 * A window selection that cannot be normalized: it holds no samples, or all
 * of its samples are zero. Callers keep their previous segment.
 */
export class DegenerateWindowError extends Error {
  readonly reason: DegenerateWindowReason;
  readonly window: Window;

  constructor(reason: DegenerateWindowReason, window: Window) {
    const detail =
      reason === "empty"
        ? "selects no samples"
        : "selects only zero-amplitude samples";
    super(`Window [${window.start}, ${window.finish}] ${detail}`);
    this.name = "DegenerateWindowError";
    this.reason = reason;
    this.window = { ...window };
  }
}

/**
 * Every Monte Carlo sample of a propagated quantity is NaN or infinite.
 */
export class NonFiniteDistributionError extends Error {
  readonly modulus: ModulusName;
  readonly sampleCount: number;

  constructor(modulus: ModulusName, sampleCount: number) {
    super(`All ${sampleCount} samples of ${modulus} are non-finite`);
    this.name = "NonFiniteDistributionError";
    this.modulus = modulus;
    this.sampleCount = sampleCount;
  }
}
