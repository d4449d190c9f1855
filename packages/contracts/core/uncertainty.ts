/**
 * Uncertain Scalars
 *
 * A measured quantity is either known exactly or described by a Gaussian.
 * Arithmetic over both tags lives in the engine (SampledQuantity); this
 * module only defines the shapes and their validated constructors.
 */

export interface DeterministicScalar {
  kind: "deterministic";
  value: number;
}

export interface GaussianScalar {
  kind: "gaussian";
  mean: number;
  /** Standard deviation, >= 0. A zero std degenerates to the mean. */
  std: number;
}

export type UncertainScalar = DeterministicScalar | GaussianScalar;

export function deterministic(value: number): DeterministicScalar {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Deterministic value must be finite, got ${value}`);
  }
  return { kind: "deterministic", value };
}

export function gaussian(mean: number, std: number): GaussianScalar {
  if (!Number.isFinite(mean)) {
    throw new RangeError(`Gaussian mean must be finite, got ${mean}`);
  }
  if (!Number.isFinite(std) || std < 0) {
    throw new RangeError(`Gaussian std must be finite and >= 0, got ${std}`);
  }
  return { kind: "gaussian", mean, std };
}

/** Central value of either tag. */
export function centralValue(scalar: UncertainScalar): number {
  return scalar.kind === "deterministic" ? scalar.value : scalar.mean;
}
