/**
 * Elastic Property Types
 *
 * Inputs and outputs of the Monte Carlo propagation from transit time to
 * velocity and elastic moduli.
 */

import type { UncertainScalar } from "../core/uncertainty";

/**
 * Per-state material measurements (dry for the template, saturated for the
 * query).
 */
export interface MaterialProperties {
  /** Bulk density, g/cm³ */
  density: UncertainScalar;
  /** Shear modulus, GPa */
  shear: UncertainScalar;
}

/**
 * Everything one propagation run consumes.
 */
export interface ElasticInputs extends MaterialProperties {
  /** Sample length, cm */
  length: UncertainScalar;
  /** Transit time, µs */
  transitTime: UncertainScalar;
}

/**
 * Derived outputs, in evaluation order. Each one may depend on those
 * before it.
 */
export type ModulusName =
  | "velocity"
  | "bulkModulus"
  | "youngModulus"
  | "poissonsRatio";

export const MODULUS_NAMES: readonly ModulusName[] = [
  "velocity",
  "bulkModulus",
  "youngModulus",
  "poissonsRatio",
];

/**
 * Sample statistics of one propagated quantity.
 * mean and std are computed over the finite samples only.
 */
export interface ModulusDistribution {
  mean: number;
  std: number;
  /** Every draw, non-finite ones included */
  samples: number[];
  finiteCount: number;
  /** Share of samples that are NaN or infinite (0..1) */
  nonFiniteFraction: number;
}

export type ModulusOutcome =
  | { status: "ok"; distribution: ModulusDistribution }
  | { status: "failed"; error: Error }
  | { status: "skipped"; blockedBy: ModulusName };

export type ElasticModuliOutcome = Record<ModulusName, ModulusOutcome>;
