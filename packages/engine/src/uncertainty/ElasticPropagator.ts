/**
 * Elastic Property Propagation
 *
 * Propagates length, transit time, density and shear modulus through the
 * velocity and elastic-modulus formulas by Monte Carlo sampling. Inputs are
 * drawn independently; every formula reuses the same draws of the
 * quantities it depends on.
 *
 * Units: length in cm and time in µs give velocity in m/s (× 1e4);
 * density in g/cm³ and velocity in m/s give GPa (× 1e-6).
 */

import type {
  ArrivalStatistics,
  ElasticInputs,
  ElasticModuliOutcome,
  ModulusDistribution,
  ModulusName,
  ModulusOutcome,
  UncertainScalar,
} from "@velopick/contracts";
import { MODULUS_NAMES, deterministic, gaussian } from "@velopick/contracts";
import { NonFiniteDistributionError } from "../errors";
import {
  SampledQuantity,
  ScalarSampler,
  type SamplingScheme,
} from "./SampledQuantity";

/**
 * Configuration for Monte Carlo propagation.
 */
export interface PropagationConfig {
  /** Draws per Gaussian input. @default 10000 */
  sampleCount?: number;

  /** RNG seed; each propagation run restarts from it. @default 0x5eed */
  rngSeed?: number;

  /** @default "random" */
  sampling?: SamplingScheme;
}

const DEFAULT_CONFIG: Required<PropagationConfig> = {
  sampleCount: 10000,
  rngSeed: 0x5eed,
  sampling: "random",
};

/**
 * Which earlier quantity each output is computed from. A failed dependency
 * blocks its dependents instead of letting them fail again.
 */
const DEPENDENCIES: Record<ModulusName, ModulusName | null> = {
  velocity: null,
  bulkModulus: "velocity",
  youngModulus: "bulkModulus",
  poissonsRatio: "bulkModulus",
};

/**
 * Transit time from pick statistics: Gaussian(mean, std), or exactly the
 * mean when the picks carry no spread.
 */
export function transitTimeFromStatistics(stats: ArrivalStatistics): UncertainScalar {
  return stats.std > 0 ? gaussian(stats.mean, stats.std) : deterministic(stats.mean);
}

/**
 * The four formulas, in evaluation order and with their unit constants.
 */
export function evaluateElasticFormulas(
  length: SampledQuantity,
  time: SampledQuantity,
  density: SampledQuantity,
  shear: SampledQuantity
): Record<ModulusName, SampledQuantity> {
  const velocity = length.dividedBy(time).times(1e4);
  const bulkModulus = SampledQuantity.constant(1e-6)
    .times(density)
    .times(velocity.pow(2))
    .minus(SampledQuantity.constant(4 / 3).times(shear));
  const threeK = SampledQuantity.constant(3).times(bulkModulus);
  const youngModulus = threeK
    .minus(SampledQuantity.constant(2).times(shear))
    .dividedBy(SampledQuantity.constant(2).times(threeK.plus(shear)));
  const poissonsRatio = SampledQuantity.constant(9)
    .times(bulkModulus)
    .times(shear)
    .dividedBy(threeK.plus(shear));
  return { velocity, bulkModulus, youngModulus, poissonsRatio };
}

/**
 * Mean and population std over the finite samples.
 *
 * @throws NonFiniteDistributionError if no sample is finite
 */
export function summarizeSamples(
  modulus: ModulusName,
  samples: ArrayLike<number>
): ModulusDistribution {
  let finiteCount = 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    if (Number.isFinite(samples[i])) {
      finiteCount++;
      sum += samples[i];
    }
  }

  if (finiteCount === 0) {
    throw new NonFiniteDistributionError(modulus, samples.length);
  }

  const mean = sum / finiteCount;
  let sq = 0;
  for (let i = 0; i < samples.length; i++) {
    if (Number.isFinite(samples[i])) {
      sq += (samples[i] - mean) * (samples[i] - mean);
    }
  }

  return {
    mean,
    std: Math.sqrt(sq / finiteCount),
    samples: Array.from(samples),
    finiteCount,
    nonFiniteFraction: (samples.length - finiteCount) / samples.length,
  };
}

/**
 * Draw every input once (length, density, shear, time, in that order) and
 * evaluate the formulas over the draws.
 */
export function sampleElasticModuli(
  inputs: ElasticInputs,
  config: PropagationConfig = {}
): Record<ModulusName, SampledQuantity> {
  const { sampleCount, rngSeed, sampling } = { ...DEFAULT_CONFIG, ...config };
  const sampler = new ScalarSampler(sampleCount, rngSeed, sampling);

  const length = sampler.realize(inputs.length);
  const density = sampler.realize(inputs.density);
  const shear = sampler.realize(inputs.shear);
  const time = sampler.realize(inputs.transitTime);

  return evaluateElasticFormulas(length, time, density, shear);
}

/**
 * Propagate inputs to velocity, bulk modulus, Young's modulus and Poisson's
 * ratio. A quantity whose samples are all non-finite is reported as failed
 * once; quantities computed from it are reported as skipped.
 */
export function propagateElasticModuli(
  inputs: ElasticInputs,
  config: PropagationConfig = {}
): ElasticModuliOutcome {
  const sampled = sampleElasticModuli(inputs, config);
  const outcome: Partial<ElasticModuliOutcome> = {};

  for (const name of MODULUS_NAMES) {
    outcome[name] = summarizeOutcome(name, sampled[name], outcome);
  }

  return {
    velocity: requireOutcome(outcome, "velocity"),
    bulkModulus: requireOutcome(outcome, "bulkModulus"),
    youngModulus: requireOutcome(outcome, "youngModulus"),
    poissonsRatio: requireOutcome(outcome, "poissonsRatio"),
  };
}

function summarizeOutcome(
  name: ModulusName,
  quantity: SampledQuantity,
  earlier: Partial<ElasticModuliOutcome>
): ModulusOutcome {
  const dependency = DEPENDENCIES[name];
  const upstream = dependency ? earlier[dependency] : undefined;
  if (dependency && upstream?.status === "failed") {
    return { status: "skipped", blockedBy: dependency };
  }
  if (upstream?.status === "skipped") {
    return { status: "skipped", blockedBy: upstream.blockedBy };
  }

  try {
    return { status: "ok", distribution: summarizeSamples(name, quantity.samples) };
  } catch (error) {
    if (error instanceof NonFiniteDistributionError) {
      return { status: "failed", error };
    }
    throw error;
  }
}

function requireOutcome(
  outcome: Partial<ElasticModuliOutcome>,
  name: ModulusName
): ModulusOutcome {
  const result = outcome[name];
  if (!result) {
    throw new Error(`No outcome computed for ${name}`);
  }
  return result;
}

/**
 * The distribution of one quantity, or the error that stopped it.
 *
 * @throws NonFiniteDistributionError for a failed quantity, or the failure
 * that blocked a skipped one
 */
export function requireDistribution(
  outcome: ElasticModuliOutcome,
  name: ModulusName
): ModulusDistribution {
  const result = outcome[name];
  if (result.status === "ok") return result.distribution;
  if (result.status === "failed") throw result.error;
  return requireDistribution(outcome, result.blockedBy);
}
