/**
 * Sample Metadata Adapter
 *
 * Validates the per-sample metadata record produced by the loading layer
 * and converts it to the uncertain inputs of the propagation stage. The
 * template is the dry state, the query the saturated one.
 */

import { z } from "zod";
import type { MaterialProperties, UncertainScalar } from "@velopick/contracts";
import { gaussian } from "@velopick/contracts";

const FiniteNumber = z.number().finite();
const Spread = z.number().finite().nonnegative();

export const DensityRecord = z.object({
  mean: FiniteNumber,
  std: Spread,
});

export const ShearRecord = z.object({
  mu: FiniteNumber,
  d_mu: Spread,
});

export const SampleMetadataRecord = z.object({
  length: z.object({
    /** Repeated caliper readings, cm */
    raw: z.array(FiniteNumber).nonempty(),
  }),
  density: z.object({
    dry: DensityRecord,
    sat: DensityRecord,
  }),
  shear: z.object({
    dry: ShearRecord,
    sat: ShearRecord,
  }),
});

export type TSampleMetadataRecord = z.infer<typeof SampleMetadataRecord>;

/**
 * Uncertain inputs for one template/query pair.
 */
export interface SampleProperties {
  /** Shared by both states */
  length: UncertainScalar;
  template: MaterialProperties;
  query: MaterialProperties;
}

/**
 * Gaussian of repeated measurements: their mean and population std.
 */
export function measurementDistribution(values: readonly number[]): UncertainScalar {
  if (values.length === 0) {
    throw new RangeError("Need at least one measurement");
  }
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance =
    values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
  return gaussian(mean, Math.sqrt(variance));
}

/**
 * @throws ZodError if the record does not match SampleMetadataRecord
 */
export function parseSampleMetadata(record: unknown): SampleProperties {
  const metadata = SampleMetadataRecord.parse(record);
  return {
    length: measurementDistribution(metadata.length.raw),
    template: {
      density: gaussian(metadata.density.dry.mean, metadata.density.dry.std),
      shear: gaussian(metadata.shear.dry.mu, metadata.shear.dry.d_mu),
    },
    query: {
      density: gaussian(metadata.density.sat.mean, metadata.density.sat.std),
      shear: gaussian(metadata.shear.sat.mu, metadata.shear.sat.d_mu),
    },
  };
}
