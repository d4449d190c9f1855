/**
 * Sampled Quantities
 *
 * Monte Carlo realization of UncertainScalars with elementwise arithmetic.
 * A deterministic value (or a Gaussian with zero spread) realizes as a
 * single sample and broadcasts against N draws, so one set of operators
 * serves both tags and an all-deterministic evaluation collapses to N = 1.
 */

import type { UncertainScalar } from "@velopick/contracts";
import { centralValue } from "@velopick/contracts";
import {
  latinHypercubeNormals,
  mulberry32,
  standardNormal,
  type Rng,
} from "./random";

export type Operand = SampledQuantity | number;

export class SampledQuantity {
  readonly samples: Float64Array;

  private constructor(samples: Float64Array) {
    this.samples = samples;
  }

  static constant(value: number): SampledQuantity {
    return new SampledQuantity(Float64Array.of(value));
  }

  static fromSamples(samples: ArrayLike<number>): SampledQuantity {
    if (samples.length === 0) {
      throw new RangeError("SampledQuantity needs at least one sample");
    }
    return new SampledQuantity(Float64Array.from(samples));
  }

  get size(): number {
    return this.samples.length;
  }

  get isDeterministic(): boolean {
    return this.samples.length === 1;
  }

  plus(other: Operand): SampledQuantity {
    return this.combine(other, (a, b) => a + b);
  }

  minus(other: Operand): SampledQuantity {
    return this.combine(other, (a, b) => a - b);
  }

  times(other: Operand): SampledQuantity {
    return this.combine(other, (a, b) => a * b);
  }

  dividedBy(other: Operand): SampledQuantity {
    return this.combine(other, (a, b) => a / b);
  }

  pow(exponent: number): SampledQuantity {
    return new SampledQuantity(this.samples.map((v) => v ** exponent));
  }

  private combine(
    other: Operand,
    op: (a: number, b: number) => number
  ): SampledQuantity {
    const rhs = typeof other === "number" ? SampledQuantity.constant(other) : other;
    const n = Math.max(this.size, rhs.size);
    if ((this.size !== n && this.size !== 1) || (rhs.size !== n && rhs.size !== 1)) {
      throw new RangeError(
        `Cannot combine sample sets of sizes ${this.size} and ${rhs.size}`
      );
    }
    const out = new Float64Array(n);
    for (let i = 0; i < n; i++) {
      out[i] = op(
        this.samples[this.size === 1 ? 0 : i],
        rhs.samples[rhs.size === 1 ? 0 : i]
      );
    }
    return new SampledQuantity(out);
  }
}

/**
 * How Gaussian inputs are drawn:
 * - "random": independent Box–Muller draws
 * - "latin-hypercube": one draw per equal-probability stratum, shuffled
 */
export type SamplingScheme = "random" | "latin-hypercube";

/**
 * Draws sample sets for a sequence of scalars from one seeded stream.
 * Realization order matters: the same seed and order replay the same draws.
 */
export class ScalarSampler {
  readonly sampleCount: number;
  readonly scheme: SamplingScheme;
  private readonly rng: Rng;

  constructor(sampleCount: number, seed: number, scheme: SamplingScheme = "random") {
    if (!Number.isInteger(sampleCount) || sampleCount < 1) {
      throw new RangeError(`sampleCount must be a positive integer, got ${sampleCount}`);
    }
    this.sampleCount = sampleCount;
    this.scheme = scheme;
    this.rng = mulberry32(seed);
  }

  realize(scalar: UncertainScalar): SampledQuantity {
    if (scalar.kind === "deterministic" || scalar.std === 0) {
      return SampledQuantity.constant(centralValue(scalar));
    }
    const normals =
      this.scheme === "latin-hypercube"
        ? latinHypercubeNormals(this.sampleCount, this.rng)
        : Array.from({ length: this.sampleCount }, () => standardNormal(this.rng));
    return SampledQuantity.fromSamples(
      normals.map((z) => scalar.mean + scalar.std * z)
    );
  }
}
