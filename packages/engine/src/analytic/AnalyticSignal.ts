/**
 * Analytic Representation
 *
 * Envelope and instantaneous phase of a normalized segment, from its
 * discrete analytic signal. The envelope tracks arrival energy; the phase
 * tracks individual cycles. Both are aligned separately so the operator can
 * cross-check the arrival they imply.
 */

import type {
  AnalyticRepresentation,
  NormalizedSegment,
} from "@velopick/contracts";
import { dft, idft, type ComplexSignal } from "./fourier";

/**
 * Spectral weights turning a real spectrum into an analytic one:
 * DC (and Nyquist, for even N) kept, positive frequencies doubled,
 * negative frequencies removed.
 */
export function hilbertWeights(n: number): number[] {
  const h = new Array<number>(n).fill(0);
  if (n === 0) return h;
  h[0] = 1;
  if (n % 2 === 0) {
    h[n / 2] = 1;
    for (let i = 1; i < n / 2; i++) h[i] = 2;
  } else {
    for (let i = 1; i < (n + 1) / 2; i++) h[i] = 2;
  }
  return h;
}

/**
 * N-point analytic signal of a real sequence. The real part reproduces the
 * input; the imaginary part is its discrete Hilbert transform.
 */
export function analyticSignal(samples: readonly number[]): ComplexSignal {
  const n = samples.length;
  const spectrum = dft({ re: [...samples], im: new Array<number>(n).fill(0) });
  const h = hilbertWeights(n);
  return idft({
    re: spectrum.re.map((v, i) => v * h[i]),
    im: spectrum.im.map((v, i) => v * h[i]),
  });
}

export function computeAnalyticRepresentation(
  segment: NormalizedSegment
): AnalyticRepresentation {
  const z = analyticSignal(segment.amplitudes);
  const envelope = z.re.map((re, i) => Math.hypot(re, z.im[i]));
  const phase = z.re.map((re, i) => {
    const p = Math.atan2(z.im[i], re) / Math.PI;
    // atan2 returns -π for (-x, -0); fold it onto +π
    return p <= -1 ? 1 : p;
  });
  return { envelope, phase };
}
