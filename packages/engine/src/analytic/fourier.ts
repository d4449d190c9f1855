/**
 * Arbitrary-length discrete Fourier transforms on top of fft.js.
 *
 * fft.js only handles power-of-two sizes. Other lengths go through
 * Bluestein's chirp-z algorithm, which rewrites an N-point DFT as a circular
 * convolution of power-of-two length M >= 2N - 1.
 */

import FFT from "fft.js";

export interface ComplexSignal {
  re: number[];
  im: number[];
}

const transforms = new Map<number, FFT>();

function getTransform(size: number): FFT {
  let fft = transforms.get(size);
  if (!fft) {
    fft = new FFT(size);
    transforms.set(size, fft);
  }
  return fft;
}

export function isPowerOfTwo(n: number): boolean {
  return n >= 2 && (n & (n - 1)) === 0;
}

function nextPowerOfTwo(n: number): number {
  let p = 2;
  while (p < n) p *= 2;
  return p;
}

function interleave(fft: FFT, signal: ComplexSignal): number[] {
  const data = fft.createComplexArray();
  for (let i = 0; i < signal.re.length; i++) {
    data[2 * i] = signal.re[i];
    data[2 * i + 1] = signal.im[i];
  }
  return data;
}

function split(data: number[], n: number): ComplexSignal {
  const re = new Array<number>(n);
  const im = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    re[i] = data[2 * i];
    im[i] = data[2 * i + 1];
  }
  return { re, im };
}

function radix(signal: ComplexSignal): ComplexSignal {
  const n = signal.re.length;
  const fft = getTransform(n);
  const out = fft.createComplexArray();
  fft.transform(out, interleave(fft, signal));
  return split(out, n);
}

function bluestein(signal: ComplexSignal): ComplexSignal {
  const n = signal.re.length;
  const m = nextPowerOfTwo(2 * n - 1);
  const fft = getTransform(m);

  // Chirp w[k] = exp(-iπk²/n); k² is reduced mod 2n to keep the angle exact
  const chirpRe = new Array<number>(n);
  const chirpIm = new Array<number>(n);
  for (let k = 0; k < n; k++) {
    const angle = (-Math.PI * ((k * k) % (2 * n))) / n;
    chirpRe[k] = Math.cos(angle);
    chirpIm[k] = Math.sin(angle);
  }

  const a = fft.createComplexArray();
  for (let k = 0; k < n; k++) {
    const xr = signal.re[k];
    const xi = signal.im[k];
    a[2 * k] = xr * chirpRe[k] - xi * chirpIm[k];
    a[2 * k + 1] = xr * chirpIm[k] + xi * chirpRe[k];
  }

  const b = fft.createComplexArray();
  b[0] = chirpRe[0];
  b[1] = -chirpIm[0];
  for (let k = 1; k < n; k++) {
    b[2 * k] = chirpRe[k];
    b[2 * k + 1] = -chirpIm[k];
    b[2 * (m - k)] = chirpRe[k];
    b[2 * (m - k) + 1] = -chirpIm[k];
  }

  const fa = fft.createComplexArray();
  const fb = fft.createComplexArray();
  fft.transform(fa, a);
  fft.transform(fb, b);

  const product = fft.createComplexArray();
  for (let i = 0; i < m; i++) {
    const ar = fa[2 * i];
    const ai = fa[2 * i + 1];
    const br = fb[2 * i];
    const bi = fb[2 * i + 1];
    product[2 * i] = ar * br - ai * bi;
    product[2 * i + 1] = ar * bi + ai * br;
  }

  const conv = fft.createComplexArray();
  fft.inverseTransform(conv, product);

  const re = new Array<number>(n);
  const im = new Array<number>(n);
  for (let k = 0; k < n; k++) {
    const cr = conv[2 * k];
    const ci = conv[2 * k + 1];
    re[k] = cr * chirpRe[k] - ci * chirpIm[k];
    im[k] = cr * chirpIm[k] + ci * chirpRe[k];
  }
  return { re, im };
}

/**
 * Forward DFT: X[k] = Σ x[j]·exp(-2πi·jk/N), for any N.
 */
export function dft(signal: ComplexSignal): ComplexSignal {
  const n = signal.re.length;
  if (n === 0) return { re: [], im: [] };
  if (n === 1) return { re: [signal.re[0]], im: [signal.im[0]] };
  return isPowerOfTwo(n) ? radix(signal) : bluestein(signal);
}

/**
 * Inverse DFT, normalized by 1/N.
 */
export function idft(spectrum: ComplexSignal): ComplexSignal {
  const n = spectrum.re.length;
  if (n === 0) return { re: [], im: [] };
  // idft(X) = conj(dft(conj(X))) / N
  const forward = dft({ re: spectrum.re, im: spectrum.im.map((v) => -v) });
  return {
    re: forward.re.map((v) => v / n),
    im: forward.im.map((v) => -v / n),
  };
}
