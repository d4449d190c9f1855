// fft.js ships no type declarations and has no @types package.
declare module "fft.js" {
  class FFT {
    constructor(size: number);
    readonly size: number;
    createComplexArray(): number[];
    transform(out: number[], data: ArrayLike<number>): void;
    inverseTransform(out: number[], data: ArrayLike<number>): void;
  }
  export = FFT;
}
