// ---------------------------------------------------------------------------
// FFT — Cooley-Tukey Radix-2 DIT
// ---------------------------------------------------------------------------
// X[k] = Σ_{n=0}^{N-1} x[n]·e^{-j2πkn/N}
// Iterative butterflies after bit-reversal permutation, O(N log N).
// Callers zero-pad to a power of 2 (see nextPow2).

function isPow2(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

/** Next power of 2 >= n. */
export function nextPow2(n: number): number {
  let p = 1;
  while (p < n) p <<= 1;
  return p;
}

/**
 * In-place forward FFT. Both arrays must share a power-of-2 length.
 */
export function fftInPlace(re: Float64Array, im: Float64Array): void {
  const N = re.length;
  if (!isPow2(N)) throw new Error(`FFT length must be power of 2, got ${N}`);
  if (im.length !== N) throw new Error(`FFT real/imag length mismatch: ${N} vs ${im.length}`);

  for (let i = 1, j = 0; i < N; i++) {
    let bit = N >> 1;
    while (j & bit) {
      j ^= bit;
      bit >>= 1;
    }
    j ^= bit;
    if (i < j) {
      let tmp = re[i]!;
      re[i] = re[j]!;
      re[j] = tmp;
      tmp = im[i]!;
      im[i] = im[j]!;
      im[j] = tmp;
    }
  }

  for (let len = 2; len <= N; len <<= 1) {
    const half = len >> 1;
    const angle = -2 * Math.PI / len;
    const wRe = Math.cos(angle);
    const wIm = Math.sin(angle);

    for (let i = 0; i < N; i += len) {
      let curRe = 1;
      let curIm = 0;
      for (let j = 0; j < half; j++) {
        const a = i + j;
        const b = a + half;
        const tRe = curRe * re[b]! - curIm * im[b]!;
        const tIm = curRe * im[b]! + curIm * re[b]!;
        re[b] = re[a]! - tRe;
        im[b] = im[a]! - tIm;
        re[a] = re[a]! + tRe;
        im[a] = im[a]! + tIm;
        const nextRe = curRe * wRe - curIm * wIm;
        curIm = curRe * wIm + curIm * wRe;
        curRe = nextRe;
      }
    }
  }
}

/** In-place inverse FFT via the conjugate trick: IFFT(X) = conj(FFT(conj(X)))/N. */
export function ifftInPlace(re: Float64Array, im: Float64Array): void {
  const N = re.length;
  for (let i = 0; i < N; i++) im[i] = -im[i]!;
  fftInPlace(re, im);
  for (let i = 0; i < N; i++) {
    re[i] = re[i]! / N;
    im[i] = -im[i]! / N;
  }
}

/**
 * Spectrum of a real signal zero-padded to `nfft` (default: next power of 2).
 */
export function fft(signal: ArrayLike<number>, nfft?: number): { re: Float64Array; im: Float64Array; N: number } {
  const N = nfft ?? nextPow2(signal.length);
  const re = new Float64Array(N);
  const im = new Float64Array(N);
  const n = Math.min(signal.length, N);
  for (let i = 0; i < n; i++) re[i] = signal[i]!;
  fftInPlace(re, im);
  return { re, im, N };
}

/**
 * Signed angular frequency of bin k in an N-point FFT, in radians/sample.
 * Bins above N/2 map to negative frequencies.
 */
export function binAngularFrequency(k: number, N: number): number {
  const signed = k <= N / 2 ? k : k - N;
  return (2 * Math.PI * signed) / N;
}
