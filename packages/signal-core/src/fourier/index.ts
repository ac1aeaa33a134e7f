// Fourier analysis
export {
  nextPow2,
  fftInPlace,
  ifftInPlace,
  fft,
  binAngularFrequency,
} from './fft.js';
