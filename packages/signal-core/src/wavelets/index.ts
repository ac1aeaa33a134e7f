// Wavelet decompositions: leveled DWT, wavelet packets, continuous transform.
export {
  DISCRETE_WAVELETS,
  isDiscreteWavelet,
  getScalingFilter,
  getWaveletFilter,
  convolveDownsample,
  maxLevel,
  dwtDecompose,
} from './dwt.js';

export {
  frequencyOrderPaths,
  maxPacketLevel,
  waveletPacketDecompose,
  nodeEnergy,
} from './packet.js';

export {
  CONTINUOUS_WAVELETS,
  isContinuousWavelet,
  waveletSpectrum,
  centralFrequency,
  frequencyToScale,
  cwt,
} from './cwt.js';
