export { SignalComponent } from './component.js';
export { NoiseComponent, NOISE_SCHEMA, type NoiseParams } from './noise.js';
export { SineComponent, SINE_SCHEMA, type SineLevels, type SineParams } from './sine.js';
export { RectPulseComponent, RECT_PULSE_SCHEMA, overlappingPulses, type RectPulseParams } from './rect-pulse.js';
export { GaussPulseComponent, GAUSS_PULSE_SCHEMA, pulseCenters, type GaussPulseParams } from './gauss-pulse.js';
export { ChirpComponent, CHIRP_SCHEMA, type ChirpParams } from './chirp.js';
export {
  COMPONENT_CATALOG,
  isComponentKind,
  createComponent,
  type Component,
  type ComponentDescriptor,
} from './catalog.js';
