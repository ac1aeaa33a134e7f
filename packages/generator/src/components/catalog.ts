// ---------------------------------------------------------------------------
// Component catalog
// ---------------------------------------------------------------------------

import type { ComponentKind, Schema } from '@wavescope/types';
import { NoiseComponent, NOISE_SCHEMA } from './noise.js';
import { SineComponent, SINE_SCHEMA } from './sine.js';
import { RectPulseComponent, RECT_PULSE_SCHEMA } from './rect-pulse.js';
import { GaussPulseComponent, GAUSS_PULSE_SCHEMA } from './gauss-pulse.js';
import { ChirpComponent, CHIRP_SCHEMA } from './chirp.js';

/** Every signal component variant, discriminated by `kind`. */
export type Component =
  | NoiseComponent
  | SineComponent
  | RectPulseComponent
  | GaussPulseComponent
  | ChirpComponent;

type RawParams = Readonly<Record<string, unknown>>;

export interface ComponentDescriptor {
  kind: ComponentKind;
  name: string;
  schema: Schema;
  create(params?: RawParams, enabled?: boolean): Component;
}

export const COMPONENT_CATALOG: Readonly<Record<ComponentKind, ComponentDescriptor>> = {
  noise: {
    kind: 'noise',
    name: 'Gaussian noise',
    schema: NOISE_SCHEMA,
    create: (params, enabled) => new NoiseComponent(params, enabled),
  },
  sine: {
    kind: 'sine',
    name: 'Sine',
    schema: SINE_SCHEMA,
    create: (params, enabled) => new SineComponent(params, enabled),
  },
  rect_pulse: {
    kind: 'rect_pulse',
    name: 'Rectangular pulses',
    schema: RECT_PULSE_SCHEMA,
    create: (params, enabled) => new RectPulseComponent(params, enabled),
  },
  gauss_pulse: {
    kind: 'gauss_pulse',
    name: 'Gaussian pulses',
    schema: GAUSS_PULSE_SCHEMA,
    create: (params, enabled) => new GaussPulseComponent(params, enabled),
  },
  chirp: {
    kind: 'chirp',
    name: 'Linear chirp',
    schema: CHIRP_SCHEMA,
    create: (params, enabled) => new ChirpComponent(params, enabled),
  },
};

export function isComponentKind(kind: string): kind is ComponentKind {
  return Object.prototype.hasOwnProperty.call(COMPONENT_CATALOG, kind);
}

/** Build a component of a known kind; `undefined` for an unknown one. */
export function createComponent(kind: string, params?: RawParams, enabled?: boolean): Component | undefined {
  return isComponentKind(kind) ? COMPONENT_CATALOG[kind].create(params, enabled) : undefined;
}
