// ---------------------------------------------------------------------------
// Signal Component — base contract
// ---------------------------------------------------------------------------
// A component renders its contribution to the half-open interval
// [startTime, startTime + length/sampleRate). Parameters arrive as loose maps
// and are coerced against the component's schema into a typed record.

import type { ComponentKind, ParamValues, Schema } from '@wavescope/types';
import { coerceParams } from '@wavescope/shared';

export abstract class SignalComponent<P> {
  abstract readonly kind: ComponentKind;
  abstract readonly name: string;
  enabled: boolean;
  /** Coerced values, the form snapshots and saved configurations carry. */
  private values: ParamValues;
  protected params: P;

  constructor(raw: Readonly<Record<string, unknown>> = {}, enabled = true) {
    this.enabled = enabled;
    this.values = coerceParams(this.schema(), raw);
    this.params = this.parse(this.values);
  }

  abstract schema(): Schema;

  /** Typed view of a coerced map. Must not touch instance state. */
  protected abstract parse(values: ParamValues): P;

  /** Write this component's samples into `out` (zero-initialized). */
  protected abstract render(out: Float64Array, startTime: number, sampleRate: number): void;

  /** Deep copy of the current parameter values. */
  getParams(): ParamValues {
    const copy: ParamValues = {};
    for (const [key, value] of Object.entries(this.values)) {
      copy[key] = Array.isArray(value) ? [...value] : value;
    }
    return copy;
  }

  /** Merge a partial map; unknown keys are dropped, bad values ignored. */
  updateParams(partial: Readonly<Record<string, unknown>>): void {
    this.values = coerceParams(this.schema(), partial, this.values);
    this.params = this.parse(this.values);
  }

  /** Exactly `length` samples; all zero while disabled. */
  generate(startTime: number, length: number, sampleRate: number): Float64Array {
    const out = new Float64Array(Math.max(0, Math.floor(length)));
    if (this.enabled && out.length > 0 && sampleRate > 0) {
      this.render(out, startTime, sampleRate);
    }
    return out;
  }
}
