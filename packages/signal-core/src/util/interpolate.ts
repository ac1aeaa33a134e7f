// ---------------------------------------------------------------------------
// Linear Stretch
// ---------------------------------------------------------------------------

/**
 * Resample `values` onto `length` evenly spaced points spanning the same
 * extent (first and last samples are preserved). Inputs of length ≤ 1 give
 * zeros.
 */
export function stretchToLength(values: ArrayLike<number>, length: number): Float64Array {
  const out = new Float64Array(Math.max(0, Math.floor(length)));
  const m = values.length;
  if (m <= 1 || out.length === 0) return out;
  if (out.length === 1) {
    out[0] = values[0]!;
    return out;
  }

  const step = (m - 1) / (out.length - 1);
  for (let i = 0; i < out.length; i++) {
    const pos = i * step;
    const lo = Math.min(m - 2, Math.floor(pos));
    const frac = pos - lo;
    out[i] = values[lo]! * (1 - frac) + values[lo + 1]! * frac;
  }
  return out;
}
