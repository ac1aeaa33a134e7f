// ---------------------------------------------------------------------------
// Wavelet Packet Transform (WPT)
// ---------------------------------------------------------------------------
// Like the DWT, but both the approximation and the detail branch are split
// again at every level: level L has 2^L nodes, each covering an equal-width
// frequency band.

import type { DiscreteWavelet, PacketNode } from '../types.js';
import { convolveDownsample, getScalingFilter, getWaveletFilter } from './dwt.js';

/**
 * Node paths at `level` in frequency order.
 *
 * High-pass downsampling mirrors the spectrum, so natural (lexicographic)
 * order is not frequency order; the Gray-code sequence is.
 */
export function frequencyOrderPaths(level: number): string[] {
  if (level < 1) return [''];
  let order = ['a', 'd'];
  for (let i = 1; i < level; i++) {
    order = [
      ...order.map((p) => 'a' + p),
      ...[...order].reverse().map((p) => 'd' + p),
    ];
  }
  return order;
}

/** Deepest packet level that still leaves at least one coefficient per node. */
export function maxPacketLevel(signalLength: number): number {
  return Math.max(1, Math.floor(Math.log2(Math.max(2, signalLength))));
}

/**
 * Full packet decomposition down to `level`, returned in frequency order.
 */
export function waveletPacketDecompose(
  signal: ArrayLike<number>,
  wavelet: DiscreteWavelet,
  level: number,
): PacketNode[] {
  const depth = Math.min(maxPacketLevel(signal.length), Math.max(1, Math.floor(level)));
  const h = getScalingFilter(wavelet);
  const g = getWaveletFilter(wavelet);

  let nodes = new Map<string, Float64Array>([['', Float64Array.from(signal)]]);
  for (let l = 0; l < depth; l++) {
    const next = new Map<string, Float64Array>();
    for (const [path, data] of nodes) {
      next.set(path + 'a', convolveDownsample(data, h));
      next.set(path + 'd', convolveDownsample(data, g));
    }
    nodes = next;
  }

  const ordered: PacketNode[] = [];
  for (const path of frequencyOrderPaths(depth)) {
    const coefficients = nodes.get(path);
    if (coefficients) ordered.push({ path, coefficients });
  }
  return ordered;
}

/** Σ c² over a node's coefficients. */
export function nodeEnergy(node: PacketNode): number {
  let sum = 0;
  for (let i = 0; i < node.coefficients.length; i++) {
    sum += node.coefficients[i]! * node.coefficients[i]!;
  }
  return sum;
}
