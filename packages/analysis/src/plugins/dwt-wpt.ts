// ---------------------------------------------------------------------------
// Built-in: DWT levels / wavelet-packet nodes (ordinal axis)
// ---------------------------------------------------------------------------
// DWT mode: one row per detail level (deepest first), optionally preceded by
// the approximation. WPT mode: one row per selected packet node at the
// requested depth, in frequency order. Every row is linearly stretched back to
// the window length so columns line up with the time axis.

import type { ParamValues, PluginMetadata, Schema, TransformPlugin, TransformResult } from '@wavescope/types';
import { BUILTIN_DWT_ID } from '@wavescope/config';
import { coerceParams, readBool, readChoice, readNumber, readStringList } from '@wavescope/shared';
import {
  DISCRETE_WAVELETS,
  dwtDecompose,
  nodeEnergy,
  stretchToLength,
  waveletPacketDecompose,
  type DiscreteWavelet,
  type PacketNode,
} from '@wavescope/signal-core';
import {
  MAGNITUDE_MODES,
  MAGNITUDE_PARAM,
  MIN_TRANSFORM_SAMPLES,
  NORMALIZE_MODES,
  NORMALIZE_PARAM,
  applyMagnitude,
  degenerateResult,
  normalizeImage,
  ordinalAxis,
  timeAxis,
  type MagnitudeMode,
} from './common.js';

export const DWT_META: PluginMetadata = {
  id: BUILTIN_DWT_ID,
  name: 'DWT/WPT: levels and packet nodes',
  kind: 'DWT/WPT',
  version: '1.1',
  description: 'Discrete (DWT) and wavelet packet (WPT) decomposition shown as a matrix of levels or nodes.',
};

const Y_LABEL = 'level/node';

export const DECOMPOSITION_MODES = ['DWT', 'WPT'] as const;
export const NODE_SELECTIONS = ['all', 'top_energy'] as const;

export const DWT_SCHEMA: Schema = [
  {
    key: 'mode', label: 'Mode', type: 'enum', default: 'WPT', choices: DECOMPOSITION_MODES,
    description: 'DWT shows detail levels; WPT shows packet nodes.',
    examples: ['DWT: compact, by level', 'WPT: finer frequency bands'],
  },
  {
    key: 'wavelet', label: 'Wavelet family', type: 'enum', default: 'db4', choices: DISCRETE_WAVELETS,
    description: 'Discrete wavelet used for both decompositions.',
    examples: ['haar: simple and fast', 'db4: general purpose'],
  },
  {
    key: 'maxlevel', label: 'Max level', type: 'int', default: 5, min: 1, max: 14, step: 1,
    description: 'Upper bound on the decomposition depth. WPT depth is set separately.',
    examples: ['5: typical for 2-6 s windows', '8-12: long windows'],
  },
  {
    key: 'show_approx', label: 'DWT: include approximation', type: 'bool', default: false,
    description: 'Prepend the approximation row A(L) to the detail rows.',
    examples: ['Useful to see the low-frequency trend'],
  },
  {
    key: 'wpt_level', label: 'WPT: level', type: 'int', default: 4, min: 1, max: 14, step: 1,
    description: 'Packet decomposition depth, capped at the max level.',
    examples: ['4: baseline', '6-10: more bands, more CPU'],
  },
  {
    key: 'wpt_nodes', label: 'WPT: nodes (comma separated, empty = all)', type: 'string_list', default: [],
    description: 'Node paths to display. Empty shows every node of the level.',
    examples: ['aa, ad, da, dd', 'empty: all nodes'],
  },
  {
    key: 'wpt_select', label: 'WPT: node selection', type: 'enum', default: 'all', choices: NODE_SELECTIONS,
    description: 'Show all nodes or only the most energetic ones.',
    examples: ['all: full level', 'top_energy: strongest bands'],
  },
  {
    key: 'top_k', label: 'WPT: node count (top energy)', type: 'int', default: 8, min: 1, max: 256, step: 1,
    description: 'How many nodes to keep when selecting by energy.',
    examples: ['8: typical', '32-64: more detail'],
  },
  MAGNITUDE_PARAM,
  NORMALIZE_PARAM,
];

interface Decomposition {
  rows: Float32Array[];
  labels: string[];
  meta: Record<string, unknown>;
}

function stretchedRow(coefficients: ArrayLike<number>, length: number, magnitude: MagnitudeMode): Float32Array {
  const stretched = stretchToLength(coefficients, length);
  const row = new Float32Array(length);
  for (let i = 0; i < length; i++) row[i] = applyMagnitude(stretched[i]!, magnitude);
  return row;
}

function decomposeLevels(
  samples: Float32Array,
  wavelet: DiscreteWavelet,
  values: ParamValues,
  magnitude: MagnitudeMode,
): Decomposition {
  const n = samples.length;
  const result = dwtDecompose(samples, wavelet, readNumber(values, 'maxlevel', 5));
  const rows: Float32Array[] = [];
  const labels: string[] = [];

  if (readBool(values, 'show_approx', false)) {
    rows.push(stretchedRow(result.approximation, n, magnitude));
    labels.push(`A${result.levels}`);
  }
  for (let level = result.levels; level >= 1; level--) {
    rows.push(stretchedRow(result.details[level - 1]!, n, magnitude));
    labels.push(`D${level}`);
  }

  return { rows, labels, meta: { mode: 'DWT', wavelet, labels, level: result.levels } };
}

/**
 * Filter frequency-ordered nodes by explicit path list, then optionally keep
 * the `topK` most energetic. With `top_energy` the result is strongest first;
 * otherwise it stays in frequency order.
 */
export function selectPacketNodes(
  nodes: readonly PacketNode[],
  wanted: readonly string[],
  selection: (typeof NODE_SELECTIONS)[number],
  topK: number,
): PacketNode[] {
  const selected = wanted.length > 0 ? nodes.filter((node) => wanted.includes(node.path)) : [...nodes];
  if (selection !== 'top_energy') return selected;
  // Stable sort: ties keep frequency order.
  return selected
    .map((node) => ({ node, energy: nodeEnergy(node) }))
    .sort((a, b) => b.energy - a.energy)
    .slice(0, Math.max(1, Math.floor(topK)))
    .map((entry) => entry.node);
}

function decomposePackets(
  samples: Float32Array,
  wavelet: DiscreteWavelet,
  values: ParamValues,
  magnitude: MagnitudeMode,
): Decomposition {
  const n = samples.length;
  const requested = Math.min(readNumber(values, 'wpt_level', 4), readNumber(values, 'maxlevel', 5));
  const nodes = waveletPacketDecompose(samples, wavelet, requested);
  const level = nodes[0]?.path.length ?? requested;

  const selected = selectPacketNodes(
    nodes,
    readStringList(values, 'wpt_nodes'),
    readChoice(values, 'wpt_select', NODE_SELECTIONS, 'all'),
    readNumber(values, 'top_k', 8),
  );

  const rows = selected.map((node) => stretchedRow(node.coefficients, n, magnitude));
  const labels = selected.map((node) => node.path);
  if (rows.length === 0) {
    rows.push(new Float32Array(n));
    labels.push('(none)');
  }

  return { rows, labels, meta: { mode: 'WPT', wavelet, level, labels } };
}

export class DwtWptPlugin implements TransformPlugin {
  describeParameters(): Schema {
    return DWT_SCHEMA;
  }

  transform(samples: Float32Array, sampleRate: number, params: ParamValues): TransformResult {
    const n = samples.length;
    if (n < MIN_TRANSFORM_SAMPLES) return degenerateResult(n, sampleRate, Y_LABEL);

    const values = coerceParams(DWT_SCHEMA, params);
    const wavelet = readChoice<DiscreteWavelet>(values, 'wavelet', DISCRETE_WAVELETS, 'db4');
    const magnitude = readChoice(values, 'magnitude', MAGNITUDE_MODES, 'abs');
    const mode = readChoice(values, 'mode', DECOMPOSITION_MODES, 'WPT');

    const { rows, meta } = mode === 'DWT'
      ? decomposeLevels(samples, wavelet, values, magnitude)
      : decomposePackets(samples, wavelet, values, magnitude);
    normalizeImage(rows, readChoice(values, 'normalize', NORMALIZE_MODES, 'none'));

    return {
      image: rows,
      yAxis: ordinalAxis(rows.length),
      xAxis: timeAxis(n, sampleRate),
      yLabel: Y_LABEL,
      meta,
    };
  }
}
