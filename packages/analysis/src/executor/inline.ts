import type { PluginInfo, TransformResult } from '@wavescope/types';
import type { TransformExecutor, TransformJob } from './types.js';

/**
 * Runs the transform synchronously on the calling thread, against the host's
 * registry. Nothing to reload or release.
 */
export class InlineExecutor implements TransformExecutor {
  private readonly registry: { get(id: string): PluginInfo | undefined };

  constructor(registry: { get(id: string): PluginInfo | undefined }) {
    this.registry = registry;
  }

  async run({ pluginId, samples, sampleRate, params }: TransformJob): Promise<TransformResult> {
    const plugin = this.registry.get(pluginId);
    if (!plugin) throw new Error(`Transform plugin not found: ${pluginId}`);
    return plugin.capability.transform(samples, sampleRate, params);
  }

  reload(): Promise<void> {
    return Promise.resolve();
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}
