// ---------------------------------------------------------------------------
// Plugin Registry
// ---------------------------------------------------------------------------
// Built-ins are registered first, then every candidate of every source.
// A unit that fails to load is logged, recorded in failures() and skipped;
// it never stops the remaining candidates.
//
// A reload builds a new table and swaps it in when done, so lookups made
// while a reload is in flight still see the previous table.
//
// External units are registered under their declared id AND under the id
// they were located by (`plugin:<file stem>`), so callers may use either.

import type { PluginInfo, PluginMetadata, Schema, TransformPlugin } from '@wavescope/types';
import {
  errorFields,
  parameterSchemaListSchema,
  pluginMetadataSchema,
  silentLogger,
  transformResultSchema,
  type Logger,
} from '@wavescope/shared';
import { BUILTIN_PLUGINS, type BuiltinPlugin } from '../plugins/index.js';
import type { PluginCandidate, PluginSource } from './source.js';

export interface PluginFailure {
  ref: string;
  source: string;
  error: string;
}

export interface ReloadSummary {
  /** Distinct plugins now registered, built-ins included. */
  loaded: number;
  failed: number;
}

export interface PluginRegistryOptions {
  sources?: readonly PluginSource[];
  builtins?: readonly BuiltinPlugin[];
  logger?: Logger;
}

interface Issue {
  path: ReadonlyArray<string | number>;
  message: string;
}

function formatIssues(issues: readonly Issue[]): string {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function parseMetadata(raw: unknown): PluginMetadata {
  const parsed = pluginMetadataSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`Invalid plugin metadata: ${formatIssues(parsed.error.issues)}`);
  return parsed.data;
}

/**
 * Wrap an untrusted plugin object. The parameter schema is validated once
 * here; every transform result is validated (and normalized to typed
 * arrays) on the way out.
 */
function adoptCapability(instance: Record<string, unknown>): TransformPlugin {
  const describe = instance['describeParameters'];
  const transform = instance['transform'];
  if (typeof describe !== 'function' || typeof transform !== 'function') {
    throw new Error('Plugin must implement describeParameters() and transform()');
  }

  const described = parameterSchemaListSchema.safeParse(Reflect.apply(describe, instance, []));
  if (!described.success) {
    throw new Error(`Invalid parameter schema: ${formatIssues(described.error.issues)}`);
  }
  const schema: Schema = described.data;

  return {
    describeParameters: () => schema,
    transform: (samples, sampleRate, params) => {
      const result = transformResultSchema.safeParse(Reflect.apply(transform, instance, [samples, sampleRate, params]));
      if (!result.success) throw new Error(`Invalid transform result: ${formatIssues(result.error.issues)}`);
      return result.data;
    },
  };
}

/**
 * Turn a loaded module namespace into a plugin. The module must export
 * `meta` and either `plugin` or a default export; a function export is
 * treated as a class and constructed without arguments.
 */
export function pluginFromModule(namespace: unknown): { metadata: PluginMetadata; capability: TransformPlugin } {
  if (!isRecord(namespace)) throw new Error('Plugin module did not evaluate to an object');
  const metadata = parseMetadata(namespace['meta']);

  const exported = namespace['plugin'] ?? namespace['default'];
  if (exported === undefined) throw new Error('Plugin module must export `plugin` or a default export');
  const instance: unknown = typeof exported === 'function' ? Reflect.construct(exported, []) : exported;
  if (!isRecord(instance)) throw new Error('Plugin export is not an object');

  return { metadata, capability: adoptCapability(instance) };
}

export class PluginRegistry {
  private readonly sources: readonly PluginSource[];
  private readonly builtins: readonly BuiltinPlugin[];
  private readonly logger: Logger;
  private table = new Map<string, PluginInfo>();
  private lastFailures: PluginFailure[] = [];
  private generation = 0;
  private pending: Promise<ReloadSummary> | null = null;

  constructor(options: PluginRegistryOptions = {}) {
    this.sources = options.sources ?? [];
    this.builtins = options.builtins ?? BUILTIN_PLUGINS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Rebuild the table from scratch. Concurrent calls are queued: each one
   * starts after the previous reload finished.
   */
  reloadAll(): Promise<ReloadSummary> {
    const previous: Promise<unknown> = this.pending ?? Promise.resolve();
    // The previous caller already sees its own rejection.
    const next = previous.then(() => this.rebuild(), () => this.rebuild());
    this.pending = next;
    return next.finally(() => {
      if (this.pending === next) this.pending = null;
    });
  }

  get(id: string): PluginInfo | undefined {
    return this.table.get(id);
  }

  has(id: string): boolean {
    return this.table.has(id);
  }

  /** Each plugin once, in registration order. */
  list(): PluginInfo[] {
    return [...new Set(this.table.values())];
  }

  /** Every key a plugin can be looked up by, aliases included. */
  ids(): string[] {
    return [...this.table.keys()];
  }

  /** Candidates that failed during the most recent reload. */
  failures(): PluginFailure[] {
    return this.lastFailures.map((failure) => ({ ...failure }));
  }

  private async rebuild(): Promise<ReloadSummary> {
    const generation = this.generation++;
    const table = new Map<string, PluginInfo>();
    const failures: PluginFailure[] = [];

    for (const builtin of this.builtins) {
      try {
        const info: PluginInfo = { id: builtin.metadata.id, metadata: { ...builtin.metadata }, capability: builtin.create() };
        this.register(table, info, [builtin.metadata.id], 'builtin');
      } catch (err) {
        failures.push(this.recordFailure(builtin.metadata.id, 'builtin', err));
      }
    }

    for (const source of this.sources) {
      let candidates: PluginCandidate[];
      try {
        candidates = await source.list();
      } catch (err) {
        failures.push(this.recordFailure(source.name, source.name, err));
        continue;
      }

      for (const candidate of candidates) {
        try {
          const { metadata, capability } = pluginFromModule(await source.load(candidate, generation));
          this.register(table, { id: metadata.id, metadata, capability }, [metadata.id, candidate.fallbackId], candidate.ref);
        } catch (err) {
          failures.push(this.recordFailure(candidate.ref, source.name, err));
        }
      }
    }

    this.table = table;
    this.lastFailures = failures;
    const summary = { loaded: new Set(table.values()).size, failed: failures.length };
    this.logger.info('plugins reloaded', { ...summary });
    return summary;
  }

  private register(table: Map<string, PluginInfo>, info: PluginInfo, keys: readonly string[], ref: string): void {
    for (const key of new Set(keys)) {
      const existing = table.get(key);
      if (existing) {
        this.logger.warn('plugin id already registered; keeping the first', { id: key, ref, kept: existing.id });
        continue;
      }
      table.set(key, info);
    }
    this.logger.debug('plugin registered', { id: info.id, ref });
  }

  private recordFailure(ref: string, source: string, err: unknown): PluginFailure {
    this.logger.error('plugin load failed', { ref, source, ...errorFields(err, true) });
    return { ref, source, error: errorMessage(err) };
  }
}
