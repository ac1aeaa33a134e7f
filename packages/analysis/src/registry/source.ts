// ---------------------------------------------------------------------------
// Plugin Sources
// ---------------------------------------------------------------------------
// A source enumerates candidate plugin units and loads one into a module
// namespace. The registry validates whatever comes back; sources never
// interpret the module.

import { readdir, stat } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

export interface PluginCandidate {
  /** Where the unit lives (file path, key). Used in logs and failures. */
  ref: string;
  /** Id the plugin is registered under in addition to its declared one. */
  fallbackId: string;
}

export interface PluginSource {
  readonly name: string;
  list(): Promise<PluginCandidate[]>;
  /** Load one unit. `generation` increases on every registry reload. */
  load(candidate: PluginCandidate, generation: number): Promise<unknown>;
}

const MODULE_EXTENSIONS = new Set(['.js', '.mjs']);

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * One ES module per plugin in a flat directory. Files starting with `_` are
 * ignored; a missing directory has no candidates.
 */
export class DirectoryPluginSource implements PluginSource {
  readonly name = 'directory';
  private readonly dir: string;
  private readonly loaded = new Map<string, { mtimeMs: number; url: string }>();

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  async list(): Promise<PluginCandidate[]> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    return files
      .filter((file) => MODULE_EXTENSIONS.has(extname(file)) && !file.startsWith('_'))
      .sort()
      .map((file) => ({
        ref: join(this.dir, file),
        fallbackId: `plugin:${file.slice(0, -extname(file).length)}`,
      }));
  }

  /**
   * Import the file, re-evaluating it only when its mtime changed since the
   * last load. Node's ESM cache never evicts: every distinct `?v=` URL keeps
   * one module record for the life of the process, so memory grows with each
   * reload that sees an edited file.
   */
  async load(candidate: PluginCandidate, generation: number): Promise<unknown> {
    const { mtimeMs } = await stat(candidate.ref);
    const previous = this.loaded.get(candidate.ref);
    let url = pathToFileURL(candidate.ref).href;
    if (previous !== undefined) {
      url = previous.mtimeMs === mtimeMs ? previous.url : `${url}?v=${generation}`;
    }
    this.loaded.set(candidate.ref, { mtimeMs, url });
    const namespace: unknown = await import(url);
    return namespace;
  }
}

/** Fixed set of in-memory modules, keyed by name. */
export class StaticPluginSource implements PluginSource {
  readonly name = 'static';
  private readonly modules: ReadonlyMap<string, unknown>;

  constructor(modules: Readonly<Record<string, unknown>>) {
    this.modules = new Map(Object.entries(modules));
  }

  async list(): Promise<PluginCandidate[]> {
    return [...this.modules.keys()].map((key) => ({ ref: key, fallbackId: `plugin:${key}` }));
  }

  async load(candidate: PluginCandidate): Promise<unknown> {
    if (!this.modules.has(candidate.ref)) {
      throw new Error(`No module registered as ${candidate.ref}`);
    }
    return this.modules.get(candidate.ref);
  }
}
