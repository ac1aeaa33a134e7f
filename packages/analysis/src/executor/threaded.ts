// ---------------------------------------------------------------------------
// Threaded Executor
// ---------------------------------------------------------------------------
// Posts each frame to a dedicated worker thread and awaits the reply, so a
// slow transform never holds up chunk generation or HTTP on the main thread.
// The thread builds its own registry from the built-ins and the plugin
// directory; reload() rescans it alongside the host registry.
//
// Requests are matched to replies by id. If the thread dies, every pending
// and later request rejects with the reason.

import { Worker } from 'node:worker_threads';
import type { TransformResult } from '@wavescope/types';
import {
  errorFields,
  silentLogger,
  transformThreadReplySchema,
  type LogLevel,
  type Logger,
  type TransformThreadOptions,
  type TransformThreadReply,
  type TransformThreadRequest,
} from '@wavescope/shared';
import type { TransformExecutor, TransformJob } from './types.js';

const SOURCE_ENTRY = import.meta.url.endsWith('.ts');
const THREAD_ENTRY = new URL(SOURCE_ENTRY ? './transform-thread.ts' : './transform-thread.js', import.meta.url);
// Run from sources, the thread needs the same TypeScript loader as its host.
const THREAD_EXEC_ARGV = SOURCE_ENTRY ? ['--import', 'tsx'] : [];

export interface ThreadedExecutorOptions {
  /** External plugin directory; built-ins only when omitted. */
  pluginDir?: string;
  /** Level of the thread's own log lines. */
  logLevel?: LogLevel;
  logger?: Logger;
}

interface PendingRequest {
  resolve: (reply: TransformThreadReply) => void;
  reject: (err: Error) => void;
}

export class ThreadedExecutor implements TransformExecutor {
  private readonly worker: Worker;
  private readonly logger: Logger;
  private readonly pending = new Map<number, PendingRequest>();
  private nextId = 0;
  private failure: Error | null = null;

  constructor(options: ThreadedExecutorOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    const workerData: TransformThreadOptions = {
      pluginDir: options.pluginDir ?? null,
      logLevel: options.logLevel ?? 'info',
    };
    this.worker = new Worker(THREAD_ENTRY, { workerData, execArgv: THREAD_EXEC_ARGV });
    this.worker.on('message', (message: unknown) => this.onMessage(message));
    this.worker.on('error', (err: Error) => this.fail(err));
    this.worker.on('exit', (code: number) => this.fail(new Error(`Transform thread exited with code ${code}`)));
  }

  async run({ pluginId, samples, sampleRate, params }: TransformJob): Promise<TransformResult> {
    const reply = await this.request({ type: 'transform', id: this.nextId++, pluginId, samples, sampleRate, params });
    if (reply.type === 'result') return reply.result;
    throw new Error(reply.type === 'error' ? reply.message : `Unexpected ${reply.type} reply from transform thread`);
  }

  async reload(): Promise<void> {
    const reply = await this.request({ type: 'reload', id: this.nextId++ });
    if (reply.type === 'error') throw new Error(reply.message);
    if (reply.type === 'reloaded') {
      this.logger.info('transform thread reloaded', { loaded: reply.loaded, failed: reply.failed });
    }
  }

  /** Terminate the thread. Pending and later requests reject. */
  async close(): Promise<void> {
    if (this.failure === null) this.failure = new Error('Transform thread closed');
    this.rejectAll(this.failure);
    await this.worker.terminate();
  }

  private request(message: TransformThreadRequest): Promise<TransformThreadReply> {
    if (this.failure !== null) return Promise.reject(this.failure);
    return new Promise((resolve, reject) => {
      this.pending.set(message.id, { resolve, reject });
      this.worker.postMessage(message);
    });
  }

  private onMessage(message: unknown): void {
    const parsed = transformThreadReplySchema.safeParse(message);
    if (!parsed.success) {
      this.logger.error('malformed reply from transform thread', { issues: parsed.error.issues.length });
      this.rejectAll(new Error('Malformed reply from transform thread'));
      return;
    }
    const entry = this.pending.get(parsed.data.id);
    if (!entry) return;
    this.pending.delete(parsed.data.id);
    entry.resolve(parsed.data);
  }

  private fail(err: Error): void {
    if (this.failure === null) {
      this.failure = err;
      this.logger.error('transform thread failed', errorFields(err, true));
    }
    this.rejectAll(this.failure);
  }

  private rejectAll(err: Error): void {
    const entries = [...this.pending.values()];
    this.pending.clear();
    for (const entry of entries) entry.reject(err);
  }
}
