// ---------------------------------------------------------------------------
// Transform Thread
// ---------------------------------------------------------------------------
// Worker-thread entry behind ThreadedExecutor. Owns a registry of its own
// (built-ins plus the plugin directory) and answers requests in arrival
// order. Transforms wait for the most recent reload to finish.

import { parentPort, workerData, type MessagePort } from 'node:worker_threads';
import {
  createLogger,
  errorFields,
  transformThreadAddressSchema,
  transformThreadOptionsSchema,
  transformThreadRequestSchema,
  type TransformThreadReply,
  type TransformThreadRequest,
} from '@wavescope/shared';
import { PluginRegistry, type ReloadSummary } from '../registry/registry.js';
import { DirectoryPluginSource } from '../registry/source.js';
import { transferList } from './transfer.js';

if (parentPort === null) throw new Error('transform-thread must run inside a worker thread');
const port: MessagePort = parentPort;

const options = transformThreadOptionsSchema.parse(workerData);
const logger = createLogger('transform-thread', { level: options.logLevel });
const registry = new PluginRegistry({
  sources: options.pluginDir === null ? [] : [new DirectoryPluginSource(options.pluginDir)],
  logger: logger.child('plugins'),
});
let ready: Promise<ReloadSummary> = registry.reloadAll();

function reply(message: TransformThreadReply, transfer: ArrayBuffer[] = []): void {
  port.postMessage(message, transfer);
}

async function handle(request: TransformThreadRequest): Promise<void> {
  if (request.type === 'reload') {
    ready = registry.reloadAll();
    const { loaded, failed } = await ready;
    reply({ type: 'reloaded', id: request.id, loaded, failed });
    return;
  }

  await ready;
  const plugin = registry.get(request.pluginId);
  if (!plugin) {
    reply({ type: 'error', id: request.id, message: `Transform plugin not found: ${request.pluginId}` });
    return;
  }
  const result = plugin.capability.transform(request.samples, request.sampleRate, request.params);
  reply({ type: 'result', id: request.id, result }, transferList(result));
}

port.on('message', (message: unknown) => {
  const parsed = transformThreadRequestSchema.safeParse(message);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
    logger.error('malformed request', { detail });
    const addressed = transformThreadAddressSchema.safeParse(message);
    if (addressed.success) reply({ type: 'error', id: addressed.data.id, message: `Malformed transform request (${detail})` });
    return;
  }
  const request = parsed.data;
  handle(request).catch((err: unknown) => {
    logger.debug('request failed', { id: request.id, ...errorFields(err) });
    reply({ type: 'error', id: request.id, message: err instanceof Error ? err.message : String(err) });
  });
});
