/**
 * Pipeline composition root.
 *
 * Owns every core piece and wires them together:
 *
 *   SignalEngine ─GeneratorLoop─▶ chunk ─▶ RingBuffer ◀─ AnalysisWorker ─▶ result
 *
 * SharedParams is the single place settings change. A subscription keeps the
 * engine's globals in step with it and swaps the ring buffer for a new one
 * when the sample rate changes (history at the old rate is discarded).
 *
 * Chunks, results and status messages are each published on their own
 * Channel; the latest chunk and result are also kept for polling clients.
 */

import { resolve } from 'node:path'
import type {
  Chunk,
  ComponentEntry,
  LoopState,
  ParamValues,
  PipelineSettings,
  PluginInfo,
  SavedConfiguration,
  TransformResult,
} from '@wavescope/types'
import {
  HISTORY_SECONDS,
  SharedParams,
  historyCapacity,
  windowLength,
} from '@wavescope/config'
import {
  coerceParams,
  errorFields,
  parseSavedConfiguration,
  pickParamValues,
  settingsPatchSchema,
  silentLogger,
  type Logger,
  type SettingsPatch,
} from '@wavescope/shared'
import { Channel, RingBuffer } from '@wavescope/signal-core'
import { GeneratorLoop, LogicalClock, SignalEngine } from '@wavescope/generator'
import {
  AnalysisWorker,
  DirectoryPluginSource,
  InlineExecutor,
  PluginRegistry,
  type PluginSource,
  type ReloadSummary,
  type TransformExecutor,
} from '@wavescope/analysis'

export type SleepFn = (ms: number) => Promise<void>

export interface PipelineOptions {
  settings?: Partial<PipelineSettings>
  /** External plugin directory. Ignored when `sources` is given. */
  pluginDir?: string
  sources?: PluginSource[]
  /**
   * Where transforms run. Defaults to the main thread; pass a ThreadedExecutor
   * loading the same plugin directory to keep generation on schedule.
   */
  executor?: TransformExecutor
  historySeconds?: number
  logger?: Logger
  /** Capacity of each publication channel. */
  channelCapacity?: number
  /** Loop timing, injectable for tests. */
  sleep?: SleepFn
  now?: () => number
}

export interface PipelineStatus {
  generator: LoopState
  analysis: LoopState
  paused: boolean
  uptime: number
  sampleIndex: number
  history: { size: number; capacity: number }
  chunksPublished: number
  framesPublished: number
  lastTransformMs: number
  lastStatus: string | null
  dropped: { chunks: number; results: number; statuses: number }
}

export interface ApplyReport {
  issues: string[]
}

/** Noise plus two tones, the scene a fresh pipeline starts with. */
export const DEFAULT_SCENE: readonly ComponentEntry[] = [
  { kind: 'noise', enabled: true, params: { sigma: 0.15 } },
  { kind: 'sine', enabled: true, params: { frequency: 6, amplitude: 1 } },
  { kind: 'sine', enabled: true, params: { frequency: 30, amplitude: 0.4 } },
]

const GLOBAL_KEYS = ['sampleRate', 'chunkLength', 'amplitudeClip', 'windowSeconds', 'frameRate'] as const

export class Pipeline {
  readonly clock: LogicalClock
  readonly engine: SignalEngine
  readonly params: SharedParams
  readonly registry: PluginRegistry
  readonly chunks: Channel<Chunk>
  readonly results: Channel<TransformResult>
  readonly statuses: Channel<string>

  private history: RingBuffer
  private readonly historySeconds: number
  private readonly logger: Logger
  private readonly generator: GeneratorLoop
  private readonly analysis: AnalysisWorker
  private readonly executor: TransformExecutor
  private latestChunk: Chunk | null = null
  private latestResult: TransformResult | null = null
  private lastStatus: string | null = null
  private loops: Promise<void> | null = null

  constructor(options: PipelineOptions = {}) {
    this.logger = options.logger ?? silentLogger
    this.historySeconds = options.historySeconds ?? HISTORY_SECONDS
    this.params = new SharedParams(options.settings)
    const settings = this.params.getSettings()

    this.clock = new LogicalClock(options.now)
    this.engine = new SignalEngine(this.clock, {
      sampleRate: settings.sampleRate,
      chunkLength: settings.chunkLength,
      amplitudeClip: settings.amplitudeClip,
    })
    this.engine.replaceComponents(DEFAULT_SCENE)
    this.history = new RingBuffer(historyCapacity(settings.sampleRate, this.historySeconds))

    const capacity = options.channelCapacity ?? 64
    this.chunks = new Channel(capacity)
    this.results = new Channel(capacity)
    this.statuses = new Channel(capacity)

    const sources = options.sources ?? [new DirectoryPluginSource(resolve(options.pluginDir ?? 'plugins/transforms'))]
    this.registry = new PluginRegistry({ sources, logger: this.logger.child('plugins') })
    this.executor = options.executor ?? new InlineExecutor(this.registry)

    this.generator = new GeneratorLoop({
      engine: this.engine,
      publish: (chunk) => this.onChunk(chunk),
      sleep: options.sleep,
      now: options.now,
      logger: this.logger.child('generator'),
    })
    this.analysis = new AnalysisWorker({
      params: this.params,
      registry: this.registry,
      history: () => this.history,
      publish: (result) => this.onResult(result),
      status: (message) => this.status(message),
      executor: this.executor,
      sleep: options.sleep,
      now: options.now,
      logger: this.logger.child('analysis'),
    })

    this.params.subscribe((changed) => this.onSettingsChanged(changed))
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────

  /**
   * Load plugins, then launch both loops. Resolves once they are running.
   * Channels closed by an earlier stop() are reopened.
   */
  async start(): Promise<ReloadSummary> {
    if (!this.loops) {
      this.chunks.reopen()
      this.results.reopen()
      this.statuses.reopen()
    }
    const summary = await this.reloadPlugins()
    if (!this.loops) {
      this.loops = Promise.all([this.generator.start(), this.analysis.start()]).then(
        () => undefined,
        (err: unknown) => this.logger.error('pipeline loop exited with an error', errorFields(err, true)),
      )
      this.logger.info('pipeline started', { sampleRate: this.params.getSettings().sampleRate })
    }
    return summary
  }

  /** Stop both loops, wait for them to exit and close the channels. */
  async stop(): Promise<void> {
    await Promise.all([this.generator.stop(), this.analysis.stop()])
    await this.loops
    this.loops = null
    this.chunks.close()
    this.results.close()
    this.statuses.close()
    this.logger.info('pipeline stopped')
  }

  /** Rewind time, clear history and play. */
  restart(): void {
    this.engine.reset()
    this.history.clear()
    this.engine.play()
    this.status('Started: clock reset and history cleared')
  }

  play(): void {
    this.engine.play()
    this.status('Playing')
  }

  pause(): void {
    this.engine.pause()
    this.status('Paused')
  }

  /** Rewind the clock only. */
  resetClock(): void {
    this.engine.reset()
  }

  // ─── Settings & transforms ──────────────────────────────────────────────

  /**
   * Apply a validated settings patch. A `pluginId` goes through
   * selectPlugin() so its parameters are re-defaulted.
   * Returns false when the patch names an unknown plugin (nothing applied).
   */
  updateSettings(patch: SettingsPatch): boolean {
    const { pluginId, ...rest } = settingsPatchSchema.parse(patch)
    if (pluginId !== undefined && !this.registry.has(pluginId)) {
      this.status(`Unknown transform plugin: ${pluginId}`)
      return false
    }
    this.params.update(rest)
    if (pluginId !== undefined && pluginId !== this.params.getSettings().pluginId) {
      this.selectPlugin(pluginId)
    }
    return true
  }

  /**
   * Switch the active transform. Its parameters start from schema defaults,
   * overlaid with `params`. Unknown ids leave the selection unchanged.
   */
  selectPlugin(id: string, params: Readonly<Record<string, unknown>> = {}): boolean {
    const info = this.registry.get(id)
    if (!info) {
      this.status(`Unknown transform plugin: ${id}`)
      return false
    }
    this.params.update({ pluginId: id })
    this.params.setTransformParams(coerceParams(info.capability.describeParameters(), params))
    this.status(`Selected analysis: ${info.metadata.name}`)
    return true
  }

  /** Merge parameter changes for the active transform. Returns the stored map. */
  updateTransformParams(raw: Readonly<Record<string, unknown>>): ParamValues {
    const info = this.currentPlugin()
    if (info) {
      const values = coerceParams(info.capability.describeParameters(), raw, this.params.getTransformParams())
      this.params.setTransformParams(values)
    } else {
      this.params.mergeTransformParams(pickParamValues(raw).values)
    }
    return this.params.getTransformParams()
  }

  currentPlugin(): PluginInfo | undefined {
    return this.registry.get(this.params.getSettings().pluginId)
  }

  /**
   * Rescan plugins. If the selected plugin is gone, fall back to the first
   * registered one with default parameters.
   */
  async reloadPlugins(): Promise<ReloadSummary> {
    const [summary] = await Promise.all([this.registry.reloadAll(), this.executor.reload()])
    const current = this.params.getSettings().pluginId
    if (!this.registry.has(current)) {
      const fallback = this.registry.list()[0]
      if (fallback) {
        this.status(`Transform plugin not found: ${current}; using ${fallback.id}`)
        this.selectPlugin(fallback.id)
      } else {
        this.status('No transform plugins available')
      }
    } else if (Object.keys(this.params.getTransformParams()).length === 0) {
      const info = this.currentPlugin()
      if (info) this.params.setTransformParams(coerceParams(info.capability.describeParameters(), {}))
    }
    this.status(`Plugins reloaded: ${summary.loaded} loaded, ${summary.failed} failed`)
    return summary
  }

  // ─── Saved configuration ────────────────────────────────────────────────

  captureConfiguration(): SavedConfiguration {
    const settings = this.params.getSettings()
    return {
      globals: {
        sample_rate: settings.sampleRate,
        chunk_length: settings.chunkLength,
        window_seconds: settings.windowSeconds,
        frame_rate: settings.frameRate,
        amplitude_clip: settings.amplitudeClip,
      },
      transform: {
        plugin_id: settings.pluginId,
        params: this.params.getTransformParams(),
      },
      components: this.engine.snapshotComponents().map(({ kind, enabled, params }) => ({ kind, enabled, params })),
    }
  }

  /**
   * Apply a saved configuration leniently. Anything skipped or defaulted is
   * listed in the report and on the status channel.
   */
  applyConfiguration(raw: unknown): ApplyReport {
    const { config, issues } = parseSavedConfiguration(raw, this.params.getSettings())

    const patch: SettingsPatch = {
      sampleRate: config.globals.sample_rate,
      chunkLength: config.globals.chunk_length,
      windowSeconds: config.globals.window_seconds,
      frameRate: config.globals.frame_rate,
    }
    if (config.globals.amplitude_clip !== undefined) patch.amplitudeClip = config.globals.amplitude_clip

    for (const key of GLOBAL_KEYS) {
      const value = patch[key]
      if (value === undefined) continue
      const parsed = settingsPatchSchema.safeParse({ [key]: value })
      if (parsed.success) this.params.update(parsed.data)
      else issues.push(`globals: ${key} = ${value} is out of range; kept ${this.params.getSettings()[key]}`)
    }

    const info = this.registry.get(config.transform.plugin_id)
    if (info) {
      this.params.update({ pluginId: config.transform.plugin_id })
      this.params.setTransformParams(coerceParams(info.capability.describeParameters(), config.transform.params))
    } else {
      issues.push(`Transform plugin not found: ${config.transform.plugin_id}; kept ${this.params.getSettings().pluginId}`)
    }

    const skipped = this.engine.replaceComponents(config.components)
    if (skipped > 0) issues.push(`${skipped} component(s) of unknown kind skipped`)

    for (const issue of issues) this.status(issue)
    this.status(issues.length === 0 ? 'Configuration loaded' : `Configuration loaded with ${issues.length} issue(s)`)
    return { issues }
  }

  // ─── Publication ────────────────────────────────────────────────────────

  getLatestChunk(): Chunk | null {
    return this.latestChunk
  }

  getLatestResult(): TransformResult | null {
    return this.latestResult
  }

  /** Current analysis window as `t_sec,x` CSV. */
  exportWindowCsv(): string {
    const settings = this.params.getSettings()
    const samples = this.history.getLast(windowLength(settings))
    const lines = ['t_sec,x']
    for (let i = 0; i < samples.length; i++) {
      lines.push(`${i / settings.sampleRate},${samples[i]}`)
    }
    return lines.join('\n') + '\n'
  }

  historySize(): number {
    return this.history.size()
  }

  getStatus(): PipelineStatus {
    return {
      generator: this.generator.state,
      analysis: this.analysis.state,
      paused: this.engine.isPaused(),
      uptime: this.clock.uptime(),
      sampleIndex: this.clock.sampleIndex(),
      history: { size: this.history.size(), capacity: this.history.getCapacity() },
      chunksPublished: this.generator.published,
      framesPublished: this.analysis.published,
      lastTransformMs: this.analysis.lastDurationMs,
      lastStatus: this.lastStatus,
      dropped: { chunks: this.chunks.dropped, results: this.results.dropped, statuses: this.statuses.dropped },
    }
  }

  /** Feed one chunk into history, as the generator loop does. */
  ingest(chunk: Chunk): void {
    this.onChunk(chunk)
  }

  /** Run one analysis frame immediately. */
  analyzeNow(): Promise<TransformResult | undefined> {
    return this.analysis.step()
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  private onChunk(chunk: Chunk): void {
    if (chunk.samples.length === 0) return
    this.history.append(chunk.samples)
    this.latestChunk = chunk
    this.chunks.send(chunk)
  }

  private onResult(result: TransformResult): void {
    this.latestResult = result
    this.results.send(result)
  }

  private status(message: string): void {
    this.lastStatus = message
    this.logger.info('status', { message })
    this.statuses.send(message)
  }

  private onSettingsChanged(changed: ReadonlyArray<keyof PipelineSettings | 'transformParams'>): void {
    const settings = this.params.getSettings()
    if (changed.includes('sampleRate') || changed.includes('chunkLength') || changed.includes('amplitudeClip')) {
      this.engine.setGlobalParams({
        sampleRate: settings.sampleRate,
        chunkLength: settings.chunkLength,
        amplitudeClip: settings.amplitudeClip,
      })
    }
    if (changed.includes('sampleRate')) {
      this.history = new RingBuffer(historyCapacity(settings.sampleRate, this.historySeconds))
      this.latestChunk = null
      this.logger.info('history replaced', { sampleRate: settings.sampleRate, capacity: this.history.getCapacity() })
    }
  }
}
