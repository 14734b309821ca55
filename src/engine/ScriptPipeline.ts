/**
 * Script Pipeline
 * Re-evaluates the script on every text change and keeps the segment store in sync.
 */

import type { CutCommand, EditCommand, ProjectConfig, SceneBlock } from '../core/types';
import { SegmentStore } from '../core/SegmentStore';
import { EventEmitter } from '../core/EventEmitter';
import { splitDocument, defaultProjectConfig } from '../parser/HeaderParser';
import { parseCommands, formatCommand } from '../parser/CommandParser';
import { parseScenes } from '../parser/SceneParser';
import { PIPELINE, TIME } from '../constants';
import { createLogger, errorMessage } from '../utils/logger';
import { CommandInterpreter } from './CommandInterpreter';
import { fingerprintCommands } from './fingerprint';
import type {
  DirectCommandResult,
  ExecutionReport,
  PassResult,
  PipelineEvent,
  PipelineEventCallback,
  PipelineOptions,
  PipelineState,
} from './types';

const logger = createLogger('ScriptPipeline');

export class ScriptPipeline {
  readonly store: SegmentStore;

  private interpreter: CommandInterpreter;
  private events = new EventEmitter<PipelineEvent>();
  private debounceMs: number;

  private _state: PipelineState = 'idle';
  private _config: ProjectConfig = defaultProjectConfig();
  private _scenes: readonly SceneBlock[] = [];
  private _lastReport: ExecutionReport | null = null;
  private lastFingerprint: string | null = null;

  // Debounce state
  private pendingText: string | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;

  // Text of the running (or most recent) pass and its LOAD cancellation handle
  private currentText: string | null = null;
  private inFlight: AbortController | null = null;
  private disposed = false;

  constructor(options: PipelineOptions) {
    this.store = options.store ?? new SegmentStore();
    this.interpreter = new CommandInterpreter(this.store, options.mediaEngine);
    this.debounceMs = options.debounceMs ?? PIPELINE.DEBOUNCE_MS;
  }

  // ============================================================================
  // SNAPSHOTS
  // ============================================================================

  get state(): PipelineState {
    return this._state;
  }

  get config(): ProjectConfig {
    return this._config;
  }

  get scenes(): readonly SceneBlock[] {
    return this._scenes;
  }

  get lastReport(): ExecutionReport | null {
    return this._lastReport;
  }

  get fingerprint(): string | null {
    return this.lastFingerprint;
  }

  get hasPendingText(): boolean {
    return this.pendingText !== null;
  }

  // ============================================================================
  // INPUT
  // ============================================================================

  /**
   * Queue a text snapshot. Bursts are coalesced: only the last snapshot of a
   * burst is evaluated, once the quiet window has passed.
   */
  submit(text: string): void {
    if (this.disposed) return;
    if (this.pendingText === null && text === this.currentText) return;

    this.pendingText = text;

    // The document moved on, so a LOAD still resolving for the old text is stale
    if (this.inFlight && text !== this.currentText) {
      this.inFlight.abort();
    }

    this.scheduleFlush();
  }

  /**
   * Evaluate the pending snapshot now instead of waiting for the quiet window.
   * A snapshot that arrives while a pass is running is kept for the next window.
   */
  async flush(): Promise<PassResult | null> {
    this.cancelTimer();
    if (this.pendingText === null) return null;

    if (this._state === 'parsing') {
      this.scheduleFlush();
      return null;
    }

    const text = this.pendingText;
    this.pendingText = null;
    return this.evaluate(text);
  }

  /**
   * Run one full pass over the text. Ignored while another pass is running.
   */
  async evaluate(text: string): Promise<PassResult> {
    if (this._state === 'parsing') {
      logger.debug('Ignoring snapshot while a pass is running');
      return { status: 'ignored' };
    }

    this.setState('parsing');
    this.currentText = text;
    const controller = new AbortController();
    this.inFlight = controller;

    let result: PassResult;
    try {
      const { config, bodyStartLine, body } = splitDocument(text);
      const commands = parseCommands(body, { lineOffset: bodyStartLine });
      const scenes = parseScenes(body, { lineOffset: bodyStartLine });

      result = await this.apply(commands, controller.signal);

      this._config = config;
      this._scenes = scenes;
      this.events.emit({ type: 'configChange', config });
      this.events.emit({ type: 'scenesChange', scenes });
    } catch (err) {
      const message = `parse failed: ${errorMessage(err)}`;
      logger.error('Pass failed', { error: errorMessage(err) });
      this.events.emit({ type: 'error', message });
      result = { status: 'failed', message };
    } finally {
      this.inFlight = null;
      this.setState('idle');
    }

    this.events.emit({ type: 'passComplete', result });
    return result;
  }

  /**
   * Cut the timeline at a time (e.g. the playback position) without a text pass.
   * Returns the command line for the text surface to insert; the next text
   * pass rebuilds the store from the text.
   */
  async insertCutAt(time: number): Promise<DirectCommandResult> {
    if (this._state === 'parsing' || this.disposed) {
      return { status: 'ignored' };
    }

    this.setState('parsing');
    try {
      // The store must split where the inserted line says, at millisecond precision
      const atMs = Math.round(time * TIME.MS_PER_SECOND) / TIME.MS_PER_SECOND;
      const command: CutCommand = { type: 'cut', time: atMs, line: 0 };
      const result = await this.interpreter.execute(command);
      if (result.ok) {
        this.lastFingerprint = null;
      }
      return { status: 'completed', result, line: formatCommand(command) };
    } finally {
      this.setState('idle');
    }
  }

  // ============================================================================
  // OBSERVATION
  // ============================================================================

  /**
   * Subscribe to pipeline events.
   * @returns Unsubscribe function
   */
  on(callback: PipelineEventCallback): () => void {
    return this.events.on(callback);
  }

  /**
   * Stop timers, abort pending lookups and drop listeners
   */
  dispose(): void {
    this.disposed = true;
    this.cancelTimer();
    this.pendingText = null;
    this.inFlight?.abort();
    this.events.clear();
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  private async apply(commands: EditCommand[], signal: AbortSignal): Promise<PassResult> {
    const fingerprint = fingerprintCommands(commands);

    if (fingerprint === this.lastFingerprint) {
      logger.debug('Commands unchanged, skipping execution', { fingerprint });
      return { status: 'skipped', fingerprint };
    }

    // Forget the old fingerprint first so a pass that dies half-way is re-run
    this.lastFingerprint = null;
    this.store.clear();

    const report = await this.interpreter.executeAll(commands, { signal });
    const cancelled = signal.aborted;
    if (!cancelled) {
      this.lastFingerprint = fingerprint;
    }
    this._lastReport = report;

    logger.info('Commands executed', {
      total: report.total,
      failed: report.failed,
      segments: this.store.size,
      cancelled,
    });

    return { status: 'executed', fingerprint, report, cancelled };
  }

  private scheduleFlush(): void {
    this.cancelTimer();
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.flush().catch((err) => {
        logger.error('Debounced pass failed', { error: errorMessage(err) });
      });
    }, this.debounceMs);
  }

  private cancelTimer(): void {
    if (this.debounceTimer !== null) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }

  private setState(state: PipelineState): void {
    if (this._state === state) return;
    this._state = state;
    this.events.emit({ type: 'stateChange', state });
  }
}
