/**
 * Command Interpreter
 * Applies edit commands to the segment store.
 */

import type {
  EditCommand,
  LoadCommand,
  CutCommand,
  HideCommand,
  ShowCommand,
  DeleteCommand,
} from '../core/types';
import type { SegmentStore } from '../core/SegmentStore';
import type { MediaEngine } from '../media/types';
import type {
  CommandErrorCode,
  CommandResult,
  ExecuteOptions,
  ExecutionReport,
} from './types';
import { formatTimecode } from '../utils/time';
import { createLogger, errorMessage } from '../utils/logger';

const logger = createLogger('CommandInterpreter');

function ok(command: EditCommand, affectedIds: number[]): CommandResult {
  return { ok: true, command, affectedIds };
}

function fail(command: EditCommand, code: CommandErrorCode, message: string): CommandResult {
  return { ok: false, command, error: { code, message } };
}

/**
 * Error lines of a report, prefixed with the source line
 */
export function reportErrorMessages(report: ExecutionReport): string[] {
  const messages: string[] = [];
  for (const result of report.results) {
    if (!result.ok) {
      messages.push(`line ${result.command.line}: ${result.error.message}`);
    }
  }
  return messages;
}

export class CommandInterpreter {
  constructor(
    private readonly store: SegmentStore,
    private readonly mediaEngine: MediaEngine
  ) {}

  /**
   * Apply commands in order. A failing command is reported and skipped;
   * the rest of the batch still runs.
   */
  async executeAll(
    commands: readonly EditCommand[],
    options: ExecuteOptions = {}
  ): Promise<ExecutionReport> {
    const results: CommandResult[] = [];
    for (const command of commands) {
      results.push(await this.execute(command, options));
    }

    const succeeded = results.filter((r) => r.ok).length;
    return {
      total: results.length,
      succeeded,
      failed: results.length - succeeded,
      results,
    };
  }

  /**
   * Apply a single command. Never rejects.
   */
  async execute(command: EditCommand, options: ExecuteOptions = {}): Promise<CommandResult> {
    let result: CommandResult;
    try {
      result = await this.dispatch(command, options);
    } catch (err) {
      result = fail(command, 'INVALID_COMMAND', errorMessage(err));
    }

    if (!result.ok) {
      logger.warn('Command failed', {
        line: command.line,
        command: command.type,
        code: result.error.code,
        error: result.error.message,
      });
    }
    return result;
  }

  private dispatch(command: EditCommand, options: ExecuteOptions): Promise<CommandResult> | CommandResult {
    switch (command.type) {
      case 'load':
        return this.load(command, options.signal);
      case 'cut':
        return this.cut(command);
      case 'hide':
      case 'show':
        return this.setVisibility(command);
      case 'delete':
        return this.delete(command);
    }
  }

  // ============================================================================
  // COMMANDS
  // ============================================================================

  private async load(command: LoadCommand, signal?: AbortSignal): Promise<CommandResult> {
    if (command.path.length === 0) {
      return fail(command, 'INVALID_COMMAND', 'LOAD requires a file path');
    }

    let duration: number;
    try {
      duration = await this.lookupDuration(command.path, signal);
    } catch (err) {
      if (signal?.aborted) {
        return fail(command, 'LOAD_CANCELLED', `Load of ${command.path} was superseded`);
      }
      return fail(command, 'MEDIA_UNAVAILABLE', `Media unavailable: ${command.path} (${errorMessage(err)})`);
    }

    // The document changed while the lookup was in flight
    if (signal?.aborted) {
      return fail(command, 'LOAD_CANCELLED', `Load of ${command.path} was superseded`);
    }

    if (!Number.isFinite(duration) || duration <= 0) {
      return fail(command, 'MEDIA_UNAVAILABLE', `Media has no usable duration: ${command.path}`);
    }

    this.store.clear();
    const segment = this.store.add({
      startTime: 0,
      endTime: duration,
      visible: true,
      state: 'stopped',
      sourcePath: command.path,
    });

    logger.info('Media loaded', { path: command.path, duration, segmentId: segment.id });
    return ok(command, [segment.id]);
  }

  /**
   * Duration lookup that settles as soon as the signal aborts, even when the
   * media engine keeps running.
   */
  private lookupDuration(path: string, signal?: AbortSignal): Promise<number> {
    if (!signal) return this.mediaEngine.getDuration(path);

    return new Promise<number>((resolve, reject) => {
      if (signal.aborted) {
        reject(new Error(`Duration lookup aborted: ${path}`));
        return;
      }

      const onAbort = () => reject(new Error(`Duration lookup aborted: ${path}`));
      signal.addEventListener('abort', onAbort, { once: true });

      this.mediaEngine
        .getDuration(path, signal)
        .then(resolve, reject)
        .finally(() => signal.removeEventListener('abort', onAbort));
    });
  }

  private cut(command: CutCommand): CommandResult {
    const { time } = command;
    const target = this.store.segmentAt(time);
    if (!target) {
      return fail(command, 'NO_SEGMENT_AT_TIME', `No segment at ${formatTimecode(time)}`);
    }

    // A cut on an edge would leave a zero-length segment
    if (time <= target.startTime || time >= target.endTime) {
      return fail(
        command,
        'CUT_AT_BOUNDARY',
        `${formatTimecode(time)} is already a segment boundary`
      );
    }

    this.store.remove(target.id);
    const head = this.store.add({
      startTime: target.startTime,
      endTime: time,
      visible: target.visible,
      state: 'stopped',
      sourcePath: target.sourcePath,
    });
    const tail = this.store.add({
      startTime: time,
      endTime: target.endTime,
      visible: target.visible,
      state: 'stopped',
      sourcePath: target.sourcePath,
    });

    return ok(command, [head.id, tail.id]);
  }

  /**
   * HIDE and SHOW act on whole segments; partial overlaps are not trimmed.
   */
  private setVisibility(command: HideCommand | ShowCommand): CommandResult {
    const invalid = this.checkRange(command);
    if (invalid) return invalid;

    const visible = command.type === 'show';
    const affected: number[] = [];
    for (const segment of this.store.segmentsOverlapping(command.start, command.end)) {
      this.store.update({
        ...segment,
        visible,
        state: visible ? 'stopped' : 'hidden',
      });
      affected.push(segment.id);
    }
    return ok(command, affected);
  }

  private delete(command: DeleteCommand): CommandResult {
    const invalid = this.checkRange(command);
    if (invalid) return invalid;

    const affected: number[] = [];
    for (const segment of this.store.segmentsOverlapping(command.start, command.end)) {
      this.store.remove(segment.id);
      affected.push(segment.id);
    }
    return ok(command, affected);
  }

  private checkRange(command: HideCommand | ShowCommand | DeleteCommand): CommandResult | null {
    if (command.end <= command.start) {
      return fail(
        command,
        'INVALID_RANGE',
        `Range ${formatTimecode(command.start)} -> ${formatTimecode(command.end)} is empty`
      );
    }
    return null;
  }
}
