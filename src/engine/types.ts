/**
 * Engine Types
 * Type definitions for the command interpreter and the re-evaluation pipeline.
 */

import type { EditCommand, ProjectConfig, SceneBlock } from '../core/types';
import type { SegmentStore } from '../core/SegmentStore';
import type { MediaEngine } from '../media/types';

// ============================================================================
// INTERPRETER
// ============================================================================

/**
 * Why a command could not be applied
 */
export type CommandErrorCode =
  | 'MEDIA_UNAVAILABLE'
  | 'NO_SEGMENT_AT_TIME'
  | 'CUT_AT_BOUNDARY'
  | 'INVALID_RANGE'
  | 'INVALID_COMMAND'
  | 'LOAD_CANCELLED';

export interface CommandError {
  code: CommandErrorCode;
  message: string;
}

/**
 * Outcome of a single command
 */
export type CommandResult =
  | { ok: true; command: EditCommand; affectedIds: number[] }
  | { ok: false; command: EditCommand; error: CommandError };

/**
 * Outcome of a command batch
 */
export interface ExecutionReport {
  total: number;
  succeeded: number;
  failed: number;
  results: CommandResult[];
}

export interface ExecuteOptions {
  /** Aborting discards pending LOAD lookups instead of applying them */
  signal?: AbortSignal;
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Pipeline state
 */
export type PipelineState = 'idle' | 'parsing';

/**
 * Outcome of one evaluation pass
 */
export type PassResult =
  | { status: 'ignored' }
  | { status: 'skipped'; fingerprint: string }
  | { status: 'executed'; fingerprint: string; report: ExecutionReport; cancelled: boolean }
  | { status: 'failed'; message: string };

/**
 * Outcome of a command applied directly, outside a text pass
 */
export type DirectCommandResult =
  | { status: 'ignored' }
  | { status: 'completed'; result: CommandResult; line: string };

/**
 * Pipeline events
 */
export type PipelineEvent =
  | { type: 'stateChange'; state: PipelineState }
  | { type: 'configChange'; config: ProjectConfig }
  | { type: 'scenesChange'; scenes: readonly SceneBlock[] }
  | { type: 'passComplete'; result: PassResult }
  | { type: 'error'; message: string };

/**
 * Callback type for pipeline events
 */
export type PipelineEventCallback = (event: PipelineEvent) => void;

/**
 * Pipeline construction options
 */
export interface PipelineOptions {
  /** Duration lookup used by LOAD */
  mediaEngine: MediaEngine;
  /** Store to drive; a fresh one is created when omitted */
  store?: SegmentStore;
  /** Quiet window before submitted text is evaluated (ms) */
  debounceMs?: number;
}
