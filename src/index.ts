/**
 * Scriptcut - Public API
 */

// Core models
export { SegmentStore } from './core/SegmentStore';
export { EventEmitter } from './core/EventEmitter';
export {
  segmentDuration,
  containsTime,
  segmentsOverlap,
  isAdjacent,
} from './core/segments';

// Parsers
export {
  parseHeader,
  splitDocument,
  formatHeader,
  defaultProjectConfig,
  parseCommands,
  parseCommandLine,
  formatCommand,
  parseScenes,
  formatSceneSeparator,
  sceneDuration,
  sceneAt,
} from './parser';
export type { HeaderParseResult, SplitDocument, ParseOptions } from './parser';

// Engine
export {
  ScriptPipeline,
  CommandInterpreter,
  reportErrorMessages,
  fingerprintCommands,
  RangeAnchor,
  formatRangeCommand,
} from './engine';
export type {
  CommandErrorCode,
  CommandError,
  CommandResult,
  ExecutionReport,
  ExecuteOptions,
  PipelineState,
  PassResult,
  DirectCommandResult,
  PipelineEvent,
  PipelineEventCallback,
  PipelineOptions,
} from './engine';

// Media
export { Mp4MediaEngine, durationFromInfo, probeDuration } from './media/Mp4MediaEngine';
export type { Mp4MediaEngineOptions } from './media/Mp4MediaEngine';
export type { MediaEngine } from './media/types';

// Types
export type {
  SegmentState,
  CommandType,
  RangeCommandType,
  TimeRange,
  ProjectConfig,
  LoadCommand,
  CutCommand,
  RangeCommand,
  HideCommand,
  ShowCommand,
  DeleteCommand,
  EditCommand,
  CommandOf,
  FreeTextItem,
  SceneBlock,
  VideoSegment,
  SegmentInit,
  SegmentEvent,
  SegmentEventCallback,
} from './core/types';

// Utilities
export {
  formatTimecode,
  parseTimecode,
  timecodeToSeconds,
  orderRange,
} from './utils/time';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger';
export type { LogLevel, LogContext, Logger } from './utils/logger';

// Constants
export { PROJECT_DEFAULTS, PIPELINE, MEDIA } from './constants';
