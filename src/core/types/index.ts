/**
 * Scriptcut - Core Type Definitions
 * Re-exports all types from domain-specific modules.
 */

// Base types
export type { SegmentState, CommandType, RangeCommandType, TimeRange } from './base';

// Configuration types
export type { ProjectConfig } from './config';

// Command types
export type {
  LoadCommand,
  CutCommand,
  RangeCommand,
  HideCommand,
  ShowCommand,
  DeleteCommand,
  EditCommand,
  CommandOf,
} from './commands';

// Scene types
export type { FreeTextItem, SceneBlock } from './scene';

// Segment types
export type { VideoSegment, SegmentInit } from './segment';

// Event types
export type { SegmentEvent, SegmentEventCallback } from './events';
