/**
 * Scriptcut - Base Type Definitions
 * Fundamental types used throughout the timeline model.
 */

/** Playback/visibility state of a segment */
export type SegmentState = 'stopped' | 'playing' | 'hidden';

/** Edit command identifier */
export type CommandType = 'load' | 'cut' | 'hide' | 'show' | 'delete';

/** Commands that act on a time range */
export type RangeCommandType = 'hide' | 'show' | 'delete';

/** A span of time in seconds */
export interface TimeRange {
  start: number;
  end: number;
}
