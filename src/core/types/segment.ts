/**
 * Scriptcut - Segment Type Definitions
 */

import type { SegmentState } from './base';

/** A half-open interval on the assembled output timeline */
export interface VideoSegment {
  readonly id: number;
  /** Start in seconds (inclusive) */
  readonly startTime: number;
  /** End in seconds (exclusive), always greater than startTime */
  readonly endTime: number;
  readonly visible: boolean;
  readonly state: SegmentState;
  /** Media file the segment plays from */
  readonly sourcePath: string;
}

/** Segment input for the store; an id is assigned when omitted */
export type SegmentInit = Omit<VideoSegment, 'id'> & { id?: number };
