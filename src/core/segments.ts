/**
 * Segment helpers
 * Pure queries over VideoSegment values.
 */

import type { VideoSegment } from './types';
import { SEGMENT } from '../constants';
import { rangeContains, rangesOverlap } from '../utils/time';

type Span = Pick<VideoSegment, 'startTime' | 'endTime'>;

export function segmentDuration(segment: Span): number {
  return segment.endTime - segment.startTime;
}

/**
 * Inclusive on both ends, so a boundary time belongs to the earlier segment
 * when two segments touch.
 */
export function containsTime(segment: Span, time: number): boolean {
  return rangeContains(segment.startTime, segment.endTime, time);
}

export function segmentsOverlap(a: Span, b: Span): boolean {
  return rangesOverlap(a.startTime, a.endTime, b.startTime, b.endTime);
}

export function isAdjacent(
  a: Span,
  b: Span,
  tolerance: number = SEGMENT.ADJACENCY_TOLERANCE
): boolean {
  return (
    Math.abs(a.endTime - b.startTime) < tolerance ||
    Math.abs(b.endTime - a.startTime) < tolerance
  );
}

export function compareByStart(a: Span, b: Span): number {
  return a.startTime - b.startTime;
}
