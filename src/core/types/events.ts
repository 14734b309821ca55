/**
 * Scriptcut - Event Type Definitions
 * Types for segment store notifications.
 */

import type { VideoSegment } from './segment';

/** Segment store events */
export type SegmentEvent =
  | { type: 'added'; segment: VideoSegment }
  | { type: 'removed'; segment: VideoSegment }
  | { type: 'updated'; segment: VideoSegment; previous: VideoSegment }
  | { type: 'cleared'; count: number };

/** Segment store event callback */
export type SegmentEventCallback = (event: SegmentEvent) => void;
