/**
 * Scriptcut - SegmentStore Class
 * Ordered, observable collection of the segments that make up the output timeline.
 */

import type {
  VideoSegment,
  SegmentInit,
  SegmentEvent,
  SegmentEventCallback,
} from './types';
import { EventEmitter } from './EventEmitter';
import { compareByStart, containsTime, segmentDuration } from './segments';
import { rangesOverlap } from '../utils/time';
import { createLogger } from '../utils/logger';

const logger = createLogger('SegmentStore');

function assertPositiveLength(span: Pick<VideoSegment, 'startTime' | 'endTime'>): void {
  if (!(span.endTime > span.startTime)) {
    throw new RangeError(
      `Segment end (${span.endTime}) must be after start (${span.startTime})`
    );
  }
}

export class SegmentStore {
  private _segments: VideoSegment[] = [];
  private _nextId = 1;
  private events = new EventEmitter<SegmentEvent>();

  // ============================================================================
  // QUERIES
  // ============================================================================

  /**
   * All segments, sorted by start time (read-only)
   */
  get segments(): readonly VideoSegment[] {
    return this._segments;
  }

  get size(): number {
    return this._segments.length;
  }

  /**
   * Sum of segment durations
   */
  get totalDuration(): number {
    return this._segments.reduce((sum, s) => sum + segmentDuration(s), 0);
  }

  get(id: number): VideoSegment | undefined {
    return this._segments.find((s) => s.id === id);
  }

  /**
   * Segments intersecting the half-open range [start, end)
   */
  segmentsOverlapping(start: number, end: number): VideoSegment[] {
    return this._segments.filter((s) =>
      rangesOverlap(s.startTime, s.endTime, start, end)
    );
  }

  /**
   * First segment whose closed range contains the time
   */
  segmentAt(time: number): VideoSegment | undefined {
    return this._segments.find((s) => containsTime(s, time));
  }

  visibleSegments(): VideoSegment[] {
    return this._segments.filter((s) => s.visible);
  }

  // ============================================================================
  // MUTATION
  // ============================================================================

  /**
   * Insert a segment, assigning an id when none is given.
   * @throws RangeError when the segment does not have a positive length,
   * or when the given id belongs to another segment
   */
  add(init: SegmentInit): VideoSegment {
    assertPositiveLength(init);
    if (init.id !== undefined && this.get(init.id)) {
      throw new RangeError(`Segment id ${init.id} is already in use`);
    }

    const id = init.id ?? this._nextId;
    this._nextId = Math.max(this._nextId, id + 1);

    const segment: VideoSegment = { ...init, id };
    this._segments.push(segment);
    this.sortSegments();

    logger.debug('Segment added', {
      segmentId: id,
      startTime: segment.startTime,
      endTime: segment.endTime,
      segmentCount: this._segments.length,
    });

    this.events.emit({ type: 'added', segment });
    return segment;
  }

  /**
   * Remove a segment by id
   * @returns false when no segment had that id
   */
  remove(id: number): boolean {
    const index = this._segments.findIndex((s) => s.id === id);
    if (index === -1) return false;

    const [segment] = this._segments.splice(index, 1);
    if (segment) {
      this.events.emit({ type: 'removed', segment });
    }
    return true;
  }

  /**
   * Replace the segment with the same id
   * @returns false when no segment had that id
   * @throws RangeError when the replacement does not have a positive length
   */
  update(segment: VideoSegment): boolean {
    assertPositiveLength(segment);
    const index = this._segments.findIndex((s) => s.id === segment.id);
    if (index === -1) return false;

    const previous = this._segments[index];
    if (!previous) return false;

    this._segments[index] = segment;
    this.sortSegments();
    this.events.emit({ type: 'updated', segment, previous });
    return true;
  }

  /**
   * Drop every segment and restart id assignment.
   * Observers get a single bulk event instead of per-segment removals.
   */
  clear(): void {
    const count = this._segments.length;
    this._segments = [];
    this._nextId = 1;
    if (count > 0) {
      this.events.emit({ type: 'cleared', count });
    }
  }

  // ============================================================================
  // OBSERVATION
  // ============================================================================

  /**
   * Subscribe to store changes.
   * @returns Unsubscribe function
   */
  on(callback: SegmentEventCallback): () => void {
    return this.events.on(callback);
  }

  get listenerCount(): number {
    return this.events.listenerCount;
  }

  private sortSegments(): void {
    this._segments.sort(compareByStart);
  }
}
