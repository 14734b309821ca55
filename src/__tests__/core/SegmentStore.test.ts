import { describe, it, expect, vi } from 'vitest';
import { SegmentStore } from '../../core/SegmentStore';
import type { SegmentEvent, SegmentInit } from '../../core/types';

function span(startTime: number, endTime: number, visible = true): SegmentInit {
  return {
    startTime,
    endTime,
    visible,
    state: visible ? 'stopped' : 'hidden',
    sourcePath: 'clip.mp4',
  };
}

describe('SegmentStore', () => {
  describe('add', () => {
    it('should assign increasing ids starting at 1', () => {
      const store = new SegmentStore();

      const a = store.add(span(0, 10));
      const b = store.add(span(10, 20));

      expect(a.id).toBe(1);
      expect(b.id).toBe(2);
      expect(store.size).toBe(2);
    });

    it('should keep an explicit id and continue after it', () => {
      const store = new SegmentStore();

      store.add({ ...span(0, 10), id: 7 });
      const next = store.add(span(10, 20));

      expect(next.id).toBe(8);
    });

    it('should keep segments sorted by start time', () => {
      const store = new SegmentStore();

      store.add(span(20, 30));
      store.add(span(0, 10));
      store.add(span(10, 20));

      expect(store.segments.map((s) => s.startTime)).toEqual([0, 10, 20]);
    });

    it('should reject segments without a positive length', () => {
      const store = new SegmentStore();

      expect(() => store.add(span(5, 5))).toThrow(RangeError);
      expect(() => store.add(span(6, 5))).toThrow(RangeError);
      expect(store.size).toBe(0);
    });

    it('should reject an explicit id that is already taken', () => {
      const store = new SegmentStore();
      store.add(span(0, 10));

      expect(() => store.add({ ...span(10, 20), id: 1 })).toThrow(
        'Segment id 1 is already in use'
      );
      expect(store.segments.map((s) => s.id)).toEqual([1]);
    });
  });

  describe('queries', () => {
    it('should find the segment containing a time, earlier one first on a boundary', () => {
      const store = new SegmentStore();
      store.add(span(0, 10));
      store.add(span(10, 20));

      expect(store.segmentAt(5)?.id).toBe(1);
      expect(store.segmentAt(10)?.id).toBe(1);
      expect(store.segmentAt(15)?.id).toBe(2);
      expect(store.segmentAt(25)).toBeUndefined();
    });

    it('should return segments overlapping a half-open range', () => {
      const store = new SegmentStore();
      store.add(span(0, 10));
      store.add(span(10, 20));
      store.add(span(20, 30));

      expect(store.segmentsOverlapping(10, 20).map((s) => s.id)).toEqual([2]);
      expect(store.segmentsOverlapping(5, 25).map((s) => s.id)).toEqual([1, 2, 3]);
      expect(store.segmentsOverlapping(30, 40)).toEqual([]);
    });

    it('should report visible segments and total duration', () => {
      const store = new SegmentStore();
      store.add(span(0, 10));
      store.add(span(10, 20, false));
      store.add(span(20, 25));

      expect(store.visibleSegments().map((s) => s.id)).toEqual([1, 3]);
      expect(store.totalDuration).toBe(25);
    });
  });

  describe('mutation', () => {
    it('should remove by id', () => {
      const store = new SegmentStore();
      const a = store.add(span(0, 10));

      expect(store.remove(a.id)).toBe(true);
      expect(store.remove(a.id)).toBe(false);
      expect(store.size).toBe(0);
    });

    it('should replace a segment on update', () => {
      const store = new SegmentStore();
      const a = store.add(span(0, 10));

      expect(store.update({ ...a, visible: false, state: 'hidden' })).toBe(true);
      expect(store.get(a.id)?.visible).toBe(false);
      expect(store.update({ ...a, id: 99 })).toBe(false);
    });

    it('should reject an update without a positive length', () => {
      const store = new SegmentStore();
      const a = store.add(span(0, 10));

      expect(() => store.update({ ...a, startTime: 10, endTime: 5 })).toThrow(RangeError);
      expect(() => store.update({ ...a, endTime: 0 })).toThrow(RangeError);
      expect(store.get(a.id)).toEqual(a);
    });

    it('should restart ids after clear', () => {
      const store = new SegmentStore();
      store.add(span(0, 10));
      store.add(span(10, 20));

      store.clear();
      const fresh = store.add(span(0, 5));

      expect(store.size).toBe(1);
      expect(fresh.id).toBe(1);
    });
  });

  describe('events', () => {
    it('should notify added, updated and removed', () => {
      const store = new SegmentStore();
      const events: SegmentEvent[] = [];
      store.on((event) => events.push(event));

      const a = store.add(span(0, 10));
      const hidden = { ...a, visible: false, state: 'hidden' as const };
      store.update(hidden);
      store.remove(a.id);

      expect(events).toEqual([
        { type: 'added', segment: a },
        { type: 'updated', segment: hidden, previous: a },
        { type: 'removed', segment: hidden },
      ]);
    });

    it('should emit a single cleared event only when something was removed', () => {
      const store = new SegmentStore();
      const callback = vi.fn();
      store.on(callback);

      store.clear();
      expect(callback).not.toHaveBeenCalled();

      store.add(span(0, 10));
      store.add(span(10, 20));
      callback.mockClear();

      store.clear();
      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith({ type: 'cleared', count: 2 });
    });

    it('should stop notifying after unsubscribe', () => {
      const store = new SegmentStore();
      const callback = vi.fn();
      const unsubscribe = store.on(callback);

      unsubscribe();
      store.add(span(0, 10));

      expect(callback).not.toHaveBeenCalled();
      expect(store.listenerCount).toBe(0);
    });
  });
});
