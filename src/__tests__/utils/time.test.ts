import { describe, it, expect } from 'vitest';
import {
  timecodeToSeconds,
  parseTimecode,
  formatTimecode,
  rangesOverlap,
  rangeContains,
  orderRange,
} from '../../utils/time';

describe('time utilities', () => {
  describe('timecodeToSeconds', () => {
    it('should combine components into seconds', () => {
      expect(timecodeToSeconds('00', '00', '10', '000')).toBe(10);
      expect(timecodeToSeconds('01', '02', '03', '500')).toBe(3723.5);
    });

    it('should reject non-numeric components', () => {
      expect(() => timecodeToSeconds('aa', '00', '00', '000')).toThrow(
        'Invalid timecode component: "aa"'
      );
    });
  });

  describe('parseTimecode', () => {
    it('should parse a full timecode', () => {
      expect(parseTimecode('00:01:30.250')).toBe(90.25);
      expect(parseTimecode('  00:00:05.000  ')).toBe(5);
    });

    it('should return null for other shapes', () => {
      expect(parseTimecode('1:30.250')).toBeNull();
      expect(parseTimecode('00:01:30')).toBeNull();
      expect(parseTimecode('')).toBeNull();
    });
  });

  describe('formatTimecode', () => {
    it('should pad every component', () => {
      expect(formatTimecode(0)).toBe('00:00:00.000');
      expect(formatTimecode(10)).toBe('00:00:10.000');
      expect(formatTimecode(3723.5)).toBe('01:02:03.500');
    });

    it('should round to the nearest millisecond', () => {
      expect(formatTimecode(1.2346)).toBe('00:00:01.235');
      expect(formatTimecode(59.9999)).toBe('00:01:00.000');
    });

    it('should clamp negative times to zero', () => {
      expect(formatTimecode(-3)).toBe('00:00:00.000');
    });

    it('should format what parseTimecode reads', () => {
      expect(formatTimecode(parseTimecode('12:34:56.789') ?? -1)).toBe('12:34:56.789');
    });
  });

  describe('ranges', () => {
    it('should treat ranges as half-open for overlap', () => {
      expect(rangesOverlap(0, 10, 5, 15)).toBe(true);
      expect(rangesOverlap(0, 10, 10, 20)).toBe(false);
      expect(rangesOverlap(10, 20, 0, 10)).toBe(false);
    });

    it('should include both ends for containment', () => {
      expect(rangeContains(0, 10, 0)).toBe(true);
      expect(rangeContains(0, 10, 10)).toBe(true);
      expect(rangeContains(0, 10, 10.001)).toBe(false);
    });

    it('should order two times', () => {
      expect(orderRange(20, 10)).toEqual({ start: 10, end: 20 });
      expect(orderRange(10, 20)).toEqual({ start: 10, end: 20 });
    });
  });
});
