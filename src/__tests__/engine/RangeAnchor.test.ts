import { describe, it, expect } from 'vitest';
import { RangeAnchor, formatRangeCommand } from '../../engine/RangeAnchor';

describe('RangeAnchor', () => {
  it('should start recording on the first pivot', () => {
    const anchor = new RangeAnchor();

    expect(anchor.setPivot(12)).toBeNull();
    expect(anchor.isRecording).toBe(true);
    expect(anchor.pivot).toBe(12);
  });

  it('should confirm an ordered range on the second pivot', () => {
    const anchor = new RangeAnchor();
    anchor.setPivot(20);

    expect(anchor.setPivot(8)).toEqual({ start: 8, end: 20 });
    expect(anchor.isRecording).toBe(false);
    expect(anchor.pivot).toBeNull();
  });

  it('should preview without ending the recording', () => {
    const anchor = new RangeAnchor();
    expect(anchor.preview(5)).toBeNull();

    anchor.setPivot(5);

    expect(anchor.preview(9)).toEqual({ start: 5, end: 9 });
    expect(anchor.preview(1)).toEqual({ start: 1, end: 5 });
    expect(anchor.isRecording).toBe(true);
  });

  it('should reset on cancel', () => {
    const anchor = new RangeAnchor();
    anchor.setPivot(5);

    anchor.cancel();

    expect(anchor.isRecording).toBe(false);
    expect(anchor.confirm(10)).toBeNull();
  });

  it('should format a range as a command line', () => {
    expect(formatRangeCommand('hide', { start: 10, end: 20 })).toBe(
      'HIDE 00:00:10.000 00:00:20.000'
    );
    expect(formatRangeCommand('delete', { start: 0.5, end: 61 })).toBe(
      'DELETE 00:00:00.500 00:01:01.000'
    );
  });
});
