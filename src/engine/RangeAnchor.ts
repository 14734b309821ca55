/**
 * Range Anchor
 * Two-step range marking: the first mark pins one end, the second confirms.
 */

import type { RangeCommandType, TimeRange } from '../core/types';
import { formatTimecode, orderRange } from '../utils/time';

export class RangeAnchor {
  private _pivot: number | null = null;

  get isRecording(): boolean {
    return this._pivot !== null;
  }

  get pivot(): number | null {
    return this._pivot;
  }

  /**
   * Start recording at the time, or confirm when already recording.
   * @returns The confirmed range on the second call, otherwise null
   */
  setPivot(time: number): TimeRange | null {
    if (this._pivot === null) {
      this._pivot = time;
      return null;
    }
    return this.confirm(time);
  }

  /**
   * Range between the pivot and the time, without ending the recording
   */
  preview(time: number): TimeRange | null {
    if (this._pivot === null) return null;
    return orderRange(this._pivot, time);
  }

  confirm(time: number): TimeRange | null {
    const range = this.preview(time);
    this._pivot = null;
    return range;
  }

  cancel(): void {
    this._pivot = null;
  }
}

/**
 * Command line for a marked range, e.g. `HIDE 00:00:10.000 00:00:20.000`
 */
export function formatRangeCommand(type: RangeCommandType, range: TimeRange): string {
  return `${type.toUpperCase()} ${formatTimecode(range.start)} ${formatTimecode(range.end)}`;
}
