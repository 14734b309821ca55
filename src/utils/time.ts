/**
 * Scriptcut - Time Utilities
 * Timecode conversion and range helpers. Times are fractional seconds.
 */

import { TIME } from '../constants';

/** Pattern fragment for a single `HH:MM:SS.mmm` timecode with four capture groups */
export const TIMECODE_PATTERN = '(\\d{2}):(\\d{2}):(\\d{2})\\.(\\d{3})';

/**
 * Convert timecode components to seconds.
 * Throws when a component is not a non-negative integer.
 */
export function timecodeToSeconds(
  hours: string,
  minutes: string,
  seconds: string,
  milliseconds: string
): number {
  const parts = [hours, minutes, seconds, milliseconds].map(parseTimecodePart);
  const [h = 0, m = 0, s = 0, ms = 0] = parts;
  return (
    h * TIME.SECONDS_PER_HOUR +
    m * TIME.SECONDS_PER_MINUTE +
    s +
    ms / TIME.MS_PER_SECOND
  );
}

function parseTimecodePart(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid timecode component: "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Parse a full `HH:MM:SS.mmm` string to seconds, or null if it does not match
 */
export function parseTimecode(timecode: string): number | null {
  const match = new RegExp(`^${TIMECODE_PATTERN}$`).exec(timecode.trim());
  if (!match) return null;
  return timecodeToSeconds(match[1], match[2], match[3], match[4]);
}

/**
 * Format seconds as timecode string (HH:MM:SS.mmm)
 */
export function formatTimecode(seconds: number): string {
  const totalMs = Math.round(Math.max(0, seconds) * TIME.MS_PER_SECOND);
  const ms = totalMs % 1000;
  const totalSeconds = Math.floor(totalMs / 1000);
  const secs = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);
  const minutes = totalMinutes % 60;
  const hours = Math.floor(totalMinutes / 60);

  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}.${ms.toString().padStart(3, '0')}`;
}

/**
 * Check if two half-open time ranges overlap
 */
export function rangesOverlap(
  start1: number,
  end1: number,
  start2: number,
  end2: number
): boolean {
  return start1 < end2 && end1 > start2;
}

/**
 * Check if a time falls inside a closed range
 */
export function rangeContains(start: number, end: number, time: number): boolean {
  return time >= start && time <= end;
}

/**
 * Order two times into a range
 */
export function orderRange(a: number, b: number): { start: number; end: number } {
  return { start: Math.min(a, b), end: Math.max(a, b) };
}
