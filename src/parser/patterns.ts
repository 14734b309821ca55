/**
 * Script grammar patterns
 * Regular expressions for the line-oriented script syntax.
 */

import { TIMECODE_PATTERN } from '../utils/time';

const T = TIMECODE_PATTERN;

/** Header/body separator: three or more `=` and nothing else */
export const HEADER_SEPARATOR = /^={3,}$/;

/** Header directives, tried in this order */
export const DIRECTIVE = {
  PROJECT: /^\s*PROJECT\s+"(.+)"$/i,
  RESOLUTION: /^\s*RESOLUTION\s+(\d+)x(\d+)$/i,
  FRAMERATE: /^\s*FRAMERATE\s+(\d+)$/i,
  DEFAULT_FONT: /^\s*DEFAULT_FONT\s+"(.+)"$/i,
  DEFAULT_FONT_SIZE: /^\s*DEFAULT_FONT_SIZE\s+(\d+)$/i,
  DEFAULT_TITLE_COLOR: /^\s*DEFAULT_TITLE_COLOR\s+#([0-9A-Fa-f]{6})$/i,
  DEFAULT_SUBTITLE_COLOR: /^\s*DEFAULT_SUBTITLE_COLOR\s+#([0-9A-Fa-f]{6})$/i,
  DEFAULT_BACKGROUND_ALPHA: /^\s*DEFAULT_BACKGROUND_ALPHA\s+(0?\.\d+|1\.0|0|1)$/i,
} as const;

/** Body commands. LOAD is case-insensitive, the timed commands are upper case only. */
export const COMMAND = {
  LOAD: /^\s*LOAD\s+(.+)$/i,
  CUT: new RegExp(`^\\s*CUT\\s+${T}$`),
  HIDE: new RegExp(`^\\s*HIDE\\s+${T}\\s+${T}$`),
  SHOW: new RegExp(`^\\s*SHOW\\s+${T}\\s+${T}$`),
  DELETE: new RegExp(`^\\s*DELETE\\s+${T}\\s+${T}$`),
} as const;

/** Scene separator: `--- [HH:MM:SS.mmm -> HH:MM:SS.mmm] ---` */
export const SCENE_SEPARATOR = new RegExp(`^-{3,}\\s*\\[${T}\\s*->\\s*${T}\\]\\s*-{3,}$`);
