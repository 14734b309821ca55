/**
 * Command Parser
 * Turns body lines into typed edit commands.
 */

import type { EditCommand, RangeCommandType } from '../core/types';
import { createLogger, errorMessage } from '../utils/logger';
import { formatTimecode, timecodeToSeconds } from '../utils/time';
import { splitLines } from './lines';
import { COMMAND } from './patterns';

const logger = createLogger('CommandParser');

export interface ParseOptions {
  /** Number of document lines before the parsed text (the header) */
  lineOffset?: number;
}

function timeAt(match: RegExpExecArray, firstGroup: number): number {
  return timecodeToSeconds(
    match[firstGroup],
    match[firstGroup + 1],
    match[firstGroup + 2],
    match[firstGroup + 3]
  );
}

const RANGE_PATTERNS: Array<[RangeCommandType, RegExp]> = [
  ['hide', COMMAND.HIDE],
  ['show', COMMAND.SHOW],
  ['delete', COMMAND.DELETE],
];

function matchLine(text: string, line: number): EditCommand | null {
  const load = COMMAND.LOAD.exec(text);
  if (load) {
    return { type: 'load', path: load[1].trim(), line };
  }

  const cut = COMMAND.CUT.exec(text);
  if (cut) {
    return { type: 'cut', time: timeAt(cut, 1), line };
  }

  for (const [type, pattern] of RANGE_PATTERNS) {
    const range = pattern.exec(text);
    if (range) {
      return { type, start: timeAt(range, 1), end: timeAt(range, 5), line };
    }
  }

  return null;
}

/**
 * Parse a single line.
 * Returns null for lines that are not commands, including ones whose
 * timecodes cannot be decoded.
 */
export function parseCommandLine(text: string, line: number): EditCommand | null {
  try {
    return matchLine(text, line);
  } catch (err) {
    logger.debug('Dropping malformed command line', { line, error: errorMessage(err) });
    return null;
  }
}

/**
 * Parse every command in the body, in source order
 */
export function parseCommands(body: string, options: ParseOptions = {}): EditCommand[] {
  const lineOffset = options.lineOffset ?? 0;
  const commands: EditCommand[] = [];

  splitLines(body).forEach((text, index) => {
    const command = parseCommandLine(text, lineOffset + index + 1);
    if (command) commands.push(command);
  });

  return commands;
}

/**
 * Canonical single-line form of a command
 */
export function formatCommand(command: EditCommand): string {
  switch (command.type) {
    case 'load':
      return `LOAD ${command.path}`;
    case 'cut':
      return `CUT ${formatTimecode(command.time)}`;
    case 'hide':
    case 'show':
    case 'delete':
      return `${command.type.toUpperCase()} ${formatTimecode(command.start)} ${formatTimecode(command.end)}`;
  }
}
