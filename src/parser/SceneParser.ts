/**
 * Scene Parser
 * Extracts timestamped scene blocks from the script body.
 */

import type { FreeTextItem, SceneBlock } from '../core/types';
import { createLogger, errorMessage } from '../utils/logger';
import { formatTimecode, rangeContains, timecodeToSeconds } from '../utils/time';
import { parseCommandLine } from './CommandParser';
import type { ParseOptions } from './CommandParser';
import { splitLines } from './lines';
import { SCENE_SEPARATOR } from './patterns';

const logger = createLogger('SceneParser');

const TITLE_PREFIX = '# ';
const SUBTITLE_PREFIX = '> ';

interface ContentLine {
  text: string;
  line: number;
}

interface ContentParts {
  title?: string;
  subtitle?: string;
  freeText: FreeTextItem[];
}

/**
 * Split scene content into a title, a subtitle and free text runs
 */
function classifyContent(lines: ContentLine[]): ContentParts {
  let title: string | undefined;
  let subtitle: string | undefined;
  const freeText: FreeTextItem[] = [];
  let run: ContentLine[] = [];

  const flush = () => {
    if (run.length === 0) return;
    const text = run.map((l) => l.text).join('\n').trim();
    if (text) freeText.push({ text, line: run[0].line });
    run = [];
  };

  for (const { text, line } of lines) {
    const trimmed = text.trimStart();

    if (trimmed.trim().length === 0) {
      flush();
      continue;
    }

    if (trimmed.startsWith(TITLE_PREFIX)) {
      flush();
      const value = trimmed.slice(TITLE_PREFIX.length).trim();
      // Only the first heading is the title; later ones are ordinary text
      if (title === undefined) {
        title = value;
      } else {
        freeText.push({ text: value, line });
      }
      continue;
    }

    if (trimmed.startsWith(SUBTITLE_PREFIX)) {
      flush();
      const value = trimmed.slice(SUBTITLE_PREFIX.length).trim();
      subtitle = subtitle === undefined ? value : `${subtitle}\n${value}`;
      continue;
    }

    run.push({ text: trimmed, line });
  }
  flush();

  return { title, subtitle, freeText };
}

function isBlockEnd(text: string): boolean {
  return SCENE_SEPARATOR.test(text) || parseCommandLine(text, 0) !== null;
}

function readBlock(
  lines: string[],
  separatorIndex: number,
  match: RegExpExecArray,
  lineOffset: number
): SceneBlock {
  const startTime = timecodeToSeconds(match[1], match[2], match[3], match[4]);
  const endTime = timecodeToSeconds(match[5], match[6], match[7], match[8]);
  if (endTime < startTime) {
    throw new RangeError(
      `Scene ends before it starts (${formatTimecode(startTime)} -> ${formatTimecode(endTime)})`
    );
  }

  const content: ContentLine[] = [];
  for (let j = separatorIndex + 1; j < lines.length; j++) {
    const text = lines[j];
    if (isBlockEnd(text)) break;
    content.push({ text, line: lineOffset + j + 1 });
  }

  return {
    startTime,
    endTime,
    line: lineOffset + separatorIndex + 1,
    content: content.map((l) => l.text).join('\n').trim(),
    ...classifyContent(content),
  };
}

/**
 * Parse all scene blocks in the body.
 * A block that fails to decode is logged and skipped.
 */
export function parseScenes(body: string, options: ParseOptions = {}): SceneBlock[] {
  const lineOffset = options.lineOffset ?? 0;
  const lines = splitLines(body);
  const scenes: SceneBlock[] = [];

  lines.forEach((text, index) => {
    const match = SCENE_SEPARATOR.exec(text);
    if (!match) return;

    try {
      scenes.push(readBlock(lines, index, match, lineOffset));
    } catch (err) {
      logger.warn('Failed to parse scene block', {
        line: lineOffset + index + 1,
        error: errorMessage(err),
      });
    }
  });

  logger.debug('Scenes parsed', { sceneCount: scenes.length });
  return scenes;
}

/**
 * Separator line for a scene spanning the given times
 */
export function formatSceneSeparator(startTime: number, endTime: number): string {
  return `--- [${formatTimecode(startTime)} -> ${formatTimecode(endTime)}] ---`;
}

export function sceneDuration(scene: SceneBlock): number {
  return scene.endTime - scene.startTime;
}

/**
 * First scene whose closed range contains the time
 */
export function sceneAt(scenes: readonly SceneBlock[], time: number): SceneBlock | undefined {
  return scenes.find((s) => rangeContains(s.startTime, s.endTime, time));
}
