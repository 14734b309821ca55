/**
 * Header Parser
 * Splits a script into its settings header and command body.
 */

import type { ProjectConfig } from '../core/types';
import { PROJECT_DEFAULTS } from '../constants';
import { createLogger } from '../utils/logger';
import { splitLines } from './lines';
import { DIRECTIVE, HEADER_SEPARATOR } from './patterns';

const logger = createLogger('HeaderParser');

type ConfigDraft = { -readonly [K in keyof ProjectConfig]: ProjectConfig[K] };

interface Directive {
  pattern: RegExp;
  apply: (match: RegExpExecArray, draft: ConfigDraft) => void;
}

export interface HeaderParseResult {
  config: ProjectConfig;
  /** 0-based index of the first body line */
  bodyStartLine: number;
}

export interface SplitDocument extends HeaderParseResult {
  body: string;
}

/**
 * Default project settings
 */
export function defaultProjectConfig(): ProjectConfig {
  return {
    projectName: PROJECT_DEFAULTS.PROJECT_NAME,
    width: PROJECT_DEFAULTS.WIDTH,
    height: PROJECT_DEFAULTS.HEIGHT,
    frameRate: PROJECT_DEFAULTS.FRAME_RATE,
    defaultFont: PROJECT_DEFAULTS.FONT,
    defaultFontSize: PROJECT_DEFAULTS.FONT_SIZE,
    defaultTitleColor: PROJECT_DEFAULTS.TITLE_COLOR,
    defaultSubtitleColor: PROJECT_DEFAULTS.SUBTITLE_COLOR,
    defaultBackgroundAlpha: PROJECT_DEFAULTS.BACKGROUND_ALPHA,
  };
}

function positiveInt(value: string): number | null {
  const n = parseInt(value, 10);
  return Number.isInteger(n) && n > 0 ? n : null;
}

// Tried in order; the first pattern that matches handles the line.
const DIRECTIVES: Directive[] = [
  {
    pattern: DIRECTIVE.PROJECT,
    apply: (m, draft) => {
      draft.projectName = m[1];
    },
  },
  {
    pattern: DIRECTIVE.RESOLUTION,
    apply: (m, draft) => {
      const width = positiveInt(m[1]);
      const height = positiveInt(m[2]);
      if (width !== null && height !== null) {
        draft.width = width;
        draft.height = height;
      }
    },
  },
  {
    pattern: DIRECTIVE.FRAMERATE,
    apply: (m, draft) => {
      draft.frameRate = positiveInt(m[1]) ?? draft.frameRate;
    },
  },
  {
    pattern: DIRECTIVE.DEFAULT_FONT,
    apply: (m, draft) => {
      const font = m[1].trim();
      if (font.length > 0) draft.defaultFont = font;
    },
  },
  {
    pattern: DIRECTIVE.DEFAULT_FONT_SIZE,
    apply: (m, draft) => {
      draft.defaultFontSize = positiveInt(m[1]) ?? draft.defaultFontSize;
    },
  },
  {
    pattern: DIRECTIVE.DEFAULT_TITLE_COLOR,
    apply: (m, draft) => {
      draft.defaultTitleColor = `#${m[1].toUpperCase()}`;
    },
  },
  {
    pattern: DIRECTIVE.DEFAULT_SUBTITLE_COLOR,
    apply: (m, draft) => {
      draft.defaultSubtitleColor = `#${m[1].toUpperCase()}`;
    },
  },
  {
    pattern: DIRECTIVE.DEFAULT_BACKGROUND_ALPHA,
    apply: (m, draft) => {
      const alpha = parseFloat(m[1]);
      if (alpha >= 0 && alpha <= 1) draft.defaultBackgroundAlpha = alpha;
    },
  },
];

function applyDirective(line: string, draft: ConfigDraft): void {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith('#')) return;

  for (const directive of DIRECTIVES) {
    const match = directive.pattern.exec(line);
    if (match) {
      directive.apply(match, draft);
      return;
    }
  }

  logger.debug('Ignoring unrecognized header line', { line });
}

/**
 * Parse the header section of a script.
 * Without a `===` separator the whole text is body and the config is all defaults.
 */
export function parseHeader(text: string): HeaderParseResult {
  const lines = splitLines(text);
  const separatorIndex = lines.findIndex((line) => HEADER_SEPARATOR.test(line));

  if (separatorIndex === -1) {
    return { config: Object.freeze(defaultProjectConfig()), bodyStartLine: 0 };
  }

  const draft: ConfigDraft = defaultProjectConfig();
  for (const line of lines.slice(0, separatorIndex)) {
    applyDirective(line, draft);
  }

  const config: ProjectConfig = Object.freeze({ ...draft });
  const bodyStartLine = separatorIndex + 1;

  logger.debug('Header parsed', {
    projectName: config.projectName,
    resolution: `${config.width}x${config.height}`,
    frameRate: config.frameRate,
    bodyStartLine,
  });

  return { config, bodyStartLine };
}

/**
 * Parse the header and cut out the body text
 */
export function splitDocument(text: string): SplitDocument {
  const { config, bodyStartLine } = parseHeader(text);
  const body = splitLines(text).slice(bodyStartLine).join('\n');
  return { config, bodyStartLine, body };
}

function formatAlpha(alpha: number): string {
  return Number.isInteger(alpha * 10) ? alpha.toFixed(1) : String(alpha);
}

/**
 * Render a config as header directives followed by the separator
 */
export function formatHeader(config: ProjectConfig): string {
  return [
    `PROJECT "${config.projectName}"`,
    `RESOLUTION ${config.width}x${config.height}`,
    `FRAMERATE ${config.frameRate}`,
    `DEFAULT_FONT "${config.defaultFont}"`,
    `DEFAULT_FONT_SIZE ${config.defaultFontSize}`,
    `DEFAULT_TITLE_COLOR ${config.defaultTitleColor}`,
    `DEFAULT_SUBTITLE_COLOR ${config.defaultSubtitleColor}`,
    `DEFAULT_BACKGROUND_ALPHA ${formatAlpha(config.defaultBackgroundAlpha)}`,
    '===',
    '',
  ].join('\n');
}
