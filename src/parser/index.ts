/**
 * Script Parser
 * Barrel export for the header, command and scene parsers.
 */

export {
  parseHeader,
  splitDocument,
  formatHeader,
  defaultProjectConfig,
} from './HeaderParser';
export type { HeaderParseResult, SplitDocument } from './HeaderParser';

export { parseCommands, parseCommandLine, formatCommand } from './CommandParser';
export type { ParseOptions } from './CommandParser';

export {
  parseScenes,
  formatSceneSeparator,
  sceneDuration,
  sceneAt,
} from './SceneParser';
