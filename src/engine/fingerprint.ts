/**
 * Command fingerprint
 * Content hash of a command list, used to skip re-execution of unchanged scripts.
 */

import { createHash } from 'node:crypto';
import type { EditCommand } from '../core/types';
import { formatCommand } from '../parser/CommandParser';
import { PIPELINE } from '../constants';

/**
 * Digest of the canonical command lines. Line numbers are not part of it,
 * so moving commands around prose does not force a re-run.
 */
export function fingerprintCommands(commands: readonly EditCommand[]): string {
  const canonical = commands.map(formatCommand).join(PIPELINE.FINGERPRINT_SEPARATOR);
  return createHash(PIPELINE.FINGERPRINT_ALGORITHM).update(canonical).digest('hex');
}
