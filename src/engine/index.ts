/**
 * Engine Module
 * Barrel export for the interpreter and the re-evaluation pipeline.
 */

// Main pipeline class
export { ScriptPipeline } from './ScriptPipeline';

// Types
export type {
  CommandErrorCode,
  CommandError,
  CommandResult,
  ExecutionReport,
  ExecuteOptions,
  PipelineState,
  PassResult,
  DirectCommandResult,
  PipelineEvent,
  PipelineEventCallback,
  PipelineOptions,
} from './types';

// Components (for advanced usage)
export { CommandInterpreter, reportErrorMessages } from './CommandInterpreter';
export { fingerprintCommands } from './fingerprint';
export { RangeAnchor, formatRangeCommand } from './RangeAnchor';
