/**
 * Scriptcut - Edit Command Type Definitions
 */

import type { CommandType, RangeCommandType } from './base';

/** Fields shared by every command */
interface CommandBase {
  /** 1-based line in the source document */
  line: number;
}

export interface LoadCommand extends CommandBase {
  type: 'load';
  path: string;
}

export interface CutCommand extends CommandBase {
  type: 'cut';
  time: number;
}

export interface RangeCommand<T extends RangeCommandType> extends CommandBase {
  type: T;
  start: number;
  end: number;
}

export type HideCommand = RangeCommand<'hide'>;
export type ShowCommand = RangeCommand<'show'>;
export type DeleteCommand = RangeCommand<'delete'>;

/** A parsed edit command */
export type EditCommand =
  | LoadCommand
  | CutCommand
  | HideCommand
  | ShowCommand
  | DeleteCommand;

/** Narrow a command by its type tag */
export type CommandOf<T extends CommandType> = Extract<EditCommand, { type: T }>;
