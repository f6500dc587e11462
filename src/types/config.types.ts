import type { BaseError } from '../errors/base.error';

/**
 * Process exit codes
 */
export enum ExitCode {
  SUCCESS = 0,
  FATAL = 1,
  USAGE = 2,
}

/**
 * Net verbosity when neither -v nor -q is given
 */
export const DEFAULT_VERBOSITY = 1;

/**
 * Verbosity from which history lines are printed
 */
export const HISTORY_VERBOSITY = 2;

/**
 * Verbosity from which every git query is logged
 */
export const DEBUG_VERBOSITY = 3;

/**
 * Pager used for --help when $PAGER is unset
 */
export const DEFAULT_PAGER = 'less';

/**
 * Version reported when package.json cannot be read
 */
export const FALLBACK_VERSION = '1.0.0';

/**
 * Manual page shown by --help, relative to the package root
 */
export const MANUAL_PATH = 'docs/git-file-status.txt';

/**
 * Options shared by commands
 */
export interface CommandOptions {
  /** Net verbosity level, never below zero */
  verbosity?: number;
}

/**
 * Outcome of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message?: string;
  data?: T;
  error?: Error | BaseError;
  exitCode: number;
}
