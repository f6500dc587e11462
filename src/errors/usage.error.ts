import { ExitCode } from '../types/config.types';
import { BaseError } from './base.error';

/**
 * Invalid invocation: the user has to fix the command line
 */
export class UsageError extends BaseError {
  public readonly code: string = 'USAGE_ERROR';
  public readonly recoverable = true;
  public readonly exitCode: number = ExitCode.USAGE;
}

export class MissingArgumentError extends UsageError {
  public readonly code = 'MISSING_ARGUMENT';
}

export class VolumePathError extends UsageError {
  public readonly code = 'VOLUME_PATH';
}

export class PathNotFoundError extends UsageError {
  public readonly code = 'PATH_NOT_FOUND';
}

export class NotRegularFileError extends UsageError {
  public readonly code = 'NOT_REGULAR_FILE';
}
