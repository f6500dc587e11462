import { BaseError } from './base.error';

/**
 * Git operation failed errors
 */
export class GitOperationError extends BaseError {
  public readonly code = 'GIT_OPERATION_FAILED';
  public readonly recoverable = false;
}

/**
 * Git produced output the classifier cannot interpret
 */
export class UnexpectedGitOutputError extends BaseError {
  public readonly code: string = 'UNEXPECTED_GIT_OUTPUT';
  public readonly recoverable = false;
  public readonly output: string;

  constructor(message: string, output: string, details?: string) {
    super(message, details);
    this.output = output;
  }
}

/**
 * The file carries a deletion status, which this tool does not report on
 */
export class DeletedFileError extends UnexpectedGitOutputError {
  public readonly code = 'DELETED_FILE_STATUS';
}
