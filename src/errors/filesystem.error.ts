import { BaseError } from './base.error';

/**
 * File system operation errors
 */
export class FileSystemError extends BaseError {
  public readonly code = 'FILESYSTEM_ERROR';
  public readonly recoverable = false;
}
