import { ExitCode } from '../types/config.types';

/**
 * Base class for every error the tool raises on purpose
 */
export abstract class BaseError extends Error {
  public abstract readonly code: string;
  public abstract readonly recoverable: boolean;
  public readonly exitCode: number = ExitCode.FATAL;
  public readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
