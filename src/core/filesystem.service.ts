import * as path from 'path';
import * as fs from 'fs-extra';
import { FileSystemError } from '../errors/filesystem.error';
import {
  MissingArgumentError,
  NotRegularFileError,
  PathNotFoundError,
  VolumePathError,
} from '../errors/usage.error';

const DRIVE_LETTER = /^[A-Za-z]:/;
const UNC_PREFIX = /^\\\\/;

/**
 * File system access used by the status report
 */
export class FileSystemService {
  public async pathExists(filePath: string): Promise<boolean> {
    return fs.pathExists(filePath);
  }

  public async readFile(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new FileSystemError(
        `Failed to read file: ${filePath}`,
        error instanceof Error ? error.message : String(error),
      );
    }
  }

  /**
   * Check a command-line path and resolve it against the working directory.
   *
   * Rejects empty input, drive or UNC prefixes, missing paths and anything
   * that is not a regular file once symlinks are followed.
   */
  public async validateTargetFile(input: string | undefined, cwd = process.cwd()): Promise<string> {
    if (input === undefined || !input.trim()) {
      throw new MissingArgumentError('No file given');
    }

    if (DRIVE_LETTER.test(input) || UNC_PREFIX.test(input)) {
      throw new VolumePathError(`Paths with a volume or drive component are not supported: ${input}`);
    }

    const absolutePath = path.resolve(cwd, input);

    if (!(await this.pathExists(absolutePath))) {
      throw new PathNotFoundError(`No such file: ${input}`);
    }

    const stats = await fs.stat(absolutePath);
    if (!stats.isFile()) {
      throw new NotRegularFileError(`Not a regular file: ${input}`);
    }

    return absolutePath;
  }
}
