import { simpleGit, SimpleGit } from 'simple-git';
import * as path from 'path';
import { FileSystemService } from './filesystem.service';
import { GitOperationError, UnexpectedGitOutputError } from '../errors/git.error';
import {
  DiffCounts,
  DiffScope,
  HistoryDate,
  StatusCode,
  VersionControlAdapter,
  WorkTreeLocation,
} from '../types/git.types';
import { logger } from '../utils/logger.service';
import { countLines, splitLines } from '../utils/text.utils';

const NOT_A_REPOSITORY = /not a git repository/i;
const NO_COMMITS_YET = /does not have any commits yet|bad default revision 'HEAD'/i;
const NUMSTAT_LINE = /^(\d+|-)\t(\d+|-)\t/;

/** `%ad|%ar` with short dates */
const DATE_FORMAT = ['--date=short', '--format=%ad|%ar'];

/**
 * Git service wrapper that answers the status report's queries.
 *
 * Every query runs from `workingDir`, so file arguments are relative to it.
 * Pathspecs carry the `:(literal)` magic; file names with glob characters do
 * not match other files.
 */
export class GitService implements VersionControlAdapter {
  private readonly git: SimpleGit;
  private readonly workingDir: string;
  private readonly fileSystem: FileSystemService;

  constructor(workingDir: string, fileSystem?: FileSystemService) {
    this.workingDir = path.resolve(workingDir);
    this.git = simpleGit(this.workingDir);
    this.fileSystem = fileSystem || new FileSystemService();
  }

  /**
   * Whether the working directory is in a work tree, inside `.git`, or in
   * no repository at all
   */
  public async getWorkTreeLocation(): Promise<WorkTreeLocation> {
    let output: string;
    try {
      output = await this.run(['rev-parse', '--is-inside-work-tree', '--is-inside-git-dir']);
    } catch (error) {
      if (NOT_A_REPOSITORY.test(errorMessage(error))) {
        return 'outside';
      }
      throw new GitOperationError('Failed to locate git repository', errorMessage(error));
    }

    const [insideWorkTree, insideGitDir] = splitLines(output);
    if (insideWorkTree === 'true') {
      return 'work-tree';
    }
    if (insideGitDir === 'true') {
      return 'git-dir';
    }
    // a repository was found but has no work tree at this location
    if (insideWorkTree === 'false' && insideGitDir === 'false') {
      return 'outside';
    }
    throw new UnexpectedGitOutputError('Unexpected output from git rev-parse', output);
  }

  /**
   * `git check-ignore` takes plain path names, not pathspecs, and exits 1
   * with no output for a path no rule matches. Tracked files are never
   * reported, whatever the rules say.
   */
  public async isIgnored(filePath: string): Promise<boolean> {
    try {
      const output = await this.run(['check-ignore', '--', filePath]);
      return splitLines(output).length > 0;
    } catch (error) {
      throw new GitOperationError(`Failed to check ignore rules for ${filePath}`, errorMessage(error));
    }
  }

  /**
   * Whether any commit reachable from HEAD touches the file
   */
  public async hasHistory(filePath: string): Promise<boolean> {
    const output = await this.log(['-1', '--format=%H', '--', literal(filePath)]);
    return output.trim().length > 0;
  }

  public async getStatusCodes(filePath: string): Promise<StatusCode[]> {
    try {
      const output = await this.run([
        'status',
        '--porcelain=v1',
        '--untracked-files=all',
        '--',
        literal(filePath),
      ]);

      return splitLines(output).map(line => ({
        index: line.charAt(0),
        workingTree: line.charAt(1),
      }));
    } catch (error) {
      throw new GitOperationError(`Failed to get status of ${filePath}`, errorMessage(error));
    }
  }

  /**
   * Inserted and deleted line counts between HEAD and the index (staged)
   * or the index and the working file (unstaged)
   */
  public async getDiffCounts(filePath: string, scope: DiffScope): Promise<DiffCounts> {
    const args = ['diff', '--numstat'];
    if (scope === 'staged') {
      args.push('--cached');
    }
    args.push('--', literal(filePath));

    let output: string;
    try {
      output = await this.run(args);
    } catch (error) {
      throw new GitOperationError(`Failed to diff ${scope} changes of ${filePath}`, errorMessage(error));
    }

    const lines = splitLines(output);
    if (lines.length === 0) {
      return { inserted: 0, deleted: 0, binary: false };
    }

    const match = lines.length === 1 ? NUMSTAT_LINE.exec(lines[0] ?? '') : null;
    if (!match) {
      throw new UnexpectedGitOutputError(`Unexpected diff statistics for ${filePath}`, output);
    }

    const [, inserted = '-', deleted = '-'] = match;
    if (inserted === '-' || deleted === '-') {
      return { inserted: 0, deleted: 0, binary: true };
    }
    return { inserted: Number(inserted), deleted: Number(deleted), binary: false };
  }

  public async countLines(filePath: string, scope: DiffScope): Promise<number> {
    if (scope === 'unstaged') {
      const content = await this.fileSystem.readFile(path.resolve(this.workingDir, filePath));
      return countLines(content);
    }

    try {
      const content = await this.run(['show', `:./${filePath}`]);
      return countLines(content);
    } catch (error) {
      throw new GitOperationError(`Failed to read staged content of ${filePath}`, errorMessage(error));
    }
  }

  public async getCreationDates(filePath: string, followRenames: boolean): Promise<HistoryDate[]> {
    const args = ['--diff-filter=A', ...DATE_FORMAT];
    if (followRenames) {
      args.unshift('--follow');
    }
    const output = await this.log([...args, '--', literal(filePath)]);
    return splitLines(output).map(parseHistoryDate);
  }

  /**
   * Most recent add or modify commit; renames are not followed, so the
   * commit that renamed the file counts as its latest change
   */
  public async getLastModifiedDate(filePath: string): Promise<HistoryDate | null> {
    const output = await this.log(['-1', '--diff-filter=AM', ...DATE_FORMAT, '--', literal(filePath)]);
    const [line] = splitLines(output);
    return line === undefined ? null : parseHistoryDate(line);
  }

  public async getAuthors(filePath: string): Promise<string[]> {
    const output = await this.log(['--diff-filter=AM', '--format=%an', '--', literal(filePath)]);
    return splitLines(output);
  }

  /**
   * Path from the repository root, as `git ls-files --full-name` prints it
   */
  public async getRepositoryPath(filePath: string): Promise<string> {
    try {
      const listed = await this.run(['ls-files', '-z', '--full-name', '--', literal(filePath)]);
      const [first] = listed.split('\0').filter(entry => entry.length > 0);
      if (first !== undefined) {
        return first;
      }

      const prefix = await this.run(['rev-parse', '--show-prefix']);
      return path.posix.join(prefix.trim(), filePath);
    } catch (error) {
      throw new GitOperationError(`Failed to resolve repository path of ${filePath}`, errorMessage(error));
    }
  }

  /**
   * Run `git log`; a branch without commits yields no output rather than
   * an error
   */
  private async log(args: string[]): Promise<string> {
    try {
      return await this.run(['log', ...args]);
    } catch (error) {
      if (NO_COMMITS_YET.test(errorMessage(error))) {
        return '';
      }
      throw new GitOperationError('Failed to read git history', errorMessage(error));
    }
  }

  private async run(args: string[]): Promise<string> {
    logger.debug(`git ${args.join(' ')}`);
    return this.git.raw(args);
  }
}

/**
 * Pathspec that matches exactly this name, relative to the working directory
 */
function literal(filePath: string): string {
  return `:(literal)${filePath}`;
}

function parseHistoryDate(line: string): HistoryDate {
  const separator = line.indexOf('|');
  if (separator === -1) {
    throw new UnexpectedGitOutputError('Unexpected date format from git log', line);
  }
  return {
    date: line.slice(0, separator),
    relative: line.slice(separator + 1),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
