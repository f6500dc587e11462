import * as path from 'path';
import { summarizeChanges } from '../core/change.summarizer';
import { FileSystemService } from '../core/filesystem.service';
import { GitService } from '../core/git.service';
import { HistoryService } from '../core/history.service';
import { formatReport } from '../core/report.formatter';
import { StatusClassifier } from '../core/status.classifier';
import { BaseError } from '../errors/base.error';
import {
  CommandOptions,
  CommandResult,
  DEFAULT_VERBOSITY,
  ExitCode,
  HISTORY_VERBOSITY,
} from '../types/config.types';
import { DiffScope, VersionControlAdapter } from '../types/git.types';
import {
  FileClassification,
  FileHistory,
  FileStatusReport,
  ScopeSummary,
} from '../types/status.types';
import { logger } from '../utils/logger.service';

/**
 * Creates the adapter for the directory that holds the file
 */
export type AdapterFactory = (directory: string) => VersionControlAdapter;

/**
 * Status command: classify one file and print the report
 */
export class StatusCommand {
  private readonly fileSystem: FileSystemService;
  private readonly createAdapter: AdapterFactory;
  private readonly workingDir: string;

  constructor(workingDir?: string, fileSystem?: FileSystemService, createAdapter?: AdapterFactory) {
    this.workingDir = workingDir || process.cwd();
    this.fileSystem = fileSystem || new FileSystemService();
    this.createAdapter = createAdapter || (directory => new GitService(directory, this.fileSystem));
  }

  public async execute(
    filePath: string | undefined,
    options: CommandOptions = {},
  ): Promise<CommandResult<FileStatusReport>> {
    const verbosity = options.verbosity ?? DEFAULT_VERBOSITY;

    try {
      const absolutePath = await this.fileSystem.validateTargetFile(filePath, this.workingDir);
      logger.debug(`Reporting on ${absolutePath} at verbosity ${verbosity}`);

      const report = await this.buildReport(absolutePath, filePath ?? absolutePath, verbosity);

      for (const line of formatReport(report, verbosity)) {
        logger.info(line);
      }

      return {
        success: true,
        data: report,
        exitCode: ExitCode.SUCCESS,
      };
    } catch (error) {
      if (error instanceof BaseError) {
        return {
          success: false,
          message: error.message,
          error,
          exitCode: error.exitCode,
        };
      }

      return {
        success: false,
        message: 'Failed to report file status',
        error: error instanceof Error ? error : new Error(String(error)),
        exitCode: ExitCode.FATAL,
      };
    }
  }

  /**
   * Run the queries the verbosity level asks for and collect the results
   */
  private async buildReport(
    absolutePath: string,
    displayPath: string,
    verbosity: number,
  ): Promise<FileStatusReport> {
    const adapter = this.createAdapter(path.dirname(absolutePath));
    const fileName = path.basename(absolutePath);

    const state = await new StatusClassifier(adapter).classify(fileName);

    if (
      state.classification === FileClassification.OutsideRepo ||
      state.classification === FileClassification.InternalRepoFile
    ) {
      return { path: displayPath, state };
    }

    const repositoryPath = await adapter.getRepositoryPath(fileName);

    let staged: ScopeSummary | undefined;
    let unstaged: ScopeSummary | undefined;
    let history: FileHistory | undefined;

    if (verbosity >= 1 && state.isStaged) {
      staged = await summarizeScope(adapter, fileName, 'staged');
    }
    if (verbosity >= 1 && state.isModified) {
      unstaged = await summarizeScope(adapter, fileName, 'unstaged');
    }
    if (verbosity >= HISTORY_VERBOSITY && state.isTracked) {
      history = await new HistoryService(adapter).lookup(fileName);
    }

    return { path: displayPath, repositoryPath, state, staged, unstaged, history };
  }
}

async function summarizeScope(
  adapter: VersionControlAdapter,
  fileName: string,
  scope: DiffScope,
): Promise<ScopeSummary> {
  const counts = await adapter.getDiffCounts(fileName, scope);
  if (counts.binary) {
    return { binary: true };
  }

  const totalLinesAfter = await adapter.countLines(fileName, scope);
  return {
    binary: false,
    ...summarizeChanges({ inserted: counts.inserted, deleted: counts.deleted, totalLinesAfter }),
  };
}
