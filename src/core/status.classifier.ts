import { DeletedFileError, UnexpectedGitOutputError } from '../errors/git.error';
import { VersionControlAdapter } from '../types/git.types';
import { FileClassification, FileState } from '../types/status.types';
import { logger } from '../utils/logger.service';

const STAGED_CODES = new Set(['A', 'M']);
const DELETED = 'D';
const MODIFIED = 'M';

/**
 * Works out which of the classifications applies to a file.
 *
 * Each check may end the run: outside a work tree nothing else is asked,
 * an ignored file is not looked up in history or status. git never reports
 * a tracked file as ignored, so a tracked file that also matches an ignore
 * rule is classified by its tracked status.
 *
 * Renames are not detected. A staged rename shows up as a new file.
 */
export class StatusClassifier {
  constructor(private readonly adapter: VersionControlAdapter) {}

  public async classify(filePath: string): Promise<FileState> {
    const location = await this.adapter.getWorkTreeLocation();
    if (location === 'outside') {
      return state(FileClassification.OutsideRepo);
    }
    if (location === 'git-dir') {
      return state(FileClassification.InternalRepoFile);
    }

    if (await this.adapter.isIgnored(filePath)) {
      return state(FileClassification.Ignored);
    }

    const isTracked = await this.adapter.hasHistory(filePath);
    const { isStaged, isModified } = await this.readStatus(filePath);
    logger.debug(`tracked=${isTracked} staged=${isStaged} modified=${isModified}`);

    if (!isTracked && !isStaged) {
      return state(FileClassification.Untracked);
    }
    if (!isTracked) {
      return { classification: FileClassification.NewWithChanges, isTracked, isStaged, isModified };
    }
    return {
      classification:
        isStaged || isModified
          ? FileClassification.TrackedWithChanges
          : FileClassification.TrackedNoChanges,
      isTracked,
      isStaged,
      isModified,
    };
  }

  private async readStatus(filePath: string): Promise<{ isStaged: boolean; isModified: boolean }> {
    const codes = await this.adapter.getStatusCodes(filePath);

    if (codes.some(code => code.index === DELETED || code.workingTree === DELETED)) {
      throw new DeletedFileError(
        `${filePath} is marked as deleted in git`,
        codes.map(code => code.index + code.workingTree).join('\n'),
      );
    }
    if (codes.length > 1) {
      throw new UnexpectedGitOutputError(
        `Expected at most one status line for ${filePath}, got ${codes.length}`,
        codes.map(code => code.index + code.workingTree).join('\n'),
      );
    }

    const [code] = codes;
    if (code === undefined) {
      return { isStaged: false, isModified: false };
    }
    return {
      isStaged: STAGED_CODES.has(code.index),
      isModified: code.workingTree === MODIFIED,
    };
  }
}

function state(classification: FileClassification): FileState {
  return { classification, isTracked: false, isStaged: false, isModified: false };
}
