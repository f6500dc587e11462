import { UnexpectedGitOutputError } from '../errors/git.error';
import { HistoryDate, VersionControlAdapter } from '../types/git.types';
import { Contributor, FileHistory } from '../types/status.types';
import { logger } from '../utils/logger.service';

/**
 * Creation date, last change and main author of a file
 */
export class HistoryService {
  constructor(private readonly adapter: VersionControlAdapter) {}

  public async lookup(filePath: string): Promise<FileHistory> {
    const { created, renameWarning } = await this.findCreation(filePath);
    const lastModified = await this.adapter.getLastModifiedDate(filePath);
    const topContributor = rankContributors(await this.adapter.getAuthors(filePath))[0];

    const history: FileHistory = { createdRenameWarning: renameWarning };
    if (created) {
      history.created = created;
    }
    if (lastModified) {
      history.lastModified = lastModified;
    }
    if (topContributor) {
      history.topContributor = topContributor;
    }
    return history;
  }

  /**
   * Following renames can report several add commits when git pairs the
   * file with an unrelated one; fall back to the current name only.
   */
  private async findCreation(
    filePath: string,
  ): Promise<{ created?: HistoryDate; renameWarning: boolean }> {
    const followed = await this.adapter.getCreationDates(filePath, true);
    if (followed.length <= 1) {
      return { created: followed[0], renameWarning: false };
    }

    logger.debug(`${followed.length} add commits when following renames, retrying without --follow`);
    const direct = await this.adapter.getCreationDates(filePath, false);
    if (direct.length > 1) {
      throw new UnexpectedGitOutputError(
        `Found ${direct.length} commits adding ${filePath}`,
        direct.map(entry => `${entry.date} (${entry.relative})`).join('\n'),
      );
    }
    return { created: direct[0], renameWarning: true };
  }
}

/**
 * Authors by number of commits, most first.
 *
 * Equal counts keep the order in which authors first appear in the input
 * (newest commit first); that order is not part of the contract.
 */
export function rankContributors(authors: string[]): Contributor[] {
  const counts = new Map<string, number>();
  for (const author of authors) {
    counts.set(author, (counts.get(author) ?? 0) + 1);
  }
  return Array.from(counts, ([name, commits]) => ({ name, commits })).sort(
    (a, b) => b.commits - a.commits,
  );
}
