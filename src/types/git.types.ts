/**
 * Where the queried directory sits relative to a repository
 */
export type WorkTreeLocation = 'work-tree' | 'git-dir' | 'outside';

/**
 * Which pair of trees a diff compares
 */
export type DiffScope = 'staged' | 'unstaged';

/**
 * Two-character porcelain status of a file
 */
export interface StatusCode {
  /** First column: index against HEAD */
  index: string;
  /** Second column: work tree against index */
  workingTree: string;
}

/**
 * Line counts from `git diff --numstat`
 */
export interface DiffCounts {
  inserted: number;
  deleted: number;
  /** numstat printed `-` for both counts */
  binary: boolean;
}

/**
 * A commit date as an absolute and a relative string
 */
export interface HistoryDate {
  date: string;
  relative: string;
}

/**
 * Typed queries the status report needs from version control.
 *
 * Paths are relative to the directory the adapter was created for.
 */
export interface VersionControlAdapter {
  getWorkTreeLocation(): Promise<WorkTreeLocation>;
  isIgnored(filePath: string): Promise<boolean>;
  hasHistory(filePath: string): Promise<boolean>;
  /** One entry per porcelain line; the caller decides how many are acceptable */
  getStatusCodes(filePath: string): Promise<StatusCode[]>;
  getDiffCounts(filePath: string, scope: DiffScope): Promise<DiffCounts>;
  /** Lines in the index blob (staged) or the working file (unstaged) */
  countLines(filePath: string, scope: DiffScope): Promise<number>;
  /** Dates of commits that added the file, newest first */
  getCreationDates(filePath: string, followRenames: boolean): Promise<HistoryDate[]>;
  getLastModifiedDate(filePath: string): Promise<HistoryDate | null>;
  /** Author of every add or modify commit, newest first */
  getAuthors(filePath: string): Promise<string[]>;
  getRepositoryPath(filePath: string): Promise<string>;
}
