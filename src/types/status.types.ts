import type { HistoryDate } from './git.types';

/**
 * Classification of a single file
 */
export enum FileClassification {
  OutsideRepo = 'outside-repo',
  InternalRepoFile = 'internal-repo-file',
  Ignored = 'ignored',
  Untracked = 'untracked',
  TrackedNoChanges = 'tracked-no-changes',
  NewWithChanges = 'new-with-changes',
  TrackedWithChanges = 'tracked-with-changes',
}

/**
 * Classification plus the flags it was derived from
 */
export interface FileState {
  classification: FileClassification;
  isTracked: boolean;
  isStaged: boolean;
  isModified: boolean;
}

export interface ChangeStats {
  inserted: number;
  deleted: number;
  totalLinesAfter: number;
}

export interface ChangeSummary {
  /** Undefined when there was nothing before the change */
  sizeChangePercent?: number;
  /** Undefined when the file is empty after the change */
  modifiedLinesPercent?: number;
  totalLines: number;
  allNew: boolean;
}

/**
 * Summary for one diff scope; binary diffs carry no line counts
 */
export type ScopeSummary = { binary: true } | ({ binary: false } & ChangeSummary);

export interface Contributor {
  name: string;
  commits: number;
}

export interface FileHistory {
  created?: HistoryDate;
  /** Creation date came from the lookup that does not follow renames */
  createdRenameWarning: boolean;
  lastModified?: HistoryDate;
  topContributor?: Contributor;
}

/**
 * Everything printed for one invocation
 */
export interface FileStatusReport {
  /** Path as given on the command line */
  path: string;
  /** Path relative to the repository root, when inside a work tree */
  repositoryPath?: string;
  state: FileState;
  staged?: ScopeSummary;
  unstaged?: ScopeSummary;
  history?: FileHistory;
}
