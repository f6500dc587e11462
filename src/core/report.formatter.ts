import chalk from 'chalk';
import { HISTORY_VERBOSITY } from '../types/config.types';
import { HistoryDate } from '../types/git.types';
import {
  FileClassification,
  FileHistory,
  FileState,
  FileStatusReport,
  ScopeSummary,
} from '../types/status.types';

/**
 * Render a report as terminal lines.
 *
 * Verbosity 0 prints the classification only, 1 adds staged and unstaged
 * summaries, 2 and above add history.
 */
export function formatReport(report: FileStatusReport, verbosity: number): string[] {
  const lines = [`${chalk.bold(report.repositoryPath ?? report.path)}: ${describeState(report.state)}`];

  if (verbosity < 1) {
    return lines;
  }

  if (report.staged) {
    lines.push(`  ${chalk.green('Staged:')}   ${formatSummary(report.staged)}`);
  }
  if (report.unstaged) {
    lines.push(`  ${chalk.red('Unstaged:')} ${formatSummary(report.unstaged)}`);
  }

  if (verbosity >= HISTORY_VERBOSITY && report.history) {
    lines.push(...formatHistory(report.history));
  }

  return lines;
}

export function describeState(state: FileState): string {
  switch (state.classification) {
    case FileClassification.OutsideRepo:
      return chalk.gray('not in a git repository');
    case FileClassification.InternalRepoFile:
      return chalk.gray('internal git repository file');
    case FileClassification.Ignored:
      return chalk.gray('ignored');
    case FileClassification.Untracked:
      return chalk.yellow('untracked');
    case FileClassification.TrackedNoChanges:
      return chalk.green('tracked, no changes');
    case FileClassification.NewWithChanges:
      return chalk.cyan(`new file, ${describeChanges(state)}`);
    case FileClassification.TrackedWithChanges:
      return chalk.yellow(`tracked, ${describeChanges(state)}`);
  }
}

function describeChanges(state: FileState): string {
  if (state.isStaged && state.isModified) {
    return 'staged and unstaged changes';
  }
  return state.isStaged ? 'staged changes' : 'unstaged changes';
}

/**
 * `Size change: +4% Modified lines: 4% (622 lines total)`
 */
export function formatSummary(summary: ScopeSummary): string {
  if (summary.binary) {
    return 'binary file changed';
  }

  const parts: string[] = [];
  if (summary.sizeChangePercent !== undefined) {
    const sign = summary.sizeChangePercent > 0 ? '+' : '';
    parts.push(`Size change: ${sign}${summary.sizeChangePercent}%`);
  }
  if (summary.modifiedLinesPercent !== undefined) {
    parts.push(`Modified lines: ${summary.modifiedLinesPercent}%`);
  }

  const total = `${summary.totalLines} ${summary.totalLines === 1 ? 'line' : 'lines'} total`;
  parts.push(summary.allNew ? `(${total}, all new)` : `(${total})`);

  return parts.join(' ');
}

function formatHistory(history: FileHistory): string[] {
  const lines: string[] = [];

  if (history.created) {
    const warning = history.createdRenameWarning ? ` ${chalk.yellow('(may be the date of a rename)')}` : '';
    lines.push(`  Created:         ${formatDate(history.created)}${warning}`);
  }
  if (history.lastModified) {
    lines.push(`  Last modified:   ${formatDate(history.lastModified)}`);
  }
  if (history.topContributor) {
    const { name, commits } = history.topContributor;
    lines.push(`  Top contributor: ${name} (${commits} ${commits === 1 ? 'commit' : 'commits'})`);
  }

  return lines;
}

function formatDate(entry: HistoryDate): string {
  return `${entry.date} (${entry.relative})`;
}
