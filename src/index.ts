/**
 * git-file-status
 *
 * Reports one file's git status: classification, staged and unstaged
 * change summaries and, on request, its history.
 */

export * from './commands/status.command';
export * from './core/change.summarizer';
export * from './core/filesystem.service';
export * from './core/git.service';
export * from './core/history.service';
export * from './core/report.formatter';
export * from './core/status.classifier';
export * from './types/config.types';
export * from './types/git.types';
export * from './types/status.types';
export * from './errors/base.error';
export * from './errors/filesystem.error';
export * from './errors/git.error';
export * from './errors/usage.error';
