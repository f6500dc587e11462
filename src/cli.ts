#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { join } from 'path';
import { StatusCommand } from './commands/status.command';
import { BaseError } from './errors/base.error';
import { UnexpectedGitOutputError } from './errors/git.error';
import { UsageError } from './errors/usage.error';
import { CliOptionsSchema, PackageJsonSchema } from './types/config.schema';
import {
  DEBUG_VERBOSITY,
  DEFAULT_VERBOSITY,
  ExitCode,
  FALLBACK_VERSION,
  MANUAL_PATH,
} from './types/config.types';
import { logger, LogLevel } from './utils/logger.service';
import { showInPager } from './utils/pager';

export const USAGE = 'Usage: git-file-status [-v | -q]... [--no-color] [--] <file>';

const PACKAGE_ROOT = join(__dirname, '..');

/**
 * Net verbosity: default level plus -v count minus -q count, floored at 0
 */
export function resolveVerbosity(verbose: number, quiet: number): number {
  return Math.max(0, DEFAULT_VERBOSITY + verbose - quiet);
}

function increase(_value: string, previous: number): number {
  return previous + 1;
}

export function createProgram(version: string): Command {
  return new Command()
    .name('git-file-status')
    .description("Summarize a single file's git status")
    .usage('[options] [--] <file>')
    .argument('[file]', 'file to report on')
    .helpOption(false)
    .option('-v, --verbose', 'show more detail (repeatable)', increase, 0)
    .option('-q, --quiet', 'show less detail (repeatable)', increase, 0)
    .option('--no-color', 'disable coloured output')
    .option('-h, --usage', 'print short usage')
    .option('--help', 'show the full manual')
    .version(version, '-V, --version', 'output the version number')
    .allowExcessArguments(false)
    .exitOverride();
}

function readVersion(): string {
  try {
    const packageJson = PackageJsonSchema.safeParse(
      JSON.parse(readFileSync(join(PACKAGE_ROOT, 'package.json'), 'utf-8')),
    );
    if (packageJson.success) {
      return packageJson.data.version;
    }
  } catch (error) {
    logger.debug(`Could not read package.json: ${error instanceof Error ? error.message : String(error)}`);
  }
  logger.warn('Could not read package.json for version, using fallback');
  return FALLBACK_VERSION;
}

function showManual(): void {
  showInPager(readFileSync(join(PACKAGE_ROOT, MANUAL_PATH), 'utf-8'));
}

/**
 * git output quoted under an error, one indented line per output line
 */
export function formatGitOutput(output: string): string {
  const lines = output.split('\n').filter(line => line.length > 0);
  return ['git printed:', ...(lines.length > 0 ? lines : ['(nothing)'])].join('\n  ');
}

/**
 * Main CLI entry point; resolves to the process exit code
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const program = createProgram(readVersion());

  try {
    program.parse(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed the message or the version
      return error.exitCode === 0 ? ExitCode.SUCCESS : ExitCode.USAGE;
    }
    throw error;
  }

  const options = CliOptionsSchema.parse(program.opts());

  if (!options.color) {
    chalk.level = 0;
  }
  if (options.help) {
    showManual();
    return ExitCode.SUCCESS;
  }
  if (options.usage) {
    logger.info(USAGE);
    return ExitCode.SUCCESS;
  }

  const verbosity = resolveVerbosity(options.verbose, options.quiet);
  logger.setLevel(verbosity >= DEBUG_VERBOSITY ? LogLevel.DEBUG : LogLevel.INFO);

  const result = await new StatusCommand().execute(program.args[0], { verbosity });

  if (!result.success) {
    logger.error(result.message || 'Failed to report file status');
    if (result.error instanceof UnexpectedGitOutputError) {
      console.error(formatGitOutput(result.error.output));
    }
    if (result.error instanceof BaseError && result.error.details) {
      logger.debug(result.error.details);
    }
    if (result.error instanceof UsageError) {
      console.error(USAGE);
    }
  }

  return result.exitCode;
}

/**
 * Last-resort handler for errors thrown outside a command
 */
function handleError(error: unknown): void {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = ExitCode.FATAL;
}

if (require.main === module) {
  main()
    .then(exitCode => {
      process.exitCode = exitCode;
    })
    .catch(handleError);
}
