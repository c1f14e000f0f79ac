import fs from 'node:fs/promises';
import path from 'node:path';
import type { Command } from '@oclif/core';
import chalk from 'chalk';
import { type CoverageMap, readCoverageReport } from '../../coverage/coverage-report.js';
import { type SymbolIndex, buildSymbolIndex } from '../../indexer/symbol-indexer.js';
import { DEFAULT_IGNORE_PATTERNS } from '../../utils/file-scanner.js';
import { getErrorMessage } from '../../utils/helpers.js';

/**
 * Resolve a directory argument, failing the command when it is missing.
 */
export async function resolveSourceRoot(directory: string, command: Command): Promise<string> {
  const absolute = path.resolve(directory);
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(absolute)).isDirectory();
  } catch {
    command.error(chalk.red(`Directory "${absolute}" does not exist`));
  }
  if (!isDirectory) {
    command.error(chalk.red(`"${absolute}" is not a directory`));
  }
  return absolute;
}

export interface LoadIndexOptions {
  exclude?: string[];
  verbose?: boolean;
  includeTests?: boolean;
  /** Suppress progress output (JSON mode). */
  quiet?: boolean;
}

export async function loadSymbolIndex(rootDir: string, command: Command, options: LoadIndexOptions = {}): Promise<SymbolIndex> {
  if (!options.quiet) command.log(chalk.blue('Indexing source files...'));
  const index = await buildSymbolIndex(rootDir, {
    ignorePatterns: [...DEFAULT_IGNORE_PATTERNS, ...(options.exclude ?? [])],
    log: options.quiet ? { log: () => {}, warn: (message) => command.warn(message) } : command,
    ...(options.verbose !== undefined && { verbose: options.verbose }),
    ...(options.includeTests !== undefined && { includeTests: options.includeTests }),
  });
  if (!options.quiet) {
    command.log(
      chalk.green(`Indexed ${index.files.length} file(s): ${index.symbols.length} symbol(s), ${index.routes.length} route(s)`)
    );
    if (index.skipped.length > 0) {
      command.log(chalk.yellow(`Skipped ${index.skipped.length} file(s)`));
    }
  }
  return index;
}

export function loadCoverage(reportPath: string, rootDir: string, command: Command): CoverageMap {
  try {
    return readCoverageReport(path.resolve(reportPath), rootDir);
  } catch (error) {
    return command.error(chalk.red(`Cannot read coverage report: ${getErrorMessage(error)}`));
  }
}
