import fs from 'node:fs';
import chalk from 'chalk';
import { getFrontEnd } from '../parser/front-ends.js';
import type { CodeSymbol, Route } from '../parser/front-end.js';
import { DEFAULT_IGNORE_PATTERNS, scanDirectory, toRelativePath } from '../utils/file-scanner.js';
import { getErrorMessage } from '../utils/helpers.js';
import { LineRange } from '../utils/line-range.js';
import { type LogSink, silentSink } from '../utils/log-sink.js';

export interface SkippedFile {
  file: string;
  reason: string;
}

/**
 * Flat table of everything defined under a root, rebuilt from scratch on
 * every pass and handed to the stages that need it.
 */
export interface SymbolIndex {
  rootDir: string;
  files: string[];
  symbols: CodeSymbol[];
  routes: Route[];
  skipped: SkippedFile[];
}

export interface IndexOptions {
  ignorePatterns?: string[];
  /** Index test files too. Off by default: tests are not generation targets. */
  includeTests?: boolean;
  log?: LogSink;
  verbose?: boolean;
}

export interface SourceInput {
  file: string;
  content: string;
}

/**
 * Pure function that indexes already-loaded sources.
 * This enables testing without file I/O.
 */
export function indexSources(rootDir: string, sources: SourceInput[], log: LogSink = silentSink): SymbolIndex {
  const index: SymbolIndex = { rootDir, files: [], symbols: [], routes: [], skipped: [] };

  for (const { file, content } of sources) {
    const frontEnd = getFrontEnd(file);
    if (!frontEnd) {
      index.skipped.push({ file, reason: 'unsupported extension' });
      continue;
    }

    let reason: string | null = null;
    try {
      const parsed = frontEnd.parseFile(content, file);
      if (parsed.syntaxError) {
        reason = `syntax error at line ${parsed.syntaxError.line}:${parsed.syntaxError.column}`;
      } else {
        index.files.push(file);
        index.symbols.push(...frontEnd.extractSymbols(parsed.root, file));
        index.routes.push(...frontEnd.extractRoutes(parsed.root, file));
      }
    } catch (error) {
      reason = getErrorMessage(error);
    }

    if (reason !== null) {
      index.skipped.push({ file, reason });
      log.warn(chalk.yellow(`Skipping ${file}: ${reason}`));
    }
  }

  return index;
}

export async function buildSymbolIndex(rootDir: string, options: IndexOptions = {}): Promise<SymbolIndex> {
  const log = options.log ?? silentSink;
  const absolute = await scanDirectory(rootDir, {
    ignorePatterns: options.ignorePatterns ?? DEFAULT_IGNORE_PATTERNS,
  });

  const sources: SourceInput[] = [];
  const unreadable: SkippedFile[] = [];
  for (const filePath of absolute) {
    const file = toRelativePath(rootDir, filePath);
    if (!options.includeTests && getFrontEnd(file)?.isTestFile(file)) continue;
    try {
      sources.push({ file, content: fs.readFileSync(filePath, 'utf-8') });
    } catch (error) {
      const reason = getErrorMessage(error);
      unreadable.push({ file, reason });
      log.warn(chalk.yellow(`Skipping ${file}: ${reason}`));
    }
  }

  if (options.verbose) {
    log.log(chalk.gray(`Indexing ${sources.length} source files under ${rootDir}`));
  }

  const index = indexSources(rootDir, sources, log);
  index.skipped.push(...unreadable);
  return index;
}

export function symbolKey(symbol: Pick<CodeSymbol, 'file' | 'qualifiedName'>): string {
  return `${symbol.file}::${symbol.qualifiedName}`;
}

export function symbolRange(symbol: Pick<CodeSymbol, 'startLine' | 'endLine'>): LineRange {
  return LineRange.fromInclusive(symbol.startLine, symbol.endLine);
}

/**
 * Symbols whose bare or qualified name equals `name`, optionally within one file.
 */
export function findSymbols(index: SymbolIndex, name: string, file?: string): CodeSymbol[] {
  return index.symbols.filter(
    (s) => (s.name === name || s.qualifiedName === name) && (file === undefined || s.file === file)
  );
}

export function getSymbol(index: SymbolIndex, file: string, qualifiedName: string): CodeSymbol | undefined {
  return index.symbols.find((s) => s.file === file && s.qualifiedName === qualifiedName);
}

export interface TargetResolution {
  resolved: CodeSymbol[];
  ambiguous: Array<{ name: string; candidates: CodeSymbol[] }>;
  missing: string[];
}

/**
 * Resolve user-supplied names. A `file::name` reference is exact; a bare name
 * defined in more than one place is reported, not guessed.
 */
export function resolveTargetNames(index: SymbolIndex, names: string[]): TargetResolution {
  const result: TargetResolution = { resolved: [], ambiguous: [], missing: [] };

  for (const reference of names) {
    const separator = reference.lastIndexOf('::');
    const file = separator >= 0 ? reference.slice(0, separator) : undefined;
    const name = separator >= 0 ? reference.slice(separator + 2) : reference;

    const exact = file !== undefined ? getSymbol(index, file, name) : undefined;
    const candidates = exact ? [exact] : findSymbols(index, name, file);

    if (candidates.length === 0) {
      result.missing.push(reference);
    } else if (candidates.length > 1) {
      result.ambiguous.push({ name: reference, candidates });
    } else {
      result.resolved.push(candidates[0]);
    }
  }

  return result;
}
