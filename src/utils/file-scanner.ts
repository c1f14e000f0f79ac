import path from 'node:path';
import { glob } from 'glob';

export const DEFAULT_IGNORE_PATTERNS = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/.git/**',
  '**/coverage/**',
  '**/htmlcov/**',
  '**/.next/**',
  '**/out/**',
  '**/__pycache__/**',
  '**/.pytest_cache/**',
  '**/.mypy_cache/**',
  '**/.tox/**',
  '**/venv/**',
  '**/.venv/**',
  '**/site-packages/**',
  '**/*.egg-info/**',
  '**/*.d.ts',
];

export const SOURCE_EXTENSIONS = ['py', 'ts', 'tsx', 'js', 'jsx', 'mjs', 'cjs'];

export type SourceLanguage = 'python' | 'typescript' | 'javascript';

export interface ScanOptions {
  ignorePatterns?: string[];
  extensions?: string[];
}

/**
 * Find source files under `directory`. Returns sorted absolute paths.
 */
export async function scanDirectory(directory: string, options: ScanOptions = {}): Promise<string[]> {
  const absoluteDir = path.resolve(directory);
  const ignorePatterns = options.ignorePatterns ?? DEFAULT_IGNORE_PATTERNS;
  const extensions = options.extensions ?? SOURCE_EXTENSIONS;

  const pattern = `**/*.{${extensions.join(',')}}`;

  const files = await glob(pattern, {
    cwd: absoluteDir,
    absolute: true,
    ignore: ignorePatterns,
    nodir: true,
  });

  return files.sort();
}

/**
 * Root-relative POSIX path, the identity of a source unit everywhere else.
 */
export function toRelativePath(rootDir: string, filePath: string): string {
  return path.relative(path.resolve(rootDir), path.resolve(rootDir, filePath)).split(path.sep).join('/');
}

/**
 * Set of root-relative paths of every source file (tests included) under `rootDir`.
 */
export async function collectKnownFiles(rootDir: string, options: ScanOptions = {}): Promise<Set<string>> {
  const files = await scanDirectory(rootDir, options);
  return new Set(files.map((file) => toRelativePath(rootDir, file)));
}

export function getLanguageFromExtension(filePath: string): SourceLanguage | null {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.py':
      return 'python';
    case '.ts':
    case '.tsx':
    case '.mts':
    case '.cts':
      return 'typescript';
    case '.js':
    case '.jsx':
    case '.mjs':
    case '.cjs':
      return 'javascript';
    default:
      return null;
  }
}
