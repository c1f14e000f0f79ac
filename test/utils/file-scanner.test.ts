import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  collectKnownFiles,
  getLanguageFromExtension,
  scanDirectory,
  toRelativePath,
} from '../../src/utils/file-scanner.js';

describe('getLanguageFromExtension', () => {
  it('.py → python', () => {
    expect(getLanguageFromExtension('app/models.py')).toBe('python');
  });

  it('.ts → typescript', () => {
    expect(getLanguageFromExtension('src/index.ts')).toBe('typescript');
  });

  it('.tsx → typescript', () => {
    expect(getLanguageFromExtension('src/App.tsx')).toBe('typescript');
  });

  it('.mjs → javascript', () => {
    expect(getLanguageFromExtension('src/index.mjs')).toBe('javascript');
  });

  it('unknown extension → null', () => {
    expect(getLanguageFromExtension('README.md')).toBeNull();
  });
});

describe('toRelativePath', () => {
  it('returns POSIX paths relative to the root', () => {
    expect(toRelativePath('/project', '/project/app/models.py')).toBe('app/models.py');
    expect(toRelativePath('/project', 'app/models.py')).toBe('app/models.py');
  });
});

describe('scanDirectory', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'testmend-scan-'));
    const write = (rel: string) => {
      fs.mkdirSync(path.dirname(path.join(tmpDir, rel)), { recursive: true });
      fs.writeFileSync(path.join(tmpDir, rel), '');
    };
    write('app/models.py');
    write('app/__pycache__/models.cpython-312.py');
    write('src/index.ts');
    write('src/types.d.ts');
    write('node_modules/pkg/index.js');
    write('.venv/lib/site.py');
    write('README.md');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('finds sources and skips ignored directories', async () => {
    const files = await scanDirectory(tmpDir);
    expect(files.map((f) => toRelativePath(tmpDir, f))).toEqual(['app/models.py', 'src/index.ts']);
  });

  it('returns sorted absolute paths', async () => {
    const files = await scanDirectory(tmpDir);
    for (const file of files) expect(path.isAbsolute(file)).toBe(true);
    expect(files).toEqual([...files].sort());
  });

  it('honours custom ignore patterns', async () => {
    const files = await scanDirectory(tmpDir, { ignorePatterns: ['**/app/**', '**/node_modules/**', '**/.venv/**', '**/*.d.ts'] });
    expect(files.map((f) => toRelativePath(tmpDir, f))).toEqual(['src/index.ts']);
  });

  it('collects root-relative known files', async () => {
    const known = await collectKnownFiles(tmpDir);
    expect(known.has('app/models.py')).toBe(true);
    expect(known.has('src/index.ts')).toBe(true);
    expect(known.size).toBe(2);
  });
});
