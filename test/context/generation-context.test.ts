import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type ContextBundle, buildContextBundle, renderContextBundle } from '../../src/context/generation-context.js';
import type { CodeSymbol } from '../../src/parser/front-end.js';

function symbol(file: string, qualifiedName: string): CodeSymbol {
  return { name: qualifiedName, qualifiedName, file, kind: 'function', startLine: 1, endLine: 1, argCount: 0, isAsync: false };
}

function bundleOf(files: Array<[string, string]>): ContextBundle {
  return { targetNames: new Set(), files: new Map(files) };
}

describe('buildContextBundle', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'testmend-bundle-'));
    fs.mkdirSync(path.join(tmpDir, 'app'));
    fs.writeFileSync(path.join(tmpDir, 'app/a.py'), 'def f():\n    pass\n');
    fs.writeFileSync(path.join(tmpDir, 'app/b.py'), 'def g():\n    pass\n');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads each containing file once, in first-seen order', () => {
    const bundle = buildContextBundle(
      tmpDir,
      [symbol('app/b.py', 'g'), symbol('app/a.py', 'f'), symbol('app/b.py', 'h')],
      new Set(['app/a.py', 'app/b.py'])
    );
    expect([...bundle.files.keys()]).toEqual(['app/b.py', 'app/a.py']);
    expect(bundle.files.get('app/a.py')).toBe('def f():\n    pass\n');
    expect([...bundle.targetNames]).toEqual(['g', 'f', 'h']);
  });

  it('appends the local modules a target file imports', () => {
    fs.writeFileSync(path.join(tmpDir, 'app/helpers.py'), 'RATE = 2\n');
    fs.writeFileSync(path.join(tmpDir, 'app/calc.py'), 'import os\nfrom app.helpers import RATE\nfrom app import a\n\n\ndef total(x):\n    return x * RATE\n');
    const knownFiles = new Set(['app/a.py', 'app/b.py', 'app/calc.py', 'app/helpers.py']);

    const bundle = buildContextBundle(tmpDir, [symbol('app/calc.py', 'total')], knownFiles);

    expect([...bundle.files.keys()]).toEqual(['app/calc.py', 'app/helpers.py', 'app/a.py']);
    expect(bundle.files.get('app/helpers.py')).toBe('RATE = 2\n');
  });

  it('does not repeat a dependency that is also a target file', () => {
    fs.writeFileSync(path.join(tmpDir, 'app/b.py'), 'from app.a import f\n\n\ndef g():\n    return f()\n');

    const bundle = buildContextBundle(tmpDir, [symbol('app/a.py', 'f'), symbol('app/b.py', 'g')], new Set(['app/a.py', 'app/b.py']));

    expect([...bundle.files.keys()]).toEqual(['app/a.py', 'app/b.py']);
  });
});

describe('renderContextBundle', () => {
  it('labels each file with its comment prefix', () => {
    const rendered = renderContextBundle(
      bundleOf([
        ['app/a.py', 'x = 1'],
        ['src/b.ts', 'const y = 2;'],
      ]),
      1000
    );
    expect(rendered.text).toBe('# File: app/a.py\nx = 1\n\n// File: src/b.ts\nconst y = 2;');
    expect(rendered.includedFiles).toEqual(['app/a.py', 'src/b.ts']);
    expect(rendered.truncated).toBe(false);
  });

  it('keeps whole files and omits the ones that no longer fit', () => {
    // Each block is "# File: app/x.py\n" (17 chars) + 10 chars = 27
    const rendered = renderContextBundle(
      bundleOf([
        ['app/a.py', 'a'.repeat(10)],
        ['app/b.py', 'b'.repeat(10)],
        ['app/c.py', 'c'.repeat(10)],
      ]),
      60
    );
    expect(rendered.includedFiles).toEqual(['app/a.py', 'app/b.py']);
    expect(rendered.omittedFiles).toEqual(['app/c.py']);
    expect(rendered.truncated).toBe(true);
    expect(rendered.text.length).toBe(56);
  });

  it('skips a file that does not fit and keeps trying later ones', () => {
    const rendered = renderContextBundle(
      bundleOf([
        ['app/a.py', 'a'.repeat(10)],
        ['app/big.py', 'x'.repeat(500)],
        ['app/c.py', 'c'.repeat(10)],
      ]),
      200
    );
    expect(rendered.includedFiles).toEqual(['app/a.py', 'app/c.py']);
    expect(rendered.omittedFiles).toEqual(['app/big.py']);
    expect(rendered.truncated).toBe(true);
    expect(rendered.text).toBe(`# File: app/a.py\n${'a'.repeat(10)}\n\n# File: app/c.py\n${'c'.repeat(10)}`);
  });

  it('cuts only a first file that alone exceeds the budget', () => {
    const rendered = renderContextBundle(
      bundleOf([
        ['app/a.py', 'a'.repeat(100)],
        ['app/b.py', 'b'],
      ]),
      50
    );
    expect(rendered.text.length).toBe(50);
    expect(rendered.text.endsWith('\n# ... truncated')).toBe(true);
    expect(rendered.text.startsWith('# File: app/a.py\naaaa')).toBe(true);
    expect(rendered.includedFiles).toEqual(['app/a.py']);
    expect(rendered.omittedFiles).toEqual(['app/b.py']);
  });
});
