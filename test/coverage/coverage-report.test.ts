import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  detectCoverageFormat,
  parseCoberturaXml,
  parseIstanbulJson,
  readCoverageReport,
} from '../../src/coverage/coverage-report.js';

const coberturaXml = `<?xml version="1.0" ?>
<coverage version="7.4" line-rate="0.5">
  <sources>
    <source>/work/project</source>
  </sources>
  <packages>
    <package name="app">
      <classes>
        <class name="users.py" filename="app/users.py">
          <methods/>
          <lines>
            <line number="1" hits="1"/>
            <line number="2" hits="0"/>
            <line number="5" hits="0"/>
            <line number="6" hits="3"/>
          </lines>
        </class>
        <class name="empty.py" filename="app/empty.py">
          <methods/>
          <lines/>
        </class>
      </classes>
    </package>
  </packages>
</coverage>
`;

describe('parseCoberturaXml', () => {
  it('splits lines into covered and uncovered per file', () => {
    const map = parseCoberturaXml(coberturaXml, '/work/project');
    expect([...map.keys()]).toEqual(['app/users.py', 'app/empty.py']);
    const users = map.get('app/users.py');
    expect([...(users?.covered ?? [])].sort((a, b) => a - b)).toEqual([1, 6]);
    expect([...(users?.uncovered ?? [])].sort((a, b) => a - b)).toEqual([2, 5]);
    expect(map.get('app/empty.py')?.uncovered.size).toBe(0);
  });

  it('counts a line as covered when any class entry hit it', () => {
    const xml = `<coverage>
  <packages>
    <package name="app">
      <classes>
        <class filename="app/a.py"><lines><line number="3" hits="0"/></lines></class>
        <class filename="app/a.py"><lines><line number="3" hits="2"/><line number="4" hits="0"/></lines></class>
      </classes>
    </package>
  </packages>
</coverage>`;
    const entry = parseCoberturaXml(xml, '/work/project').get('app/a.py');
    expect([...(entry?.covered ?? [])]).toEqual([3]);
    expect([...(entry?.uncovered ?? [])]).toEqual([4]);
  });

  it('rejects documents that are not Cobertura', () => {
    expect(() => parseCoberturaXml('<report/>', '/work/project')).toThrow('Invalid Cobertura report (coverage: Required)');
  });
});

describe('parseIstanbulJson', () => {
  it('takes the highest hit count per statement start line', () => {
    const map = parseIstanbulJson(
      {
        '/work/project/src/a.ts': {
          path: '/work/project/src/a.ts',
          statementMap: {
            '0': { start: { line: 1, column: 0 }, end: { line: 1, column: 10 } },
            '1': { start: { line: 2, column: 0 }, end: { line: 2, column: 5 } },
            '2': { start: { line: 2, column: 6 }, end: { line: 2, column: 12 } },
            '3': { start: { line: 4, column: 2 }, end: { line: 4, column: 9 } },
          },
          s: { '0': 1, '1': 0, '2': 2, '3': 0 },
        },
      },
      '/work/project'
    );
    const entry = map.get('src/a.ts');
    expect([...(entry?.covered ?? [])].sort((a, b) => a - b)).toEqual([1, 2]);
    expect([...(entry?.uncovered ?? [])]).toEqual([4]);
  });

  it('rejects malformed reports', () => {
    expect(() => parseIstanbulJson({ 'src/a.ts': { statementMap: 5 } }, '/work/project')).toThrow(/^Invalid Istanbul report/);
  });
});

describe('detectCoverageFormat', () => {
  it('uses the extension, then the content', () => {
    expect(detectCoverageFormat('coverage.xml', '<?xml version="1.0" ?>')).toBe('cobertura');
    expect(detectCoverageFormat('coverage-final.json', '')).toBe('istanbul');
    expect(detectCoverageFormat('report.txt', '  {"a": 1}')).toBe('istanbul');
  });
});

describe('readCoverageReport', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'testmend-coverage-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads a Cobertura file', () => {
    const reportPath = path.join(tmpDir, 'coverage.xml');
    fs.writeFileSync(reportPath, coberturaXml);
    expect([...readCoverageReport(reportPath, '/work/project').keys()]).toEqual(['app/users.py', 'app/empty.py']);
  });

  it('wraps invalid JSON', () => {
    const reportPath = path.join(tmpDir, 'coverage-final.json');
    fs.writeFileSync(reportPath, '{oops');
    expect(() => readCoverageReport(reportPath, tmpDir)).toThrow(`Coverage report ${reportPath} is not valid JSON`);
  });
});
