import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { TestFailure } from '../../src/failures/test-report.js';
import { CommandTestRunner, shellQuote } from '../../src/runner/command-runner.js';

function failure(nodeId: string): TestFailure {
  return {
    testFile: 'tests/test_a.py',
    testName: 'test_add[1]',
    nodeId,
    exceptionKind: 'AssertionError',
    message: '',
    rawTrace: '',
    lineNumber: null,
  };
}

describe('shellQuote', () => {
  it('wraps values in single quotes', () => {
    expect(shellQuote('tests/test_a.py::test_add')).toBe("'tests/test_a.py::test_add'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe('CommandTestRunner', () => {
  let rootDir: string;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'testmend-runner-'));
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('reads the report the command writes', async () => {
    const report = {
      exitcode: 1,
      tests: [{ nodeid: 'tests/test_a.py::test_add', outcome: 'failed', call: { longrepr: 'E       assert 1 == 2' } }],
    };
    fs.writeFileSync(path.join(rootDir, 'fixture.json'), JSON.stringify(report));
    fs.writeFileSync(path.join(rootDir, 'report.json'), 'stale');

    const runner = new CommandTestRunner({ rootDir, command: 'cp fixture.json report.json', reportPath: 'report.json' });
    expect(await runner.run()).toEqual({
      tests: [{ nodeId: 'tests/test_a.py::test_add', outcome: 'failed', longrepr: 'E       assert 1 == 2' }],
      collectionErrors: [],
      exitCode: 1,
    });
  });

  it('turns a missing report into a collection error', async () => {
    fs.writeFileSync(path.join(rootDir, 'report.json'), '{}');
    const runner = new CommandTestRunner({ rootDir, command: 'echo oops; exit 3', reportPath: 'report.json' });

    expect(await runner.run()).toEqual({
      tests: [],
      collectionErrors: ['Test command wrote no report (exit code 3)\noops'],
      exitCode: 3,
    });
  });

  it('rejects a report that is not JSON', async () => {
    const runner = new CommandTestRunner({ rootDir, command: 'echo nope > report.json', reportPath: 'report.json' });
    await expect(runner.run()).rejects.toThrow(/is not valid JSON/);
  });

  it('cannot run single tests without a template', async () => {
    const runner = new CommandTestRunner({ rootDir, command: 'true', reportPath: 'report.json' });
    expect(await runner.runSingle(failure('tests/test_a.py::test_add[1]'))).toBeNull();
  });

  it('fills the single-test template with quoted values', async () => {
    const passing = new CommandTestRunner({
      rootDir,
      command: 'true',
      reportPath: 'report.json',
      singleTestCommand: '[ {name} = test_add ] && [ {file} = tests/test_a.py ]',
    });
    expect(await passing.runSingle(failure('tests/test_a.py::test_add[1]'))).toEqual({ passed: true, output: '' });

    const failing = new CommandTestRunner({
      rootDir,
      command: 'true',
      reportPath: 'report.json',
      singleTestCommand: 'echo {nodeId}; exit 1',
    });
    expect(await failing.runSingle(failure('tests/test_a.py::test_add[1]'))).toEqual({
      passed: false,
      output: 'tests/test_a.py::test_add[1]',
    });
  });
});
