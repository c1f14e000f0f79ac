import { describe, expect, it, vi } from 'vitest';
import type { RepairContext } from '../../src/context/repair-context.js';
import { classifyFailure } from '../../src/failures/failure-classifier.js';
import type { TestFailure } from '../../src/failures/test-report.js';
import { LineRange } from '../../src/utils/line-range.js';

const context: RepairContext = {
  testFile: 'tests/test_users.py',
  testName: 'test_create',
  testSource: 'def test_create():\n    pass\n',
  testUnit: 'def test_create():\n    pass',
  unitRange: new LineRange(1, 3),
  testImports: [],
  dependencies: [],
  unresolvedModules: [],
};

function failure(exceptionKind: string, message: string): TestFailure {
  return {
    testFile: 'tests/test_users.py',
    testName: 'test_create',
    nodeId: 'tests/test_users.py::test_create',
    exceptionKind,
    message,
    rawTrace: '',
    lineNumber: null,
  };
}

describe('classifyFailure', () => {
  it('stops at a matching rule without calling the model', async () => {
    const modelCall = vi.fn();
    const result = await classifyFailure(failure('ImportError', "cannot import name 'make_user'"), context, {
      modelCall,
      maxContextChars: 1000,
    });

    expect(result).toEqual({ kind: 'test_mistake', reason: 'Missing import in test', confidence: 0.9, stage: 'rule' });
    expect(modelCall).not.toHaveBeenCalled();
  });

  it('asks the model when no rule matches and keeps its fix', async () => {
    const modelCall = vi
      .fn()
      .mockResolvedValue(
        '{"classification":"test_mistake","reason":"wrong expected value","fixed_code":"def test_create():\\n    assert True","confidence":0.75}'
      );
    const result = await classifyFailure(failure('AssertionError', 'assert 1 == 2'), context, {
      modelCall,
      maxContextChars: 1000,
    });

    expect(result).toEqual({
      kind: 'test_mistake',
      reason: 'wrong expected value',
      confidence: 0.75,
      stage: 'model',
      suggestedFix: 'def test_create():\n    assert True',
    });
    expect(modelCall).toHaveBeenCalledTimes(1);
  });

  it('passes deferred failures to the model', async () => {
    const modelCall = vi.fn().mockResolvedValue('{"classification":"code_defect","reason":"divides by count","confidence":0.8}');
    const result = await classifyFailure(failure('ZeroDivisionError', 'division by zero'), context, {
      modelCall,
      maxContextChars: 1000,
    });
    expect(result).toEqual({ kind: 'code_defect', reason: 'divides by count', confidence: 0.8, stage: 'model' });
  });

  it('uses the given rule table', async () => {
    const modelCall = vi.fn();
    const result = await classifyFailure(failure('AssertionError', 'flaky clock'), context, {
      modelCall,
      maxContextChars: 1000,
      rules: [{ id: 'clock', pattern: /flaky clock/, reason: 'Clock-dependent test' }],
    });
    expect(result.stage).toBe('rule');
    expect(result.reason).toBe('Clock-dependent test');
  });
});
