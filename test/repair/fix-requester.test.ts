import { describe, expect, it, vi } from 'vitest';
import type { RepairContext } from '../../src/context/repair-context.js';
import type { TestFailure } from '../../src/failures/test-report.js';
import { requestFix } from '../../src/repair/fix-requester.js';

const failure: TestFailure = {
  testFile: 'tests/test_calc.py',
  testName: 'test_add',
  nodeId: 'tests/test_calc.py::test_add',
  exceptionKind: 'AssertionError',
  message: 'assert 3 == 4',
  rawTrace: 'E       AssertionError: assert 3 == 4',
  lineNumber: 5,
};

const context: RepairContext = {
  testFile: 'tests/test_calc.py',
  testName: 'test_add',
  testSource: 'def test_add():\n    assert add(1, 2) == 4\n',
  testUnit: 'def test_add():\n    assert add(1, 2) == 4',
  unitRange: null,
  testImports: ['from app.calc import add'],
  dependencies: [],
  unresolvedModules: [],
};

describe('requestFix', () => {
  it('returns the fenced code from the response', async () => {
    const modelCall = vi.fn().mockResolvedValue('Here you go:\n```python\ndef test_add():\n    assert add(1, 2) == 3\n```');
    const proposal = await requestFix(failure, context, { modelCall, maxContextChars: 1000 });

    expect(proposal).toEqual({ ok: true, code: 'def test_add():\n    assert add(1, 2) == 3' });
    const [systemPrompt, userPrompt] = modelCall.mock.calls[0];
    expect(systemPrompt).toContain('repairing failing python tests');
    expect(userPrompt).toContain('from app.calc import add');
    expect(userPrompt).not.toContain('Previous Attempt');
  });

  it('includes the rejected attempt when retrying', async () => {
    const modelCall = vi.fn().mockResolvedValue('```python\ndef test_add():\n    assert True\n```');
    await requestFix(failure, context, {
      modelCall,
      maxContextChars: 1000,
      feedback: { previousFix: 'def test_add():\n    assert 1', rejection: 'test still fails' },
    });

    const [, userPrompt] = modelCall.mock.calls[0];
    expect(userPrompt).toContain('## Previous Attempt (rejected)');
    expect(userPrompt).toContain('**Why it was rejected:** test still fails');
  });

  it('rejects empty responses', async () => {
    const modelCall = vi.fn().mockResolvedValue('   ');
    expect(await requestFix(failure, context, { modelCall, maxContextChars: 1000 })).toEqual({
      ok: false,
      reason: 'Model returned no code',
    });
  });

  it('reports a failed call', async () => {
    const modelCall = vi.fn().mockRejectedValue(new Error('timeout'));
    expect(await requestFix(failure, context, { modelCall, maxContextChars: 1000 })).toEqual({
      ok: false,
      reason: 'Model call failed: timeout',
    });
  });
});
