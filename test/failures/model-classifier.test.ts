import { describe, expect, it, vi } from 'vitest';
import type { RepairContext } from '../../src/context/repair-context.js';
import {
  UNRESOLVED_CONFIDENCE_FACTOR,
  classifyWithModel,
  parseModelVerdict,
} from '../../src/failures/model-classifier.js';
import type { TestFailure } from '../../src/failures/test-report.js';
import { LineRange } from '../../src/utils/line-range.js';

const failure: TestFailure = {
  testFile: 'tests/test_users.py',
  testName: 'test_create',
  nodeId: 'tests/test_users.py::test_create',
  exceptionKind: 'AssertionError',
  message: "assert 'x' == 'y'",
  rawTrace: "E       AssertionError: assert 'x' == 'y'",
  lineNumber: 7,
};

function context(overrides: Partial<RepairContext> = {}): RepairContext {
  return {
    testFile: 'tests/test_users.py',
    testName: 'test_create',
    testSource: "def test_create():\n    assert create_user('x') == 'y'\n",
    testUnit: "def test_create():\n    assert create_user('x') == 'y'",
    unitRange: new LineRange(1, 3),
    testImports: [],
    dependencies: [],
    unresolvedModules: [],
    ...overrides,
  };
}

describe('parseModelVerdict', () => {
  it('reads a fenced verdict with a fix', () => {
    const response =
      '```json\n{"classification":"test_mistake","reason":"bad expectation","fixed_code":"def test_a():\\n    assert True\\n","confidence":0.8}\n```';
    expect(parseModelVerdict(response)).toEqual({
      kind: 'test_mistake',
      reason: 'bad expectation',
      confidence: 0.8,
      fixedCode: 'def test_a():\n    assert True',
    });
  });

  it('maps code_bug to code_defect', () => {
    expect(parseModelVerdict('{"classification":"code_bug","reason":"off by one","confidence":0.7}')).toEqual({
      kind: 'code_defect',
      reason: 'off by one',
      confidence: 0.7,
    });
  });

  it('defaults and clamps confidence', () => {
    expect(parseModelVerdict('{"classification":"code_defect","reason":"r"}').confidence).toBe(0.5);
    expect(parseModelVerdict('{"classification":"code_defect","reason":"r","confidence":1.7}').confidence).toBe(1);
    expect(parseModelVerdict('{"classification":"code_defect","reason":"r","confidence":-2}').confidence).toBe(0);
  });

  it('drops an empty fix', () => {
    expect(parseModelVerdict('{"classification":"test_mistake","reason":"r","fixed_code":"   ","confidence":0.9}')).toStrictEqual({
      kind: 'test_mistake',
      reason: 'r',
      confidence: 0.9,
    });
    expect(parseModelVerdict('{"classification":"test_mistake","reason":"r","fixed_code":null}')).not.toHaveProperty('fixedCode');
  });

  it('treats anything else as malformed', () => {
    const malformed = { kind: 'unknown', reason: 'Malformed model response', confidence: 0 };
    expect(parseModelVerdict('I think the test is wrong.')).toEqual(malformed);
    expect(parseModelVerdict('{"classification":"maybe","reason":"r"}')).toEqual(malformed);
  });
});

describe('classifyWithModel', () => {
  const options = { maxContextChars: 1000 };

  it('sends the failure to the model and returns its verdict', async () => {
    const modelCall = vi.fn().mockResolvedValue('{"classification":"code_defect","reason":"wrong result","confidence":0.9}');
    const verdict = await classifyWithModel(failure, context(), { ...options, modelCall });

    expect(verdict).toEqual({ kind: 'code_defect', reason: 'wrong result', confidence: 0.9 });
    expect(modelCall).toHaveBeenCalledTimes(1);
    const [, userPrompt] = modelCall.mock.calls[0];
    expect(userPrompt).toContain('**Test Name:** test_create');
    expect(userPrompt).toContain("**Message:** assert 'x' == 'y'");
  });

  it('lowers confidence when modules could not be resolved', async () => {
    const modelCall = vi.fn().mockResolvedValue('{"classification":"code_defect","reason":"r","confidence":0.5}');
    const verdict = await classifyWithModel(failure, context({ unresolvedModules: ['app.missing'] }), {
      ...options,
      modelCall,
    });
    expect(verdict.confidence).toBeCloseTo(0.5 * UNRESOLVED_CONFIDENCE_FACTOR);
  });

  it('leaves unknown verdicts untouched', async () => {
    const modelCall = vi.fn().mockResolvedValue('no idea');
    const verdict = await classifyWithModel(failure, context({ unresolvedModules: ['app.missing'] }), {
      ...options,
      modelCall,
    });
    expect(verdict).toEqual({ kind: 'unknown', reason: 'Malformed model response', confidence: 0 });
  });

  it('reports a failed call as unknown', async () => {
    const modelCall = vi.fn().mockRejectedValue(new Error('rate limited'));
    expect(await classifyWithModel(failure, context(), { ...options, modelCall })).toEqual({
      kind: 'unknown',
      reason: 'Model call failed: rate limited',
      confidence: 0,
    });
  });
});
