import type { TestFailure } from './test-report.js';

export interface FailureRule {
  id: string;
  pattern: RegExp;
  reason: string;
}

export interface RuleVerdict {
  kind: 'test_mistake' | 'unknown';
  reason: string;
  confidence: number;
  ruleId?: string;
}

export const RULE_CONFIDENCE = 0.9;
export const HEURISTIC_CONFIDENCE = 0.6;

// Patterns are matched with `test`, so none may carry the g or y flag.
export const RULE_TABLE: readonly FailureRule[] = [
  { id: 'missing-import', pattern: /\b(ImportError|ModuleNotFoundError)\b/, reason: 'Missing import in test' },
  { id: 'wrong-import', pattern: /cannot import name/, reason: 'Wrong import in test' },
  {
    id: 'missing-module',
    pattern: /Cannot find module|Failed to (resolve|load) (import|url)/,
    reason: 'Test imports a module that does not exist',
  },
  { id: 'fixture-typo', pattern: /fixture '[^']*' not found|fixture .* doesn't exist/, reason: 'Missing or misspelled fixture' },
  { id: 'undefined-name', pattern: /NameError:.*name .* is not defined/, reason: 'Undefined name in test' },
  { id: 'undefined-reference', pattern: /ReferenceError: .* is not defined/, reason: 'Undefined name in test' },
  {
    id: 'mock-missing-export',
    pattern: /No "[^"]+" export is defined on the "[^"]+" mock/,
    reason: 'Mock factory does not provide the export the test uses',
  },
  {
    id: 'uninitialised-mock-assertion',
    pattern: /has no attribute '(assert_\w+|return_value|side_effect|call_count|called)'/,
    reason: 'Assertion on a mock that was never set up',
  },
  { id: 'mock-misconfigured', pattern: /AttributeError.*(Magic)?Mock/, reason: 'Incorrect mock usage' },
  { id: 'not-a-spy', pattern: /is not a spy or a call to a spy|received value must be a mock or spy/i, reason: 'Assertion on a value that is not a mock' },
  { id: 'syntax-error', pattern: /\b(SyntaxError|IndentationError|TabError)\b/, reason: 'Syntax error in test' },
  { id: 'async-never-awaited', pattern: /was never awaited/, reason: 'Missing await in test' },
  {
    id: 'async-event-loop',
    pattern: /cannot be called from a running event loop|async def functions are not natively supported/,
    reason: 'Async setup issue in test',
  },
  { id: 'async-pending-promise', pattern: /Promise \{ <pending> \}/, reason: 'Assertion on an unawaited promise' },
  { id: 'wrong-arity', pattern: /TypeError:.*takes \d+ positional arguments? but \d+ (was|were) given/, reason: 'Wrong number of arguments in test' },
  { id: 'missing-argument', pattern: /TypeError:.*missing \d+ required (positional|keyword-only) arguments?/, reason: 'Missing arguments in test' },
  { id: 'unexpected-keyword', pattern: /TypeError:.*got an unexpected keyword argument/, reason: 'Wrong keyword argument in test' },
  { id: 'missing-table', pattern: /(DatabaseError|OperationalError).*no such table/, reason: 'Database not set up in test' },
  { id: 'missing-file', pattern: /\bFileNotFoundError\b|ENOENT: no such file or directory/, reason: 'File not found during test setup' },
];

// Signatures of defects in the code under test; these go to the model.
export const DEFER_TABLE: readonly FailureRule[] = [
  { id: 'division-by-zero', pattern: /\bZeroDivisionError\b/, reason: 'Possible code defect: division by zero' },
  { id: 'invalid-literal', pattern: /ValueError:.*invalid literal/, reason: 'Possible code defect: invalid value' },
  { id: 'index-out-of-range', pattern: /IndexError:.*out of range/, reason: 'Possible code defect: index out of range' },
  {
    id: 'unbounded-recursion',
    pattern: /\bRecursionError\b|Maximum call stack size exceeded/,
    reason: 'Possible code defect: unbounded recursion',
  },
];

// Exception kinds that usually mean the test itself is written wrong
const TEST_AUTHORING_KINDS = new Set(['AttributeError', 'TypeError', 'NameError', 'ImportError', 'ReferenceError']);

const TRACE_TAIL_LINES = 10;

function failureText(failure: TestFailure): string {
  return `${failure.exceptionKind}: ${failure.message}\n${failure.rawTrace}`;
}

function raisedInTestFile(failure: TestFailure): boolean {
  if (!failure.testFile) return false;
  const tail = failure.rawTrace.split('\n').slice(-TRACE_TAIL_LINES);
  return tail.some((line) => line.includes(failure.testFile));
}

/**
 * First matching rule wins. Defect signatures are checked before the table
 * and always yield `unknown`.
 */
export function classifyByRules(failure: TestFailure, rules: readonly FailureRule[] = RULE_TABLE): RuleVerdict {
  const text = failureText(failure);

  const deferred = DEFER_TABLE.find((rule) => rule.pattern.test(text));
  if (deferred) {
    return { kind: 'unknown', reason: deferred.reason, confidence: 0, ruleId: deferred.id };
  }

  const matched = rules.find((rule) => rule.pattern.test(text));
  if (matched) {
    return { kind: 'test_mistake', reason: matched.reason, confidence: RULE_CONFIDENCE, ruleId: matched.id };
  }

  if (TEST_AUTHORING_KINDS.has(failure.exceptionKind) && raisedInTestFile(failure)) {
    return {
      kind: 'test_mistake',
      reason: `${failure.exceptionKind} raised inside the test file`,
      confidence: HEURISTIC_CONFIDENCE,
      ruleId: 'raised-in-test',
    };
  }

  return { kind: 'unknown', reason: 'No rule matched', confidence: 0 };
}
