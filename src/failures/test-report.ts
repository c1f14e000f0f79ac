import { z } from 'zod';
import { toRelativePath } from '../utils/file-scanner.js';
import { escapeRegExp } from '../utils/helpers.js';

export type TestOutcome = 'passed' | 'failed' | 'error' | 'skipped';

export interface TestCaseResult {
  /** `file::[Container::]name`, root-relative file. */
  nodeId: string;
  outcome: TestOutcome;
  longrepr: string;
}

export interface TestRunReport {
  tests: TestCaseResult[];
  collectionErrors: string[];
  exitCode?: number;
}

export interface TestFailure {
  testFile: string;
  testName: string;
  nodeId: string;
  exceptionKind: string;
  message: string;
  rawTrace: string;
  lineNumber: number | null;
}

export type NonFixableReason = 'collection_error' | 'no_tests_collected' | 'runner_error';

export interface NonFixableRun {
  reason: NonFixableReason;
  detail: string;
}

const PytestPhaseSchema = z.object({
  outcome: z.string().optional(),
  longrepr: z.string().optional(),
});

const PytestReportSchema = z.object({
  exitcode: z.number().int().optional(),
  tests: z
    .array(
      z.object({
        nodeid: z.string(),
        outcome: z.string(),
        setup: PytestPhaseSchema.optional(),
        call: PytestPhaseSchema.optional(),
        teardown: PytestPhaseSchema.optional(),
      })
    )
    .default([]),
  collectors: z
    .array(z.object({ nodeid: z.string(), outcome: z.string(), longrepr: z.string().optional() }))
    .default([]),
});

const JestReportSchema = z.object({
  testResults: z.array(
    z.object({
      name: z.string(),
      status: z.string().optional(),
      message: z.string().optional(),
      assertionResults: z
        .array(
          z.object({
            ancestorTitles: z.array(z.string()).default([]),
            title: z.string(),
            status: z.string(),
            failureMessages: z.array(z.string()).default([]),
          })
        )
        .default([]),
    })
  ),
});

function toOutcome(status: string): TestOutcome {
  switch (status) {
    case 'passed':
      return 'passed';
    case 'failed':
      return 'failed';
    case 'error':
      return 'error';
    default:
      return 'skipped';
  }
}

// Jest colours its failure messages
const ANSI_ESCAPE = /\u001b\[[0-9;]*m/g;

function invalid(kind: string, error: z.ZodError): Error {
  const issue = error.errors[0];
  const where = issue ? `${issue.path.join('.') || '/'}: ${issue.message}` : 'unknown error';
  return new Error(`Invalid ${kind} report (${where})`);
}

/**
 * Read a pytest-json-report document. The call phase carries the failure;
 * errors raised while setting up fixtures only appear in the setup phase.
 */
export function parsePytestJsonReport(data: unknown): TestRunReport {
  const result = PytestReportSchema.safeParse(data);
  if (!result.success) throw invalid('pytest JSON', result.error);

  const { tests, collectors, exitcode } = result.data;
  return {
    tests: tests.map((test) => ({
      nodeId: test.nodeid,
      outcome: toOutcome(test.outcome),
      longrepr: test.call?.longrepr ?? test.setup?.longrepr ?? test.teardown?.longrepr ?? '',
    })),
    collectionErrors: collectors
      .filter((c) => c.outcome === 'failed')
      .map((c) => (c.longrepr ? `${c.nodeid}: ${c.longrepr}` : c.nodeid)),
    ...(exitcode !== undefined && { exitCode: exitcode }),
  };
}

/**
 * Read the JSON reporter output shared by Vitest and Jest. A file that failed
 * without running any assertion never got past import.
 */
export function parseJestJsonReport(data: unknown, rootDir: string): TestRunReport {
  const result = JestReportSchema.safeParse(data);
  if (!result.success) throw invalid('Vitest/Jest JSON', result.error);

  const report: TestRunReport = { tests: [], collectionErrors: [] };
  for (const fileResult of result.data.testResults) {
    const file = toRelativePath(rootDir, fileResult.name);
    if (fileResult.assertionResults.length === 0 && fileResult.message) {
      report.collectionErrors.push(`${file}: ${fileResult.message.replace(ANSI_ESCAPE, '')}`);
      continue;
    }
    for (const assertion of fileResult.assertionResults) {
      report.tests.push({
        nodeId: [file, ...assertion.ancestorTitles, assertion.title].join('::'),
        outcome: toOutcome(assertion.status),
        longrepr: assertion.failureMessages.join('\n').replace(ANSI_ESCAPE, ''),
      });
    }
  }
  return report;
}

export function parseTestRunReport(data: unknown, rootDir: string): TestRunReport {
  if (typeof data === 'object' && data !== null && 'testResults' in data) {
    return parseJestJsonReport(data, rootDir);
  }
  return parsePytestJsonReport(data);
}

/**
 * A run that cannot be repaired test by test: nothing was collected, a
 * module failed to import, or the runner itself crashed.
 */
export function detectNonFixableRun(report: TestRunReport): NonFixableRun | null {
  if (report.collectionErrors.length > 0) {
    return { reason: 'collection_error', detail: report.collectionErrors.join('\n') };
  }
  // pytest: 2 interrupted, 3 internal error, 4 usage error
  if (report.exitCode === 2 || report.exitCode === 3 || report.exitCode === 4) {
    return { reason: 'runner_error', detail: `test runner exited with code ${report.exitCode}` };
  }
  if (report.tests.length === 0 || report.exitCode === 5) {
    return { reason: 'no_tests_collected', detail: 'the test run collected no tests' };
  }
  return null;
}

export function splitNodeId(nodeId: string): { testFile: string; testName: string; container?: string } {
  const parts = nodeId.split('::');
  const testFile = parts[0] ?? '';
  const testName = parts.length > 1 ? parts[parts.length - 1] : '';
  return parts.length > 2 ? { testFile, testName, container: parts[parts.length - 2] } : { testFile, testName };
}

const KIND_PATTERN = /^([A-Za-z_][\w.]*)\s*:\s*(.*)$/;
// pytest's last traceback line: `tests/test_x.py:12: AssertionError`
const LOCATION_KIND_PATTERN = /^\S+:\d+:\s+([A-Za-z_][\w.]*)$/;

/**
 * `(kind, message)` from a trace. pytest traces are read from the first
 * `E   Kind: message` line; anything else from its first line. Without a
 * recognisable kind the whole summary line becomes the message.
 */
export function parseErrorSummary(trace: string): { kind: string; message: string } {
  const lines = trace.split(/\r?\n/);
  const errorLines = lines.filter((line) => /^E\s{2,}/.test(line)).map((line) => line.replace(/^E\s+/, ''));

  for (const line of errorLines) {
    const match = KIND_PATTERN.exec(line.trim());
    if (match) return { kind: match[1], message: match[2] };
  }

  if (errorLines.length > 0) {
    const lastLine = lines.filter((line) => line.trim().length > 0).pop()?.trim() ?? '';
    const located = LOCATION_KIND_PATTERN.exec(lastLine);
    return { kind: located ? located[1] : 'Unknown', message: errorLines[0].trim() };
  }

  const summary = lines.find((line) => line.trim().length > 0)?.trim() ?? '';
  const match = KIND_PATTERN.exec(summary);
  return match ? { kind: match[1], message: match[2] } : { kind: 'Unknown', message: summary };
}

export function extractLineNumber(trace: string, testFile: string): number | null {
  if (testFile) {
    const located = new RegExp(`${escapeRegExp(testFile)}:(\\d+)`).exec(trace);
    if (located) return Number(located[1]);
  }
  const fallback = /line (\d+)/i.exec(trace);
  return fallback ? Number(fallback[1]) : null;
}

export function extractFailures(report: TestRunReport): TestFailure[] {
  return report.tests
    .filter((test) => test.outcome === 'failed' || test.outcome === 'error')
    .map((test) => {
      const { testFile, testName } = splitNodeId(test.nodeId);
      const { kind, message } = parseErrorSummary(test.longrepr);
      return {
        testFile,
        testName,
        nodeId: test.nodeId,
        exceptionKind: kind,
        message,
        rawTrace: test.longrepr,
        lineNumber: extractLineNumber(test.longrepr, testFile),
      };
    });
}
