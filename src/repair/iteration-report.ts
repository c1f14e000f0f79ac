import fs from 'node:fs';
import chalk from 'chalk';
import type { ClassificationStage, FailureKind } from '../failures/failure-classifier.js';
import type { NonFixableRun } from '../failures/test-report.js';
import type { LogSink } from '../utils/log-sink.js';
import type { PatchOutcome } from './patch-engine.js';

export interface FixRecord {
  testFile: string;
  testName: string;
  iteration: number;
  classification: FailureKind;
  stage: ClassificationStage;
  confidence: number;
  fixAttempted: boolean;
  fixSuccessful: boolean;
  reason: string;
  /** Number of candidate fixes tried. */
  attempts: number;
  /** Outcome of the last patch tried. */
  patch?: PatchOutcome;
}

export interface AbortedRound extends NonFixableRun {
  iteration: number;
}

export interface IterationReport {
  iterations: number;
  totalFailures: number;
  testMistakes: number;
  codeDefects: number;
  undetermined: number;
  successfulFixes: number;
  failedFixes: number;
  /** Every record, in processing order. */
  fixHistory: FixRecord[];
  aborted?: AbortedRound;
}

/**
 * Summarise a fix history. Counts are over unique `(testFile, testName)`
 * pairs, each represented by its latest record.
 */
export function buildIterationReport(iterations: number, fixHistory: FixRecord[], aborted?: AbortedRound): IterationReport {
  const latest = new Map<string, FixRecord>();
  for (const record of fixHistory) {
    latest.set(`${record.testFile}::${record.testName}`, record);
  }
  const unique = [...latest.values()];
  const mistakes = unique.filter((r) => r.classification === 'test_mistake');
  const fixed = mistakes.filter((r) => r.fixSuccessful).length;

  return {
    iterations,
    totalFailures: unique.length,
    testMistakes: mistakes.length,
    codeDefects: unique.filter((r) => r.classification === 'code_defect').length,
    undetermined: unique.filter((r) => r.classification === 'unknown').length,
    successfulFixes: fixed,
    failedFixes: mistakes.length - fixed,
    fixHistory,
    ...(aborted && { aborted }),
  };
}

function patchDocument(patch: PatchOutcome): Record<string, unknown> {
  return {
    target_symbol: patch.targetSymbol,
    file: patch.file,
    applied: patch.applied,
    validated: patch.validated,
    reason: patch.reason,
    ...(patch.detail !== undefined && { detail: patch.detail }),
  };
}

/** Serialisable form with snake_case keys. */
export function toReportDocument(report: IterationReport): Record<string, unknown> {
  return {
    iterations: report.iterations,
    total_failures: report.totalFailures,
    test_mistakes: report.testMistakes,
    code_defects: report.codeDefects,
    undetermined: report.undetermined,
    successful_fixes: report.successfulFixes,
    failed_fixes: report.failedFixes,
    fix_history: report.fixHistory.map((record) => ({
      test_file: record.testFile,
      test_name: record.testName,
      iteration: record.iteration,
      classification: record.classification,
      stage: record.stage,
      confidence: record.confidence,
      fix_attempted: record.fixAttempted,
      fix_successful: record.fixSuccessful,
      reason: record.reason,
      attempts: record.attempts,
      ...(record.patch && { patch: patchDocument(record.patch) }),
    })),
    ...(report.aborted && { aborted: report.aborted }),
  };
}

export function writeIterationReport(filePath: string, report: IterationReport): void {
  fs.writeFileSync(filePath, `${JSON.stringify(toReportDocument(report), null, 2)}\n`, 'utf-8');
}

export function printIterationSummary(log: LogSink, report: IterationReport, maxIterations: number): void {
  log.log('');
  log.log(chalk.bold('Repair Summary'));
  log.log(`  Iterations: ${report.iterations}/${maxIterations}`);
  log.log(`  Unique failures: ${report.totalFailures}`);
  log.log(`  Test mistakes: ${report.testMistakes}`);
  log.log(chalk.green(`    Fixed: ${report.successfulFixes}`));
  if (report.failedFixes > 0) {
    log.log(chalk.yellow(`    Not fixed: ${report.failedFixes}`));
  }
  log.log(
    report.codeDefects > 0
      ? chalk.red(`  Code defects (need human review): ${report.codeDefects}`)
      : `  Code defects: ${report.codeDefects}`
  );
  log.log(chalk.gray(`  Undetermined: ${report.undetermined}`));

  const defects = new Map<string, FixRecord>();
  for (const record of report.fixHistory) {
    if (record.classification === 'code_defect') defects.set(`${record.testFile}::${record.testName}`, record);
  }
  for (const record of defects.values()) {
    log.log(chalk.red(`    - ${record.testFile}::${record.testName}: ${record.reason}`));
  }

  if (report.aborted) {
    log.log('');
    log.log(chalk.red(`Round ${report.aborted.iteration} aborted (${report.aborted.reason}):`));
    log.log(report.aborted.detail);
  }
}
