import chalk from 'chalk';
import { type RepairContext, collectRoutes, extractRepairContext } from '../context/repair-context.js';
import { type ClassificationResult, classifyFailure } from '../failures/failure-classifier.js';
import type { FailureRule } from '../failures/rule-classifier.js';
import {
  type TestFailure,
  type TestRunReport,
  detectNonFixableRun,
  extractFailures,
} from '../failures/test-report.js';
import type { ModelCall } from '../llm/llm-utils.js';
import type { FixFeedback } from '../llm/prompts.js';
import type { Route } from '../parser/front-end.js';
import { collectKnownFiles } from '../utils/file-scanner.js';
import { getErrorMessage } from '../utils/helpers.js';
import { type LogSink, silentSink } from '../utils/log-sink.js';
import { requestFix } from './fix-requester.js';
import { type AbortedRound, type FixRecord, type IterationReport, buildIterationReport } from './iteration-report.js';
import { type PatchOutcome, type PatchReason, type VerificationResult, applyPatch } from './patch-engine.js';

export interface TestRunner {
  /** Run the whole suite and return its parsed report. */
  run(): Promise<TestRunReport>;
  /** Re-run one test; null when the runner cannot select single tests. */
  runSingle(failure: TestFailure): Promise<VerificationResult | null>;
}

export interface RepairLoopOptions {
  rootDir: string;
  runner: TestRunner;
  modelCall: ModelCall;
  maxIterations: number;
  /** Fix requests per test mistake, on top of a fix the classifier already supplied. */
  fixAttempts: number;
  maxContextChars: number;
  log?: LogSink;
  verbose?: boolean;
  rules?: readonly FailureRule[];
  /** Fixed file set for module resolution; rescanned every round when absent. */
  knownFiles?: ReadonlySet<string>;
}

// Patch failures no other candidate fix can get past
const TERMINAL_PATCH_REASONS: ReadonlySet<PatchReason> = new Set([
  'unsupported file',
  'unreadable file',
  'original does not parse',
  'unit not found',
]);

function describePatch(patch: PatchOutcome): string {
  return patch.detail ? `${patch.reason}: ${patch.detail}` : patch.reason;
}

class RepairRound {
  constructor(
    private readonly options: RepairLoopOptions,
    private readonly iteration: number,
    private readonly knownFiles: ReadonlySet<string>,
    private readonly log: LogSink
  ) {}

  private routeCache: Route[] | null = null;

  private routes(): Route[] {
    this.routeCache ??= collectRoutes(this.options.rootDir, this.knownFiles);
    return this.routeCache;
  }

  async process(failure: TestFailure): Promise<FixRecord> {
    let context: RepairContext;
    try {
      context = extractRepairContext(this.options.rootDir, failure, {
        knownFiles: this.knownFiles,
        routes: () => this.routes(),
      });
    } catch (error) {
      return this.record(failure, { kind: 'unknown', reason: `Context extraction failed: ${getErrorMessage(error)}`, confidence: 0, stage: 'rule' });
    }

    const classification = await classifyFailure(failure, context, {
      modelCall: this.options.modelCall,
      maxContextChars: this.options.maxContextChars,
      ...(this.options.rules && { rules: this.options.rules }),
    });
    this.log.log(chalk.gray(`    → ${classification.kind} (${classification.stage}): ${classification.reason}`));

    if (classification.kind !== 'test_mistake') {
      return this.record(failure, classification);
    }
    return this.fix(failure, context, classification);
  }

  private async fix(failure: TestFailure, context: RepairContext, classification: ClassificationResult): Promise<FixRecord> {
    const { suggestedFix } = classification;
    const candidates = this.options.fixAttempts + (suggestedFix ? 1 : 0);
    let feedback: FixFeedback | undefined;
    let lastPatch: PatchOutcome | undefined;
    let lastProblem = 'no fix produced';
    let attempts = 0;

    for (let i = 0; i < candidates; i++) {
      let code: string;
      if (i === 0 && suggestedFix) {
        code = suggestedFix;
      } else {
        const proposal = await requestFix(failure, context, {
          modelCall: this.options.modelCall,
          maxContextChars: this.options.maxContextChars,
          ...(feedback && { feedback }),
        });
        if (!proposal.ok) {
          attempts++;
          lastProblem = proposal.reason;
          continue;
        }
        code = proposal.code;
      }

      attempts++;
      const patch = await applyPatch({
        rootDir: this.options.rootDir,
        file: context.testFile,
        unitName: context.testName,
        ...(context.container !== undefined && { container: context.container }),
        replacement: code,
        verify: () => this.options.runner.runSingle(failure),
      });
      lastPatch = patch;

      if (patch.validated) {
        this.log.log(chalk.green(`    ✓ patched (attempt ${attempts})`));
        return this.record(failure, classification, { attempts, patch, fixSuccessful: true });
      }

      lastProblem = describePatch(patch);
      this.log.log(chalk.yellow(`    ✗ attempt ${attempts} rejected: ${patch.reason}`));
      if (TERMINAL_PATCH_REASONS.has(patch.reason)) break;
      feedback = { previousFix: code, rejection: lastProblem };
    }

    return this.record(failure, classification, {
      attempts,
      fixSuccessful: false,
      reason: `${classification.reason} (fix failed after ${attempts} attempt(s): ${lastProblem})`,
      ...(lastPatch && { patch: lastPatch }),
    });
  }

  private record(
    failure: TestFailure,
    classification: ClassificationResult,
    fix?: { attempts: number; fixSuccessful: boolean; patch?: PatchOutcome; reason?: string }
  ): FixRecord {
    return {
      testFile: failure.testFile,
      testName: failure.testName,
      iteration: this.iteration,
      classification: classification.kind,
      stage: classification.stage,
      confidence: classification.confidence,
      fixAttempted: fix !== undefined,
      fixSuccessful: fix?.fixSuccessful ?? false,
      reason: fix?.reason ?? classification.reason,
      attempts: fix?.attempts ?? 0,
      ...(fix?.patch && { patch: fix.patch }),
    };
  }
}

/**
 * Run → classify → fix → patch, round after round. Stops when the suite has
 * no failures, when a round fixes nothing, or after `maxIterations` rounds.
 * A run that cannot be repaired test by test aborts the loop.
 */
export async function runRepairLoop(options: RepairLoopOptions): Promise<IterationReport> {
  const log = options.log ?? silentSink;
  const history: FixRecord[] = [];
  let iterations = 0;
  let aborted: AbortedRound | undefined;

  while (iterations < options.maxIterations) {
    iterations++;
    log.log(chalk.bold(`Iteration ${iterations}/${options.maxIterations}`));

    let report: TestRunReport;
    try {
      report = await options.runner.run();
    } catch (error) {
      aborted = { reason: 'runner_error', detail: getErrorMessage(error), iteration: iterations };
      break;
    }

    const nonFixable = detectNonFixableRun(report);
    if (nonFixable) {
      aborted = { ...nonFixable, iteration: iterations };
      log.warn(`Round ${iterations} aborted: ${nonFixable.reason}`);
      break;
    }

    const failures = extractFailures(report);
    if (failures.length === 0) {
      log.log(chalk.green('  No failing tests.'));
      break;
    }
    log.log(`  ${failures.length} failing test(s)`);

    const knownFiles = options.knownFiles ?? (await collectKnownFiles(options.rootDir));
    const round = new RepairRound(options, iterations, knownFiles, log);
    let fixed = 0;

    for (const [index, failure] of failures.entries()) {
      log.log(`  [${index + 1}/${failures.length}] ${failure.nodeId}`);
      if (options.verbose) {
        log.log(chalk.gray(`    ${failure.exceptionKind}: ${failure.message}`));
      }
      const record = await round.process(failure);
      history.push(record);
      if (record.fixSuccessful) fixed++;
    }

    log.log(chalk.gray(`  Round ${iterations}: ${fixed} fixed of ${failures.length}`));
    if (fixed === 0) {
      log.log(chalk.gray('  Nothing fixed this round; stopping.'));
      break;
    }
  }

  return buildIterationReport(iterations, history, aborted);
}
