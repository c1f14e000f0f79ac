import { exec } from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { type TestFailure, type TestRunReport, parseTestRunReport, splitNodeId } from '../failures/test-report.js';
import type { TestRunner } from '../repair/repair-loop.js';
import type { VerificationResult } from '../repair/patch-engine.js';
import { stripParameters } from '../context/repair-context.js';
import { type LogSink, silentSink } from '../utils/log-sink.js';

export const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;
const OUTPUT_TAIL_LINES = 40;

export interface CommandRunnerOptions {
  rootDir: string;
  /** Shell command that runs the suite and writes a JSON report. */
  command: string;
  /** Where `command` writes its report, absolute or root-relative. */
  reportPath: string;
  /**
   * Command that runs one test. `{nodeId}`, `{file}` and `{name}` are
   * replaced with shell-quoted values.
   */
  singleTestCommand?: string;
  timeoutMs?: number;
  log?: LogSink;
  verbose?: boolean;
}

interface ShellResult {
  exitCode: number;
  output: string;
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

function tail(output: string): string {
  return output.trimEnd().split('\n').slice(-OUTPUT_TAIL_LINES).join('\n');
}

function runShell(command: string, cwd: string, timeoutMs: number): Promise<ShellResult> {
  return new Promise((resolve) => {
    exec(command, { cwd, timeout: timeoutMs, maxBuffer: 64 * 1024 * 1024 }, (error, stdout, stderr) => {
      const output = `${stdout}${stderr}`;
      if (!error) {
        resolve({ exitCode: 0, output });
      } else if (error.killed) {
        resolve({ exitCode: -1, output: `${output}\nKilled after ${timeoutMs}ms` });
      } else {
        resolve({ exitCode: typeof error.code === 'number' ? error.code : 1, output });
      }
    });
  });
}

/**
 * Runs the project's own test command in a shell and reads the JSON report
 * it leaves behind (pytest-json-report, Vitest or Jest `--reporter=json`).
 */
export class CommandTestRunner implements TestRunner {
  private readonly reportFile: string;
  private readonly timeoutMs: number;
  private readonly log: LogSink;

  constructor(private readonly options: CommandRunnerOptions) {
    this.reportFile = path.resolve(options.rootDir, options.reportPath);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.log = options.log ?? silentSink;
  }

  async run(): Promise<TestRunReport> {
    fs.rmSync(this.reportFile, { force: true });
    if (this.options.verbose) {
      this.log.log(chalk.gray(`  $ ${this.options.command}`));
    }

    const result = await runShell(this.options.command, this.options.rootDir, this.timeoutMs);
    if (!fs.existsSync(this.reportFile)) {
      return {
        tests: [],
        collectionErrors: [`Test command wrote no report (exit code ${result.exitCode})\n${tail(result.output)}`],
        exitCode: result.exitCode,
      };
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(this.reportFile, 'utf-8'));
    } catch (error) {
      throw new Error(`Test report ${this.reportFile} is not valid JSON`, { cause: error });
    }
    return parseTestRunReport(data, this.options.rootDir);
  }

  async runSingle(failure: TestFailure): Promise<VerificationResult | null> {
    const template = this.options.singleTestCommand;
    if (!template) return null;

    const { testFile, testName } = splitNodeId(failure.nodeId);
    const command = template
      .replaceAll('{nodeId}', shellQuote(failure.nodeId))
      .replaceAll('{file}', shellQuote(testFile))
      .replaceAll('{name}', shellQuote(stripParameters(testName)));
    if (this.options.verbose) {
      this.log.log(chalk.gray(`    $ ${command}`));
    }

    const result = await runShell(command, this.options.rootDir, this.timeoutMs);
    return { passed: result.exitCode === 0, output: tail(result.output) };
  }
}
