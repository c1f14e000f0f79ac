import path from 'node:path';
import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { DEFAULT_CONFIG, resolveModelName } from '../config.js';
import { createModelCall } from '../llm/llm-utils.js';
import { printIterationSummary, toReportDocument, writeIterationReport } from '../repair/iteration-report.js';
import { runRepairLoop } from '../repair/repair-loop.js';
import { CommandTestRunner, DEFAULT_TIMEOUT_MS } from '../runner/command-runner.js';
import { silentSink } from '../utils/log-sink.js';
import { LlmFlags, SharedFlags, outputJsonOrPlain, resolveSourceRoot } from './_shared/index.js';

export default class Repair extends Command {
  static override description =
    'Run the test suite, classify each failure as a test mistake or a code defect, and patch the test mistakes';

  static override examples = [
    `<%= config.bin %> repair . -t "pytest --json-report --json-report-file=.report.json" -r .report.json`,
    `<%= config.bin %> repair . -t "npx vitest run --reporter=json --outputFile=report.json" -r report.json -o repair.json`,
    `<%= config.bin %> repair . -t "pytest --json-report --json-report-file=r.json" -r r.json --single-test-command "pytest {nodeId}"`,
  ];

  static override args = {
    directory: Args.string({ description: 'Root of the project under test', required: true }),
  };

  static override flags = {
    ...LlmFlags,
    json: SharedFlags.json,
    'test-command': Flags.string({
      char: 't',
      description: 'Shell command that runs the suite and writes a JSON report',
      required: true,
    }),
    report: Flags.string({
      char: 'r',
      description: 'Path of the JSON report the test command writes (relative to the directory)',
      required: true,
    }),
    'single-test-command': Flags.string({
      description: 'Command that runs one test, used to verify patches ({nodeId}, {file}, {name} are substituted)',
    }),
    'max-iterations': Flags.integer({
      description: 'Maximum repair rounds',
      default: DEFAULT_CONFIG.maxIterations,
      min: 1,
    }),
    'fix-attempts': Flags.integer({
      description: 'Fix requests per test mistake',
      default: DEFAULT_CONFIG.fixAttempts,
      min: 0,
    }),
    timeout: Flags.integer({
      description: 'Test command timeout in seconds',
      default: DEFAULT_TIMEOUT_MS / 1000,
      min: 1,
    }),
    output: Flags.string({
      char: 'o',
      description: 'Write the iteration report (JSON) to this file',
    }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Repair);
    const rootDir = await resolveSourceRoot(args.directory, this);
    const log = flags.json ? silentSink : this;

    const model = resolveModelName(flags.model);
    const modelCall = createModelCall({
      model,
      log: this,
      isJson: flags.json,
      llmLog: { showRequests: flags['show-llm-requests'], showResponses: flags['show-llm-responses'] },
      temperature: 0,
      label: 'repair',
    });

    const runner = new CommandTestRunner({
      rootDir,
      command: flags['test-command'],
      reportPath: flags.report,
      ...(flags['single-test-command'] && { singleTestCommand: flags['single-test-command'] }),
      timeoutMs: flags.timeout * 1000,
      log,
      verbose: flags.verbose,
    });

    if (!flags.json) {
      this.log(chalk.blue(`Repairing tests under ${rootDir} with ${model}`));
    }

    const report = await runRepairLoop({
      rootDir,
      runner,
      modelCall,
      maxIterations: flags['max-iterations'],
      fixAttempts: flags['fix-attempts'],
      maxContextChars: flags['max-context'],
      log,
      verbose: flags.verbose,
    });

    if (flags.output) {
      const outputPath = path.resolve(flags.output);
      writeIterationReport(outputPath, report);
      if (!flags.json) this.log(chalk.gray(`Report written to ${outputPath}`));
    }

    outputJsonOrPlain(this, flags.json, toReportDocument(report), () => {
      printIterationSummary(this, report, flags['max-iterations']);
    });

    if (report.aborted) {
      this.exit(2);
    }
  }
}
