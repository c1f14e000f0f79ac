import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { DEFAULT_CONFIG, type GenerationMode, defaultBatchSize, resolveModelName } from '../config.js';
import { type GapRecord, mapCoverageGaps } from '../coverage/gap-mapper.js';
import { type GenerationTarget, selectTargets } from '../generation/target-sharder.js';
import { runGeneration } from '../generation/test-generator.js';
import { resolveTargetNames, symbolKey } from '../indexer/symbol-indexer.js';
import { createModelCall } from '../llm/llm-utils.js';
import { toRelativePath } from '../utils/file-scanner.js';
import { silentSink } from '../utils/log-sink.js';
import {
  LlmFlags,
  SharedFlags,
  loadCoverage,
  loadSymbolIndex,
  outputJsonOrPlain,
  resolveSourceRoot,
  sectionHeader,
} from './_shared/index.js';

function isGenerationMode(value: string): value is GenerationMode {
  return value === 'unit' || value === 'e2e';
}

export default class Generate extends Command {
  static override description = 'Generate unit or end-to-end tests for symbols with uncovered lines';

  static override examples = [
    '<%= config.bin %> generate . --coverage coverage.xml',
    '<%= config.bin %> generate . --coverage coverage/coverage-final.json --mode e2e --batch-size 10',
    '<%= config.bin %> generate . --all --target app/users.py::create_user --dry-run',
  ];

  static override args = {
    directory: Args.string({ description: 'Root of the source tree', required: true }),
  };

  static override flags = {
    ...LlmFlags,
    json: SharedFlags.json,
    exclude: SharedFlags.exclude,
    coverage: Flags.string({
      char: 'c',
      description: 'Coverage report (Cobertura coverage.xml or Istanbul coverage-final.json)',
      exclusive: ['all'],
    }),
    all: Flags.boolean({
      description: 'Target every eligible symbol instead of the ones with coverage gaps',
      default: false,
    }),
    mode: Flags.string({
      description: 'Kind of tests to generate',
      options: ['unit', 'e2e'],
      default: 'unit',
    }),
    'batch-size': Flags.integer({
      description: `Targets per generated file (default: ${DEFAULT_CONFIG.unitBatchSize} unit, ${DEFAULT_CONFIG.e2eBatchSize} e2e)`,
      min: 1,
    }),
    target: Flags.string({
      description: 'Restrict to this symbol, as name or file::qualifiedName (repeatable)',
      multiple: true,
    }),
    'out-dir': Flags.string({
      description: 'Directory for generated test files, relative to the source root',
    }),
    framework: Flags.string({
      description: 'Test framework named in the prompt (default: pytest for Python, vitest otherwise)',
    }),
    'dry-run': Flags.boolean({ description: 'Validate generated tests without writing them', default: false }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Generate);
    const rootDir = await resolveSourceRoot(args.directory, this);
    const mode: GenerationMode = isGenerationMode(flags.mode) ? flags.mode : 'unit';

    if (!flags.coverage && !flags.all) {
      this.error(chalk.red('Pass --coverage <report>, or --all to target every symbol'));
    }

    const index = await loadSymbolIndex(rootDir, this, {
      ...(flags.exclude && { exclude: flags.exclude }),
      verbose: flags.verbose,
      quiet: flags.json,
    });

    const gaps: GapRecord[] | undefined = flags.coverage
      ? mapCoverageGaps(index.symbols, loadCoverage(flags.coverage, rootDir, this))
      : undefined;

    let targets: GenerationTarget[] = selectTargets(index, mode, gaps);
    if (flags.target) {
      const resolution = resolveTargetNames(index, flags.target);
      for (const { name, candidates } of resolution.ambiguous) {
        this.warn(
          chalk.yellow(`"${name}" is ambiguous: ${candidates.map((c) => symbolKey(c)).join(', ')}. Use file::name.`)
        );
      }
      for (const name of resolution.missing) {
        this.warn(chalk.yellow(`No symbol named "${name}"`));
      }
      const wanted = new Set(resolution.resolved.map((s) => symbolKey(s)));
      targets = targets.filter((t) => wanted.has(symbolKey(t.symbol)));
    }

    if (targets.length === 0) {
      outputJsonOrPlain(this, flags.json, { mode, totalTargets: 0, written: 0, rejected: 0, shards: [] }, () => {
        this.log(chalk.green('Nothing to generate: no matching targets.'));
      });
      return;
    }

    const model = resolveModelName(flags.model);
    const log = flags.json ? silentSink : this;
    if (!flags.json) {
      this.log(chalk.blue(`Generating ${mode} tests for ${targets.length} target(s) with ${model}`));
    }

    const report = await runGeneration({
      rootDir,
      mode,
      targets,
      batchSize: flags['batch-size'] ?? defaultBatchSize(mode),
      modelCall: createModelCall({
        model,
        log: this,
        isJson: flags.json,
        llmLog: { showRequests: flags['show-llm-requests'], showResponses: flags['show-llm-responses'] },
        label: `generate ${mode}`,
      }),
      maxContextChars: flags['max-context'],
      knownFiles: new Set(index.files),
      ...(flags['out-dir'] && { outDir: toRelativePath(rootDir, flags['out-dir']) }),
      ...(flags.framework && {
        frameworks: { python: flags.framework, typescript: flags.framework, javascript: flags.framework },
      }),
      dryRun: flags['dry-run'],
      log,
      verbose: flags.verbose,
    });

    outputJsonOrPlain(this, flags.json, report, () => {
      this.log('');
      this.log(sectionHeader('Generation Summary'));
      this.log(`  Targets: ${report.totalTargets}`);
      this.log(`  Shards: ${report.shards.length}`);
      this.log(chalk.green(`  Written: ${report.written}`));
      if (report.rejected > 0) {
        this.log(chalk.yellow(`  Rejected: ${report.rejected}`));
        for (const shard of report.shards.filter((s) => s.status === 'rejected')) {
          this.log(chalk.yellow(`    - ${shard.testFile}: ${shard.reason}`));
        }
      }
    });
  }
}
