import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { mapCoverageGaps, summarizeCoverage } from '../coverage/gap-mapper.js';
import {
  SharedFlags,
  colorPercentage,
  formatLineRanges,
  loadCoverage,
  loadSymbolIndex,
  outputJsonOrPlain,
  resolveSourceRoot,
  sectionHeader,
} from './_shared/index.js';

export default class Gaps extends Command {
  static override description = 'Map uncovered lines from a coverage report onto functions, methods, classes and routes';

  static override examples = [
    '<%= config.bin %> gaps . --coverage coverage.xml',
    '<%= config.bin %> gaps ./web --coverage coverage/coverage-final.json --limit 50',
    '<%= config.bin %> gaps . -c coverage.xml --json',
  ];

  static override args = {
    directory: Args.string({ description: 'Root of the source tree', required: true }),
  };

  static override flags = {
    json: SharedFlags.json,
    exclude: SharedFlags.exclude,
    coverage: Flags.string({
      char: 'c',
      description: 'Coverage report (Cobertura coverage.xml or Istanbul coverage-final.json)',
      required: true,
    }),
    limit: Flags.integer({
      description: 'Max gaps to show',
      default: 100,
    }),
    verbose: Flags.boolean({ description: 'Show detailed progress', default: false }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Gaps);
    const rootDir = await resolveSourceRoot(args.directory, this);

    const index = await loadSymbolIndex(rootDir, this, {
      ...(flags.exclude && { exclude: flags.exclude }),
      verbose: flags.verbose,
      quiet: flags.json,
    });

    const coverage = loadCoverage(flags.coverage, rootDir, this);
    const gaps = mapCoverageGaps(index.symbols, coverage);
    const summary = summarizeCoverage(coverage);

    const data = {
      summary,
      gaps: gaps.map((gap) => ({
        file: gap.symbol.file,
        qualifiedName: gap.symbol.qualifiedName,
        kind: gap.symbol.kind,
        startLine: gap.symbol.startLine,
        endLine: gap.symbol.endLine,
        uncoveredLines: gap.uncoveredLines,
      })),
    };

    outputJsonOrPlain(this, flags.json, data, () => {
      this.log('');
      this.log(sectionHeader('Coverage'));
      for (const row of summary.files) {
        this.log(`  ${colorPercentage(row.percentage).padEnd(16)} ${row.file} ${chalk.gray(`(${row.covered}/${row.total})`)}`);
      }
      this.log(`  ${chalk.bold('Total')} ${colorPercentage(summary.percentage)} ${chalk.gray(`(${summary.covered}/${summary.total})`)}`);

      this.log('');
      this.log(sectionHeader(`Gaps (${gaps.length})`));
      if (gaps.length === 0) {
        this.log(chalk.green('  Every indexed symbol is fully covered.'));
        return;
      }
      for (const gap of gaps.slice(0, flags.limit)) {
        this.log(
          `  ${chalk.cyan(`${gap.symbol.file}::${gap.symbol.qualifiedName}`)} ${chalk.gray(gap.symbol.kind)}  ${chalk.yellow(formatLineRanges(gap.uncoveredLines))}`
        );
      }
      if (gaps.length > flags.limit) {
        this.log(chalk.gray(`  ... and ${gaps.length - flags.limit} more`));
      }
    });
  }
}
