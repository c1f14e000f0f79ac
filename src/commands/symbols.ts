import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import type { SymbolKind } from '../parser/front-end.js';
import { SharedFlags, loadSymbolIndex, outputJsonOrPlain, resolveSourceRoot, sectionHeader } from './_shared/index.js';

const SYMBOL_KINDS: SymbolKind[] = ['function', 'method', 'class', 'route'];

function isSymbolKind(value: string): value is SymbolKind {
  return SYMBOL_KINDS.some((kind) => kind === value);
}

export default class Symbols extends Command {
  static override description = 'Index a source tree and list its functions, methods, classes and HTTP routes';

  static override examples = [
    '<%= config.bin %> symbols ./src',
    '<%= config.bin %> symbols ./app --kind class',
    '<%= config.bin %> symbols . --file app/users.py',
    '<%= config.bin %> symbols . --include-tests --json',
  ];

  static override args = {
    directory: Args.string({ description: 'Root of the source tree', required: true }),
  };

  static override flags = {
    json: SharedFlags.json,
    exclude: SharedFlags.exclude,
    kind: Flags.string({
      char: 'k',
      description: 'Filter by kind',
      options: SYMBOL_KINDS,
    }),
    file: Flags.string({
      char: 'f',
      description: 'Only symbols in this root-relative file',
    }),
    'include-tests': Flags.boolean({ description: 'Index test files too', default: false }),
    verbose: Flags.boolean({ description: 'Show detailed progress', default: false }),
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Symbols);
    const rootDir = await resolveSourceRoot(args.directory, this);

    const index = await loadSymbolIndex(rootDir, this, {
      ...(flags.exclude && { exclude: flags.exclude }),
      verbose: flags.verbose,
      includeTests: flags['include-tests'],
      quiet: flags.json,
    });
    const kind = flags.kind !== undefined && isSymbolKind(flags.kind) ? flags.kind : undefined;
    const symbols = index.symbols.filter(
      (s) => (kind === undefined || s.kind === kind) && (flags.file === undefined || s.file === flags.file)
    );
    const routes = index.routes.filter((r) => flags.file === undefined || r.file === flags.file);

    outputJsonOrPlain(this, flags.json, { symbols, routes, skipped: index.skipped }, () => {
      this.log('');
      this.log(sectionHeader(`Symbols (${symbols.length})`));
      if (symbols.length === 0) {
        this.log(chalk.gray('  No symbols found.'));
      }
      for (const symbol of symbols) {
        const asyncTag = symbol.isAsync ? chalk.gray(' async') : '';
        this.log(
          `  ${chalk.cyan(symbol.qualifiedName)}  ${symbol.kind}${asyncTag}  ${chalk.gray(`${symbol.file}:${symbol.startLine}-${symbol.endLine}`)}`
        );
      }

      if (routes.length > 0 && (kind === undefined || kind === 'route')) {
        this.log('');
        this.log(sectionHeader(`Routes (${routes.length})`));
        for (const route of routes) {
          this.log(`  ${chalk.bold(route.method.padEnd(7))} ${route.path}  ${chalk.gray(`→ ${route.file}::${route.symbolName}`)}`);
        }
      }

      if (index.skipped.length > 0) {
        this.log('');
        this.log(sectionHeader(`Skipped (${index.skipped.length})`));
        for (const skipped of index.skipped) {
          this.log(chalk.yellow(`  ${skipped.file}: ${skipped.reason}`));
        }
      }
    });
  }
}
