import { describe, expect, it } from 'vitest';
import type { CodeSymbol } from '../../src/parser/front-end.js';
import { pythonFrontEnd } from '../../src/parser/python-front-end.js';
import { typescriptFrontEnd } from '../../src/parser/typescript-front-end.js';
import { LineRange } from '../../src/utils/line-range.js';

const rangeOf = (symbol: CodeSymbol): LineRange => LineRange.fromInclusive(symbol.startLine, symbol.endLine);

/** Siblings never overlap and every child sits inside its parent. */
function expectNestedRanges(symbols: CodeSymbol[]): void {
  const byName = new Map(symbols.map((s) => [s.qualifiedName, s]));
  for (const symbol of symbols) {
    if (symbol.parent !== undefined) {
      const parent = byName.get(symbol.parent);
      expect(parent, symbol.qualifiedName).toBeDefined();
      if (parent) expect(rangeOf(parent).containsRange(rangeOf(symbol)), symbol.qualifiedName).toBe(true);
    }
    for (const other of symbols) {
      if (other === symbol || other.parent !== symbol.parent) continue;
      expect(rangeOf(symbol).overlaps(rangeOf(other)), `${symbol.qualifiedName} / ${other.qualifiedName}`).toBe(false);
    }
  }
}

describe('symbol ranges', () => {
  it('nests express routes registered inside a function', () => {
    const source = [
      'export function registerRoutes(app) {',
      "  app.get('/users', (req, res) => {",
      '    res.json([]);',
      '  });',
      '}',
      '',
      'class A {',
      '  handlers = { foo() { return 1; } };',
      '  run() {',
      '    return 2;',
      '  }',
      '}',
      '',
    ].join('\n');
    const parsed = typescriptFrontEnd.parseFile(source, 'src/routes.ts');
    expect(parsed.syntaxError).toBeNull();

    const symbols = typescriptFrontEnd.extractSymbols(parsed.root, 'src/routes.ts');
    expect(symbols.map((s) => [s.qualifiedName, s.kind, s.startLine, s.endLine])).toEqual([
      ['registerRoutes', 'function', 1, 5],
      ['registerRoutes.GET /users', 'route', 2, 4],
      ['A', 'class', 7, 12],
      ['A.run', 'method', 9, 11],
    ]);
    expect(typescriptFrontEnd.extractRoutes(parsed.root, 'src/routes.ts')).toMatchObject([
      { method: 'GET', path: '/users', symbolName: 'registerRoutes.GET /users' },
    ]);
    expectNestedRanges(symbols);
  });

  it('nests decorated handlers and inner functions in python', () => {
    const source = [
      'def create_app():',
      '    app = Flask(__name__)',
      '',
      '    @app.route("/users")',
      '    def users():',
      '        return []',
      '',
      '    return app',
      '',
      '',
      'class Service:',
      '    def run(self):',
      '        def inner():',
      '            return 1',
      '        return inner()',
      '',
    ].join('\n');
    const parsed = pythonFrontEnd.parseFile(source, 'app/main.py');
    expect(parsed.syntaxError).toBeNull();

    const symbols = pythonFrontEnd.extractSymbols(parsed.root, 'app/main.py');
    expect(symbols.map((s) => [s.qualifiedName, s.kind, s.startLine, s.endLine])).toEqual([
      ['create_app', 'function', 1, 8],
      ['create_app.users', 'function', 4, 6],
      ['Service', 'class', 11, 15],
      ['Service.run', 'method', 12, 15],
      ['Service.run.inner', 'function', 13, 14],
    ]);
    expectNestedRanges(symbols);
  });
});
