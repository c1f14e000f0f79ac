import { describe, expect, it } from 'vitest';
import { pythonFrontEnd } from '../../src/parser/python-front-end.js';

function parse(lines: string[], file = 'app/users.py') {
  const parsed = pythonFrontEnd.parseFile(lines.join('\n'), file);
  expect(parsed.syntaxError).toBeNull();
  return parsed.root;
}

describe('pythonFrontEnd', () => {
  describe('extractSymbols', () => {
    const source = [
      'from fastapi import APIRouter',
      '',
      'router = APIRouter()',
      '',
      '',
      '@router.get("/users/{user_id}")',
      'async def get_user(user_id: int):',
      '    return {"id": user_id}',
      '',
      '',
      'class UserService:',
      '    def __init__(self, repo):',
      '        self.repo = repo',
      '',
      '    def create(self, name, *, admin=False):',
      '        def validate(value):',
      '            return bool(value)',
      '        return validate(name)',
      '',
    ];

    it('finds top-level and nested definitions in order', () => {
      const symbols = pythonFrontEnd.extractSymbols(parse(source), 'app/users.py');
      expect(symbols.map((s) => [s.qualifiedName, s.kind, s.startLine, s.endLine])).toEqual([
        ['get_user', 'function', 6, 8],
        ['UserService', 'class', 11, 18],
        ['UserService.__init__', 'method', 12, 13],
        ['UserService.create', 'method', 15, 18],
        ['UserService.create.validate', 'function', 16, 17],
      ]);
    });

    it('records arity, async and parent', () => {
      const symbols = pythonFrontEnd.extractSymbols(parse(source), 'app/users.py');
      const byName = new Map(symbols.map((s) => [s.qualifiedName, s]));
      expect(byName.get('get_user')?.isAsync).toBe(true);
      expect(byName.get('get_user')?.argCount).toBe(1);
      expect(byName.get('UserService.create')?.argCount).toBe(3);
      expect(byName.get('UserService.create')?.isAsync).toBe(false);
      expect(byName.get('UserService.create.validate')?.parent).toBe('UserService.create');
      expect(byName.get('get_user')?.parent).toBeUndefined();
    });

    it('reads verb decorators as routes', () => {
      const routes = pythonFrontEnd.extractRoutes(parse(source), 'app/users.py');
      expect(routes).toEqual([
        {
          handlerName: 'get_user',
          symbolName: 'get_user',
          file: 'app/users.py',
          method: 'GET',
          path: '/users/{user_id}',
          line: 6,
        },
      ]);
    });

    it('reads Flask route decorators with and without methods', () => {
      const root = parse([
        '@app.route("/items", methods=["POST", "PUT"])',
        'def create_item():',
        '    pass',
        '',
        '@bp.route("/ping")',
        'def ping():',
        '    pass',
        '',
      ]);
      const routes = pythonFrontEnd.extractRoutes(root, 'app/items.py');
      expect(routes.map((r) => [r.method, r.path, r.handlerName])).toEqual([
        ['POST', '/items', 'create_item'],
        ['GET', '/ping', 'ping'],
      ]);
    });
  });

  describe('extractImports', () => {
    it('binds plain, aliased, from, relative and wildcard imports', () => {
      const root = parse(
        [
          'import os',
          'import app.models as models',
          'from app.services import user_service, helpers as h',
          'from . import utils',
          'from .db import *',
          '',
        ],
        'app/views.py'
      );
      const bindings = pythonFrontEnd.extractImports(root);
      expect(bindings.map((b) => [b.localName, b.importedName, b.module, b.line])).toEqual([
        ['os', '*', 'os', 1],
        ['models', '*', 'app.models', 2],
        ['user_service', 'user_service', 'app.services', 3],
        ['h', 'helpers', 'app.services', 3],
        ['utils', 'utils', '.', 4],
        ['*', '*', '.db', 5],
      ]);
    });
  });

  describe('resolveModule', () => {
    const known = new Set([
      'app/models.py',
      'app/utils.py',
      'app/services/__init__.py',
      'src/pkg/core.py',
      'tests/test_users.py',
    ]);

    it('maps dotted names to modules and packages', () => {
      expect(pythonFrontEnd.resolveModule('app.models', 'tests/test_users.py', known)).toEqual({
        kind: 'local',
        file: 'app/models.py',
      });
      expect(pythonFrontEnd.resolveModule('app.services', 'tests/test_users.py', known)).toEqual({
        kind: 'local',
        file: 'app/services/__init__.py',
      });
    });

    it('falls back to a src/ layout', () => {
      expect(pythonFrontEnd.resolveModule('pkg.core', 'tests/test_users.py', known)).toEqual({
        kind: 'local',
        file: 'src/pkg/core.py',
      });
    });

    it('resolves relative imports against the importing file', () => {
      expect(pythonFrontEnd.resolveModule('.utils', 'app/views.py', known)).toEqual({
        kind: 'local',
        file: 'app/utils.py',
      });
      expect(pythonFrontEnd.resolveModule('..models', 'app/api/views.py', known)).toEqual({
        kind: 'local',
        file: 'app/models.py',
      });
    });

    it('skips standard-library and third-party packages', () => {
      expect(pythonFrontEnd.resolveModule('os.path', 'app/views.py', known)).toEqual({ kind: 'external' });
      expect(pythonFrontEnd.resolveModule('pytest', 'tests/test_users.py', known)).toEqual({ kind: 'external' });
    });

    it('reports unknown modules as unresolved', () => {
      expect(pythonFrontEnd.resolveModule('missing.module', 'app/views.py', known)).toEqual({ kind: 'unresolved' });
    });
  });

  describe('submoduleSpecifier', () => {
    it('joins absolute and relative module names', () => {
      expect(pythonFrontEnd.submoduleSpecifier('app', 'models')).toBe('app.models');
      expect(pythonFrontEnd.submoduleSpecifier('.', 'utils')).toBe('.utils');
      expect(pythonFrontEnd.submoduleSpecifier('app', '*')).toBeNull();
    });
  });

  describe('locateUnit', () => {
    const testSource = [
      'import pytest',
      '',
      '',
      'class TestUsers:',
      '    def test_create(self):',
      '        assert True',
      '',
      '',
      'def test_create():',
      '    assert False',
      '',
      '',
      '@pytest.mark.parametrize("x", [1, 2])',
      'def test_param(x):',
      '    assert x',
      '',
    ];

    it('honours the class qualifier', () => {
      const unit = pythonFrontEnd.locateUnit(parse(testSource, 'tests/test_users.py'), 'test_create', 'TestUsers');
      expect(unit?.range.toString()).toBe('5-6');
    });

    it('prefers the module-level definition without a qualifier', () => {
      const unit = pythonFrontEnd.locateUnit(parse(testSource, 'tests/test_users.py'), 'test_create');
      expect(unit?.range.toString()).toBe('9-10');
    });

    it('strips parametrisation and includes decorators', () => {
      const unit = pythonFrontEnd.locateUnit(parse(testSource, 'tests/test_users.py'), 'test_param[1]');
      expect(unit?.name).toBe('test_param');
      expect(unit?.range.toString()).toBe('13-15');
    });

    it('returns null for an unknown unit', () => {
      expect(pythonFrontEnd.locateUnit(parse(testSource, 'tests/test_users.py'), 'test_missing')).toBeNull();
    });
  });

  describe('extractTopLevelDefinitions', () => {
    it('lists functions, classes and assignments with their references', () => {
      const root = parse([
        'import os',
        '',
        'BASE = os.getcwd()',
        '',
        '',
        'def helper(x):',
        '    return x + BASE',
        '',
        '',
        'class Service:',
        '    def run(self):',
        '        return helper(1)',
        '',
      ]);
      const definitions = pythonFrontEnd.extractTopLevelDefinitions(root);
      expect(definitions.map((d) => [d.name, d.kind, d.startLine, d.endLine])).toEqual([
        ['BASE', 'variable', 3, 3],
        ['helper', 'function', 6, 7],
        ['Service', 'class', 10, 12],
      ]);
      expect([...definitions[0].references].sort()).toEqual(['getcwd', 'os']);
      expect([...definitions[1].references].sort()).toEqual(['BASE', 'x']);
      expect([...definitions[2].references].sort()).toEqual(['helper', 'run', 'self']);
    });
  });

  describe('isTestFile', () => {
    it('recognises pytest naming and test directories', () => {
      expect(pythonFrontEnd.isTestFile('test_users.py')).toBe(true);
      expect(pythonFrontEnd.isTestFile('app/users_test.py')).toBe(true);
      expect(pythonFrontEnd.isTestFile('conftest.py')).toBe(true);
      expect(pythonFrontEnd.isTestFile('tests/helpers.py')).toBe(true);
      expect(pythonFrontEnd.isTestFile('app/testing.py')).toBe(false);
    });
  });

  it('names generated files per mode and shard', () => {
    expect(pythonFrontEnd.generatedTestFileName('unit', 0)).toBe('test_unit_generated_1.py');
    expect(pythonFrontEnd.generatedTestFileName('e2e', 2)).toBe('test_e2e_generated_3.py');
  });
});
