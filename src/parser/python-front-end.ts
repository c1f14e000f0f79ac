import path from 'node:path';
import type { SyntaxNode } from 'tree-sitter';
import { parseContent } from './ast-parser.js';
import type {
  CodeSymbol,
  HttpMethod,
  ImportBinding,
  LanguageFrontEnd,
  ModuleResolution,
  SymbolExtraction,
  TopLevelDefinition,
  UnitLocation,
} from './front-end.js';
import { collectNodeText, hasChildOfType, namedChildrenOf, nodeLineRange, unquote } from './syntax-utils.js';

const VERB_DECORATORS: Record<string, HttpMethod> = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  patch: 'PATCH',
  delete: 'DELETE',
  head: 'HEAD',
  options: 'OPTIONS',
};

// Flask-style markers that take the verb from `methods=[...]`
const GENERIC_ROUTE_DECORATORS = new Set(['route', 'api_route']);

// Top-level packages that are never part of the project tree
const EXTERNAL_PACKAGES = new Set([
  'abc',
  'asyncio',
  'collections',
  'contextlib',
  'dataclasses',
  'datetime',
  'enum',
  'functools',
  'itertools',
  'json',
  'logging',
  'math',
  'os',
  'pathlib',
  're',
  'sys',
  'typing',
  'unittest',
  'uuid',
  'django',
  'fastapi',
  'flask',
  'httpx',
  'mock',
  'pydantic',
  'pytest',
  'requests',
  'sqlalchemy',
  'starlette',
]);

const PARAMETER_SEPARATORS = new Set(['keyword_separator', 'positional_separator', 'comment']);

function countParameters(parameters: SyntaxNode | null): number {
  if (!parameters) return 0;
  return namedChildrenOf(parameters).filter((p) => !PARAMETER_SEPARATORS.has(p.type)).length;
}

function firstStringArgument(args: SyntaxNode, keywordNames: string[]): string | null {
  const children = namedChildrenOf(args);
  const first = children[0];
  if (first?.type === 'string') return unquote(first.text);

  for (const child of children) {
    if (child.type !== 'keyword_argument') continue;
    const name = child.childForFieldName('name')?.text;
    const value = child.childForFieldName('value');
    if (name && keywordNames.includes(name) && value?.type === 'string') {
      return unquote(value.text);
    }
  }
  return null;
}

function methodsKeyword(args: SyntaxNode): HttpMethod {
  for (const child of namedChildrenOf(args)) {
    if (child.type !== 'keyword_argument' || child.childForFieldName('name')?.text !== 'methods') continue;
    const value = child.childForFieldName('value');
    const firstMethod = value ? namedChildrenOf(value).find((item) => item.type === 'string') : undefined;
    const verb = firstMethod ? VERB_DECORATORS[unquote(firstMethod.text).toLowerCase()] : undefined;
    if (verb) return verb;
  }
  return 'GET';
}

/**
 * Read `@app.get("/users")`, `@router.post(path="/x")` or
 * `@app.route("/x", methods=["POST"])`.
 */
function routeFromDecorator(decorator: SyntaxNode): { method: HttpMethod; path: string } | null {
  const expression = namedChildrenOf(decorator)[0];
  if (expression?.type !== 'call') return null;

  const fn = expression.childForFieldName('function');
  const args = expression.childForFieldName('arguments');
  if (fn?.type !== 'attribute' || !args) return null;

  const marker = fn.childForFieldName('attribute')?.text ?? '';
  const routePath = firstStringArgument(args, ['path', 'rule']);
  if (routePath === null) return null;

  const verb = VERB_DECORATORS[marker];
  if (verb) return { method: verb, path: routePath };
  if (GENERIC_ROUTE_DECORATORS.has(marker)) return { method: methodsKeyword(args), path: routePath };
  return null;
}

function analyze(root: SyntaxNode, file: string): SymbolExtraction {
  const symbols: CodeSymbol[] = [];
  const routes: SymbolExtraction['routes'] = [];

  function define(definition: SyntaxNode, outer: SyntaxNode, parent: CodeSymbol | null): CodeSymbol | null {
    const name = definition.childForFieldName('name')?.text;
    if (!name) return null;

    const isClass = definition.type === 'class_definition';
    const range = nodeLineRange(definition, outer);
    const symbol: CodeSymbol = {
      name,
      qualifiedName: parent ? `${parent.qualifiedName}.${name}` : name,
      file,
      kind: isClass ? 'class' : parent?.kind === 'class' ? 'method' : 'function',
      startLine: range.start,
      endLine: range.lastLine,
      argCount: isClass ? 0 : countParameters(definition.childForFieldName('parameters')),
      isAsync: !isClass && hasChildOfType(definition, 'async'),
      ...(parent && { parent: parent.qualifiedName }),
    };
    symbols.push(symbol);
    return symbol;
  }

  function descend(body: SyntaxNode | null, parent: CodeSymbol | null): void {
    if (!body) return;
    for (const child of namedChildrenOf(body)) visit(child, parent);
  }

  function visit(node: SyntaxNode, parent: CodeSymbol | null): void {
    switch (node.type) {
      case 'decorated_definition': {
        const definition = node.childForFieldName('definition');
        if (!definition) return;
        const symbol = define(definition, node, parent);
        if (!symbol) return;

        for (const decorator of namedChildrenOf(node)) {
          if (decorator.type !== 'decorator') continue;
          const route = routeFromDecorator(decorator);
          if (route) {
            routes.push({
              handlerName: symbol.name,
              symbolName: symbol.qualifiedName,
              file,
              method: route.method,
              path: route.path,
              line: decorator.startPosition.row + 1,
            });
          }
        }
        descend(definition.childForFieldName('body'), symbol);
        return;
      }

      case 'function_definition':
      case 'class_definition': {
        const symbol = define(node, node, parent);
        descend(node.childForFieldName('body'), symbol ?? parent);
        return;
      }

      default:
        descend(node, parent);
    }
  }

  visit(root, null);
  return { symbols, routes };
}

function extractImports(root: SyntaxNode): ImportBinding[] {
  const bindings: ImportBinding[] = [];

  function visit(node: SyntaxNode): void {
    const line = node.startPosition.row + 1;

    if (node.type === 'import_statement') {
      for (const child of namedChildrenOf(node)) {
        if (child.type === 'dotted_name') {
          // `import a.b` binds `a`
          bindings.push({
            localName: child.text.split('.')[0],
            importedName: '*',
            module: child.text,
            statementText: node.text,
            line,
          });
        } else if (child.type === 'aliased_import') {
          const name = child.childForFieldName('name')?.text;
          const alias = child.childForFieldName('alias')?.text;
          if (name && alias) {
            bindings.push({ localName: alias, importedName: '*', module: name, statementText: node.text, line });
          }
        }
      }
      return;
    }

    if (node.type === 'import_from_statement') {
      const moduleNode = node.childForFieldName('module_name');
      if (!moduleNode) return;
      for (const child of namedChildrenOf(node)) {
        if (child.startIndex === moduleNode.startIndex) continue;
        if (child.type === 'dotted_name') {
          bindings.push({
            localName: child.text,
            importedName: child.text,
            module: moduleNode.text,
            statementText: node.text,
            line,
          });
        } else if (child.type === 'aliased_import') {
          const name = child.childForFieldName('name')?.text;
          const alias = child.childForFieldName('alias')?.text;
          if (name && alias) {
            bindings.push({
              localName: alias,
              importedName: name,
              module: moduleNode.text,
              statementText: node.text,
              line,
            });
          }
        } else if (child.type === 'wildcard_import') {
          bindings.push({ localName: '*', importedName: '*', module: moduleNode.text, statementText: node.text, line });
        }
      }
      return;
    }

    for (const child of namedChildrenOf(node)) visit(child);
  }

  visit(root);
  return bindings;
}

function moduleCandidates(specifier: string, fromFile: string): string[] {
  if (specifier.startsWith('.')) {
    const dots = /^\.+/.exec(specifier)?.[0].length ?? 1;
    let base = path.posix.dirname(fromFile);
    for (let i = 1; i < dots; i++) base = path.posix.dirname(base);
    const rest = specifier.slice(dots).replace(/\./g, '/');
    if (!rest) return [path.posix.normalize(`${base}/__init__.py`)];
    const stem = path.posix.normalize(`${base}/${rest}`);
    return [`${stem}.py`, `${stem}/__init__.py`];
  }

  const parts = specifier.split('.');
  const stem = parts.join('/');
  const candidates = [`${stem}.py`, `${stem}/__init__.py`, `src/${stem}.py`, `src/${stem}/__init__.py`];
  if (parts.length > 1) {
    // Project root may itself be the top-level package
    const inner = parts.slice(1).join('/');
    candidates.push(`${inner}.py`, `${inner}/__init__.py`);
  }
  return candidates;
}

function resolveModule(specifier: string, fromFile: string, knownFiles: ReadonlySet<string>): ModuleResolution {
  if (!specifier.startsWith('.') && EXTERNAL_PACKAGES.has(specifier.split('.')[0])) {
    return { kind: 'external' };
  }
  const match = moduleCandidates(specifier, fromFile).find((candidate) => knownFiles.has(candidate));
  return match ? { kind: 'local', file: match } : { kind: 'unresolved' };
}

function locateUnit(root: SyntaxNode, name: string, container?: string): UnitLocation | null {
  const bareName = name.replace(/\[.*\]$/, '');
  let fallback: UnitLocation | null = null;

  function visit(node: SyntaxNode, enclosingClass: string | null): UnitLocation | null {
    const definition = node.type === 'decorated_definition' ? node.childForFieldName('definition') : node;
    if (definition && (definition.type === 'function_definition' || definition.type === 'class_definition')) {
      const definedName = definition.childForFieldName('name')?.text ?? '';
      if (definedName === bareName) {
        const location: UnitLocation = { name: bareName, range: nodeLineRange(definition, node), node };
        if (enclosingClass === (container ?? null)) return location;
        fallback ??= location;
      }
      const nextClass = definition.type === 'class_definition' ? definedName : enclosingClass;
      const body = definition.childForFieldName('body');
      return body ? visitChildren(body, nextClass) : null;
    }
    return visitChildren(node, enclosingClass);
  }

  function visitChildren(node: SyntaxNode, enclosingClass: string | null): UnitLocation | null {
    for (const child of namedChildrenOf(node)) {
      const found = visit(child, enclosingClass);
      if (found) return found;
    }
    return null;
  }

  return visit(root, null) ?? fallback;
}

function collectIdentifiers(node: SyntaxNode): Set<string> {
  return collectNodeText(node, new Set(['identifier']));
}

function definitionFromNode(node: SyntaxNode): TopLevelDefinition | null {
  let name: string | undefined;
  let kind: TopLevelDefinition['kind'];

  const definition = node.type === 'decorated_definition' ? node.childForFieldName('definition') : node;
  if (definition?.type === 'function_definition' || definition?.type === 'class_definition') {
    name = definition.childForFieldName('name')?.text;
    kind = definition.type === 'class_definition' ? 'class' : 'function';
  } else if (node.type === 'expression_statement') {
    const assignment = namedChildrenOf(node)[0];
    const left = assignment?.type === 'assignment' ? assignment.childForFieldName('left') : null;
    if (left?.type !== 'identifier') return null;
    name = left.text;
    kind = 'variable';
  } else {
    return null;
  }
  if (!name) return null;

  const range = nodeLineRange(node);
  const references = collectIdentifiers(node);
  references.delete(name);
  return { name, kind, startLine: range.start, endLine: range.lastLine, text: node.text, references };
}

function extractTopLevelDefinitions(root: SyntaxNode): TopLevelDefinition[] {
  const definitions: TopLevelDefinition[] = [];
  for (const child of namedChildrenOf(root)) {
    const definition = definitionFromNode(child);
    if (definition) definitions.push(definition);
  }
  return definitions;
}

function isTestFile(relativePath: string): boolean {
  const segments = relativePath.split('/');
  const base = segments[segments.length - 1];
  if (/^test_.*\.py$/.test(base) || /_test\.py$/.test(base) || base === 'conftest.py') return true;
  return segments.slice(0, -1).some((segment) => segment === 'tests' || segment === 'test');
}

export const pythonFrontEnd: LanguageFrontEnd = {
  language: 'python',
  fenceLanguage: 'python',
  commentPrefix: '#',
  generatedTestDir: 'tests/generated',

  parseFile: (content, filePath) => parseContent(content, filePath),
  extractSymbols: (root, file) => analyze(root, file).symbols,
  extractRoutes: (root, file) => analyze(root, file).routes,
  extractImports,
  resolveModule,
  submoduleSpecifier: (module, importedName) =>
    importedName === '*' ? null : module.endsWith('.') ? `${module}${importedName}` : `${module}.${importedName}`,
  locateUnit,
  extractTopLevelDefinitions,
  collectIdentifiers,
  isTestFile,
  generatedTestFileName: (mode, shardIndex) => `test_${mode}_generated_${shardIndex + 1}.py`,
};
