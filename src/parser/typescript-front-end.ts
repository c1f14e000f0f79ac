import path from 'node:path';
import type { SyntaxNode } from 'tree-sitter';
import { parseContent } from './ast-parser.js';
import type {
  CodeSymbol,
  HttpMethod,
  ImportBinding,
  LanguageFrontEnd,
  ModuleResolution,
  Route,
  SymbolExtraction,
  TopLevelDefinition,
  UnitLocation,
} from './front-end.js';
import { childrenOf, collectNodeText, hasChildOfType, namedChildrenOf, nodeLineRange, unquote } from './syntax-utils.js';

const EXTENSIONS_TO_TRY = ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs'];
const INDEX_FILES = ['index.ts', 'index.tsx', 'index.js', 'index.jsx'];

const FUNCTION_VALUE_TYPES = new Set(['arrow_function', 'function_expression', 'function', 'generator_function']);
const FUNCTION_DECLARATION_TYPES = new Set(['function_declaration', 'generator_function_declaration']);
const CLASS_DECLARATION_TYPES = new Set(['class_declaration', 'abstract_class_declaration']);
const TYPE_DECLARATION_TYPES = new Set(['interface_declaration', 'type_alias_declaration', 'enum_declaration']);

const EXPRESS_VERBS: Record<string, HttpMethod> = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  patch: 'PATCH',
  delete: 'DELETE',
  head: 'HEAD',
  options: 'OPTIONS',
  all: 'ALL',
};

const NEST_VERBS: Record<string, HttpMethod> = {
  Get: 'GET',
  Post: 'POST',
  Put: 'PUT',
  Patch: 'PATCH',
  Delete: 'DELETE',
  Head: 'HEAD',
  Options: 'OPTIONS',
  All: 'ALL',
};

const TEST_CALLEES = new Set(['it', 'test']);
const SUITE_CALLEES = new Set(['describe', 'suite']);

function stringValue(node: SyntaxNode | null | undefined): string | null {
  if (!node) return null;
  if (node.type === 'string') return unquote(node.text);
  if (node.type === 'template_string' && !namedChildrenOf(node).some((c) => c.type === 'template_substitution')) {
    return unquote(node.text);
  }
  return null;
}

function countParameters(fn: SyntaxNode): number {
  const parameters = fn.childForFieldName('parameters');
  if (parameters) return namedChildrenOf(parameters).filter((p) => p.type !== 'comment').length;
  // `x => x` carries a single bare parameter
  return fn.childForFieldName('parameter') ? 1 : 0;
}

/** Widen a declaration to its `export` wrapper. */
function withExport(node: SyntaxNode): SyntaxNode {
  return node.parent?.type === 'export_statement' ? node.parent : node;
}

/** Widen a variable declarator to its whole statement. */
function declaratorStatement(declarator: SyntaxNode): SyntaxNode {
  const declaration = declarator.parent;
  if (declaration?.type === 'lexical_declaration' || declaration?.type === 'variable_declaration') {
    return withExport(declaration);
  }
  return declarator;
}

/** Decorators either precede a member in the class body or are its own children. */
function memberDecorators(member: SyntaxNode): SyntaxNode[] {
  const own = childrenOf(member).filter((c) => c.type === 'decorator');
  const preceding: SyntaxNode[] = [];
  let sibling = member.previousSibling;
  while (sibling?.type === 'decorator') {
    preceding.unshift(sibling);
    sibling = sibling.previousSibling;
  }
  return [...preceding, ...own];
}

function classDecorators(classNode: SyntaxNode): SyntaxNode[] {
  const own = childrenOf(classNode).filter((c) => c.type === 'decorator');
  const wrapper = classNode.parent?.type === 'export_statement' ? classNode.parent : null;
  const exported = wrapper ? childrenOf(wrapper).filter((c) => c.type === 'decorator') : [];
  return [...exported, ...own];
}

function decoratorCall(decorator: SyntaxNode): { name: string; args: SyntaxNode[] } | null {
  const expression = namedChildrenOf(decorator)[0];
  if (!expression) return null;
  if (expression.type === 'identifier') return { name: expression.text, args: [] };
  if (expression.type !== 'call_expression') return null;
  const fn = expression.childForFieldName('function');
  const args = expression.childForFieldName('arguments');
  if (fn?.type !== 'identifier') return null;
  return { name: fn.text, args: args ? namedChildrenOf(args) : [] };
}

function joinRoutePath(...segments: string[]): string {
  const parts = segments.map((s) => s.replace(/^\/+|\/+$/g, '')).filter((s) => s.length > 0);
  return `/${parts.join('/')}`;
}

function controllerPrefix(classNode: SyntaxNode): string | null {
  for (const decorator of classDecorators(classNode)) {
    const call = decoratorCall(decorator);
    if (call?.name !== 'Controller') continue;
    const first = call.args[0];
    const literal = stringValue(first);
    if (literal !== null) return literal;
    if (first?.type === 'object') {
      for (const pair of namedChildrenOf(first)) {
        if (pair.type === 'pair' && pair.childForFieldName('key')?.text === 'path') {
          return stringValue(pair.childForFieldName('value')) ?? '';
        }
      }
    }
    return '';
  }
  return null;
}

function enclosingClass(node: SyntaxNode): SyntaxNode | null {
  let current = node.parent;
  while (current) {
    if (CLASS_DECLARATION_TYPES.has(current.type)) return current;
    current = current.parent;
  }
  return null;
}

/** `app.get('/users', handler)` or `router.post('/x', auth, async (req, res) => ...)` */
function expressRoute(call: SyntaxNode): { method: HttpMethod; path: string; handler: SyntaxNode } | null {
  const fn = call.childForFieldName('function');
  if (fn?.type !== 'member_expression') return null;
  const method = EXPRESS_VERBS[fn.childForFieldName('property')?.text ?? ''];
  if (!method) return null;

  const args = call.childForFieldName('arguments');
  const values = args ? namedChildrenOf(args).filter((a) => a.type !== 'comment') : [];
  if (values.length < 2) return null;

  const routePath = stringValue(values[0]);
  if (routePath === null || !routePath.startsWith('/')) return null;
  return { method, path: routePath, handler: values[values.length - 1] };
}

function analyze(root: SyntaxNode, file: string): SymbolExtraction {
  const symbols: CodeSymbol[] = [];
  const routes: Route[] = [];

  function define(
    name: string,
    kind: CodeSymbol['kind'],
    fn: SyntaxNode | null,
    outer: SyntaxNode,
    startNode: SyntaxNode,
    parent: CodeSymbol | null
  ): CodeSymbol {
    const range = nodeLineRange(outer, startNode);
    const symbol: CodeSymbol = {
      name,
      qualifiedName: parent ? `${parent.qualifiedName}.${name}` : name,
      file,
      kind,
      startLine: range.start,
      endLine: range.lastLine,
      argCount: fn ? countParameters(fn) : 0,
      isAsync: fn ? hasChildOfType(fn, 'async') : false,
      ...(parent && { parent: parent.qualifiedName }),
    };
    symbols.push(symbol);
    return symbol;
  }

  function nestRoute(member: SyntaxNode, symbol: CodeSymbol): void {
    const classNode = enclosingClass(member);
    const prefix = classNode ? controllerPrefix(classNode) : null;
    if (prefix === null) return;

    for (const decorator of memberDecorators(member)) {
      const call = decoratorCall(decorator);
      const method = call ? NEST_VERBS[call.name] : undefined;
      if (!call || !method) continue;
      routes.push({
        handlerName: symbol.name,
        symbolName: symbol.qualifiedName,
        file,
        method,
        path: joinRoutePath(prefix, stringValue(call.args[0]) ?? ''),
        line: decorator.startPosition.row + 1,
      });
    }
  }

  function descend(node: SyntaxNode | null, parent: CodeSymbol | null): void {
    if (!node) return;
    for (const child of namedChildrenOf(node)) visit(child, parent);
  }

  function visit(node: SyntaxNode, parent: CodeSymbol | null): void {
    if (FUNCTION_DECLARATION_TYPES.has(node.type)) {
      const name = node.childForFieldName('name')?.text;
      const outer = withExport(node);
      const symbol = name ? define(name, 'function', node, outer, outer, parent) : null;
      descend(node.childForFieldName('body'), symbol ?? parent);
      return;
    }

    if (CLASS_DECLARATION_TYPES.has(node.type)) {
      const name = node.childForFieldName('name')?.text;
      const outer = withExport(node);
      const decorators = classDecorators(node);
      const symbol = name ? define(name, 'class', null, outer, decorators[0] ?? outer, parent) : null;
      descend(node.childForFieldName('body'), symbol ?? parent);
      return;
    }

    if (node.type === 'method_definition' && node.parent?.type === 'class_body' && parent?.kind === 'class') {
      const name = node.childForFieldName('name')?.text;
      if (!name) return;
      const decorators = memberDecorators(node);
      const symbol = define(name, 'method', node, node, decorators[0] ?? node, parent);
      nestRoute(node, symbol);
      descend(node.childForFieldName('body'), symbol);
      return;
    }

    if (node.type === 'public_field_definition' && node.parent?.type === 'class_body' && parent?.kind === 'class') {
      const name = node.childForFieldName('name')?.text;
      const value = node.childForFieldName('value');
      if (name && value && FUNCTION_VALUE_TYPES.has(value.type)) {
        const decorators = memberDecorators(node);
        const symbol = define(name, 'method', value, node, decorators[0] ?? node, parent);
        descend(value.childForFieldName('body'), symbol);
        return;
      }
    }

    if (node.type === 'variable_declarator') {
      const nameNode = node.childForFieldName('name');
      const value = node.childForFieldName('value');
      if (nameNode?.type === 'identifier' && value && FUNCTION_VALUE_TYPES.has(value.type)) {
        const outer = declaratorStatement(node);
        const symbol = define(nameNode.text, 'function', value, outer, outer, parent);
        descend(value.childForFieldName('body'), symbol);
        return;
      }
    }

    if (node.type === 'call_expression') {
      const route = expressRoute(node);
      if (route) {
        const name = `${route.method} ${route.path}`;
        const outer = node.parent?.type === 'expression_statement' ? node.parent : node;
        const handlerFn = FUNCTION_VALUE_TYPES.has(route.handler.type) ? route.handler : null;
        const symbol = define(name, 'route', handlerFn, outer, outer, parent);
        routes.push({
          handlerName: route.handler.type === 'identifier' ? route.handler.text : name,
          symbolName: symbol.qualifiedName,
          file,
          method: route.method,
          path: route.path,
          line: node.startPosition.row + 1,
        });
        descend(node, symbol);
        return;
      }
    }

    descend(node, parent);
  }

  visit(root, null);
  return { symbols, routes };
}

function requireBindings(declarator: SyntaxNode, statement: SyntaxNode): ImportBinding[] {
  const value = declarator.childForFieldName('value');
  if (value?.type !== 'call_expression' || value.childForFieldName('function')?.text !== 'require') return [];
  const args = value.childForFieldName('arguments');
  const specifier = stringValue(args ? namedChildrenOf(args)[0] : null);
  if (specifier === null) return [];

  const line = statement.startPosition.row + 1;
  const nameNode = declarator.childForFieldName('name');
  if (nameNode?.type === 'identifier') {
    return [{ localName: nameNode.text, importedName: '*', module: specifier, statementText: statement.text, line }];
  }
  if (nameNode?.type === 'object_pattern') {
    return namedChildrenOf(nameNode)
      .filter((p) => p.type === 'shorthand_property_identifier_pattern')
      .map((p) => ({ localName: p.text, importedName: p.text, module: specifier, statementText: statement.text, line }));
  }
  return [];
}

function importStatementBindings(statement: SyntaxNode): ImportBinding[] {
  const specifier = stringValue(statement.childForFieldName('source'));
  if (specifier === null) return [];
  const line = statement.startPosition.row + 1;
  const bind = (localName: string, importedName: string): ImportBinding => ({
    localName,
    importedName,
    module: specifier,
    statementText: statement.text,
    line,
  });

  const bindings: ImportBinding[] = [];
  const clause = namedChildrenOf(statement).find((c) => c.type === 'import_clause');
  for (const part of clause ? namedChildrenOf(clause) : []) {
    if (part.type === 'identifier') {
      bindings.push(bind(part.text, 'default'));
    } else if (part.type === 'namespace_import') {
      const alias = namedChildrenOf(part).find((c) => c.type === 'identifier');
      if (alias) bindings.push(bind(alias.text, '*'));
    } else if (part.type === 'named_imports') {
      for (const specifierNode of namedChildrenOf(part)) {
        if (specifierNode.type !== 'import_specifier') continue;
        const name = specifierNode.childForFieldName('name')?.text;
        const alias = specifierNode.childForFieldName('alias')?.text;
        if (name) bindings.push(bind(alias ?? name, name));
      }
    }
  }
  return bindings;
}

function extractImports(root: SyntaxNode): ImportBinding[] {
  const bindings: ImportBinding[] = [];
  for (const statement of namedChildrenOf(root)) {
    if (statement.type === 'import_statement') {
      bindings.push(...importStatementBindings(statement));
    } else if (statement.type === 'lexical_declaration' || statement.type === 'variable_declaration') {
      for (const declarator of namedChildrenOf(statement)) {
        if (declarator.type === 'variable_declarator') bindings.push(...requireBindings(declarator, statement));
      }
    }
  }
  return bindings;
}

function resolveModule(specifier: string, fromFile: string, knownFiles: ReadonlySet<string>): ModuleResolution {
  if (!specifier.startsWith('.')) {
    return specifier.startsWith('/') ? { kind: 'unresolved' } : { kind: 'external' };
  }

  const resolved = path.posix.normalize(path.posix.join(path.posix.dirname(fromFile), specifier));
  if (resolved.startsWith('..')) return { kind: 'unresolved' };

  const candidates = [resolved, ...EXTENSIONS_TO_TRY.map((ext) => resolved + ext)];

  // ESM sources import `./foo.js` when the file on disk is `./foo.ts`
  const ext = path.posix.extname(resolved);
  if (ext === '.js' || ext === '.jsx' || ext === '.mjs' || ext === '.cjs') {
    const withoutExt = resolved.slice(0, -ext.length);
    const tsExt = ext === '.jsx' ? ['.tsx', '.ts'] : ext === '.js' ? ['.ts', '.tsx'] : [ext.replace('j', 't')];
    candidates.push(...tsExt.map((e) => withoutExt + e));
  }
  candidates.push(...INDEX_FILES.map((index) => path.posix.join(resolved, index)));

  const match = candidates.find((candidate) => knownFiles.has(candidate));
  return match ? { kind: 'local', file: match } : { kind: 'unresolved' };
}

function calleeName(call: SyntaxNode): string | null {
  const fn = call.childForFieldName('function');
  if (fn?.type === 'identifier') return fn.text;
  // it.only / test.skip / describe.each
  if (fn?.type === 'member_expression') {
    const object = fn.childForFieldName('object');
    return object?.type === 'identifier' ? object.text : null;
  }
  return null;
}

function callTitle(call: SyntaxNode): string | null {
  const args = call.childForFieldName('arguments');
  return stringValue(args ? namedChildrenOf(args)[0] : null);
}

function definedName(node: SyntaxNode): { name: string; outer: SyntaxNode; start: SyntaxNode } | null {
  if (FUNCTION_DECLARATION_TYPES.has(node.type) || CLASS_DECLARATION_TYPES.has(node.type)) {
    const name = node.childForFieldName('name')?.text;
    const outer = withExport(node);
    const start = CLASS_DECLARATION_TYPES.has(node.type) ? (classDecorators(node)[0] ?? outer) : outer;
    return name ? { name, outer, start } : null;
  }
  if (node.type === 'method_definition' || node.type === 'public_field_definition') {
    const name = node.childForFieldName('name')?.text;
    return name ? { name, outer: node, start: memberDecorators(node)[0] ?? node } : null;
  }
  if (node.type === 'variable_declarator') {
    const nameNode = node.childForFieldName('name');
    const value = node.childForFieldName('value');
    if (nameNode?.type !== 'identifier' || !value || !FUNCTION_VALUE_TYPES.has(value.type)) return null;
    const outer = declaratorStatement(node);
    return { name: nameNode.text, outer, start: outer };
  }
  return null;
}

function locateUnit(root: SyntaxNode, name: string, container?: string): UnitLocation | null {
  let definitionFallback: UnitLocation | null = null;
  let testCall: UnitLocation | null = null;
  let testCallFallback: UnitLocation | null = null;

  function visit(node: SyntaxNode, scope: string | null): UnitLocation | null {
    const definition = definedName(node);
    if (definition?.name === name) {
      const location: UnitLocation = { name, range: nodeLineRange(definition.outer, definition.start), node: definition.outer };
      if (scope === (container ?? null)) return location;
      definitionFallback ??= location;
    }

    let nextScope = scope;
    if (CLASS_DECLARATION_TYPES.has(node.type)) {
      nextScope = node.childForFieldName('name')?.text ?? scope;
    } else if (node.type === 'call_expression') {
      const callee = calleeName(node);
      const title = callTitle(node);
      if (callee && SUITE_CALLEES.has(callee) && title !== null) {
        nextScope = title;
      } else if (callee && TEST_CALLEES.has(callee) && title === name) {
        const outer = node.parent?.type === 'expression_statement' ? node.parent : node;
        const location: UnitLocation = { name, range: nodeLineRange(outer), node: outer };
        if (scope === (container ?? null)) testCall ??= location;
        else testCallFallback ??= location;
      }
    }

    for (const child of namedChildrenOf(node)) {
      const found = visit(child, nextScope);
      if (found) return found;
    }
    return null;
  }

  return visit(root, null) ?? definitionFallback ?? testCall ?? testCallFallback;
}

function collectIdentifiers(node: SyntaxNode): Set<string> {
  return collectNodeText(node, new Set(['identifier', 'type_identifier', 'shorthand_property_identifier']));
}

function definitionsOf(statement: SyntaxNode): TopLevelDefinition[] {
  const declaration = statement.type === 'export_statement' ? statement.childForFieldName('declaration') : statement;
  if (!declaration) return [];

  const entries: Array<{ name: string; kind: TopLevelDefinition['kind'] }> = [];
  if (FUNCTION_DECLARATION_TYPES.has(declaration.type)) {
    const name = declaration.childForFieldName('name')?.text;
    if (name) entries.push({ name, kind: 'function' });
  } else if (CLASS_DECLARATION_TYPES.has(declaration.type)) {
    const name = declaration.childForFieldName('name')?.text;
    if (name) entries.push({ name, kind: 'class' });
  } else if (TYPE_DECLARATION_TYPES.has(declaration.type)) {
    const name = declaration.childForFieldName('name')?.text;
    if (name) entries.push({ name, kind: 'type' });
  } else if (declaration.type === 'lexical_declaration' || declaration.type === 'variable_declaration') {
    for (const declarator of namedChildrenOf(declaration)) {
      const nameNode = declarator.type === 'variable_declarator' ? declarator.childForFieldName('name') : null;
      const value = declarator.childForFieldName('value');
      if (nameNode?.type === 'identifier') {
        entries.push({ name: nameNode.text, kind: value && FUNCTION_VALUE_TYPES.has(value.type) ? 'function' : 'variable' });
      }
    }
  }

  const range = nodeLineRange(statement);
  const identifiers = collectIdentifiers(statement);
  return entries.map(({ name, kind }) => {
    const references = new Set(identifiers);
    references.delete(name);
    return { name, kind, startLine: range.start, endLine: range.lastLine, text: statement.text, references };
  });
}

function extractTopLevelDefinitions(root: SyntaxNode): TopLevelDefinition[] {
  return namedChildrenOf(root).flatMap((statement) => definitionsOf(statement));
}

function isTestFile(relativePath: string): boolean {
  const segments = relativePath.split('/');
  const base = segments[segments.length - 1];
  if (/\.(test|spec)\.[cm]?[jt]sx?$/.test(base)) return true;
  return segments.slice(0, -1).some((segment) => segment === 'test' || segment === 'tests' || segment === '__tests__');
}

function createScriptFrontEnd(language: 'typescript' | 'javascript', testExtension: string): LanguageFrontEnd {
  return {
    language,
    fenceLanguage: language,
    commentPrefix: '//',
    generatedTestDir: 'test/generated',

    parseFile: (content, filePath) => parseContent(content, filePath),
    extractSymbols: (root, file) => analyze(root, file).symbols,
    extractRoutes: (root, file) => analyze(root, file).routes,
    extractImports,
    resolveModule,
    submoduleSpecifier: () => null,
    locateUnit,
    extractTopLevelDefinitions,
    collectIdentifiers,
    isTestFile,
    generatedTestFileName: (mode, shardIndex) => `${mode}-generated-${shardIndex + 1}.test${testExtension}`,
  };
}

export const typescriptFrontEnd = createScriptFrontEnd('typescript', '.ts');
export const javascriptFrontEnd = createScriptFrontEnd('javascript', '.js');
