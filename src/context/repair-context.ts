import fs from 'node:fs';
import path from 'node:path';
import { type TestFailure, splitNodeId } from '../failures/test-report.js';
import type { ParsedSource } from '../parser/ast-parser.js';
import type { HttpMethod, ImportBinding, Route, TopLevelDefinition } from '../parser/front-end.js';
import { getFrontEnd } from '../parser/front-ends.js';
import { getErrorMessage } from '../utils/helpers.js';
import type { LineRange } from '../utils/line-range.js';

export const DEFAULT_DEPENDENCY_DEPTH = 3;

export interface DefinitionSnippet {
  file: string;
  name: string;
  kind: TopLevelDefinition['kind'];
  startLine: number;
  endLine: number;
  text: string;
  /** 0 for definitions the test references directly. */
  depth: number;
}

export interface RepairContext {
  testFile: string;
  testName: string;
  /** Name of the enclosing class or describe block, when the node id has one. */
  container?: string;
  testSource: string;
  /** Source of the failing unit, or null when it could not be located. */
  testUnit: string | null;
  unitRange: LineRange | null;
  testImports: string[];
  dependencies: DefinitionSnippet[];
  unresolvedModules: string[];
}

export interface RepairContextOptions {
  /** Root-relative paths of every source file, for module resolution. */
  knownFiles: ReadonlySet<string>;
  maxDepth?: number;
  /**
   * Routes the project defines, read only when the failing unit makes HTTP
   * calls. Defaults to parsing every non-test known file.
   */
  routes?: () => readonly Route[];
}

export interface HttpCall {
  method: HttpMethod;
  path: string;
}

interface ModuleDefinitions {
  file: string;
  byName: Map<string, TopLevelDefinition>;
}

/** Strip a parametrised-test suffix: `test_add[1-2]` → `test_add`. */
export function stripParameters(testName: string): string {
  return testName.replace(/\[.*\]$/, '');
}

function loadModule(rootDir: string, file: string, cache: Map<string, ModuleDefinitions | null>): ModuleDefinitions | null {
  if (cache.has(file)) return cache.get(file) ?? null;

  const frontEnd = getFrontEnd(file);
  let loaded: ModuleDefinitions | null = null;
  if (!frontEnd) {
    cache.set(file, null);
    return null;
  }
  try {
    const content = fs.readFileSync(path.join(rootDir, file), 'utf-8');
    const parsed = frontEnd.parseFile(content, file);
    const byName = new Map<string, TopLevelDefinition>();
    for (const definition of frontEnd.extractTopLevelDefinitions(parsed.root)) {
      if (!byName.has(definition.name)) byName.set(definition.name, definition);
    }
    loaded = { file, byName };
  } catch {
    loaded = null;
  }
  cache.set(file, loaded);
  return loaded;
}

/**
 * Names a binding pulls out of its module: the imported name itself, or for
 * whole-module bindings every referenced identifier the module defines.
 */
function wantedNames(binding: ImportBinding, referenced: ReadonlySet<string>, module: ModuleDefinitions): string[] {
  if (binding.importedName !== '*' && binding.importedName !== 'default') {
    return module.byName.has(binding.importedName) ? [binding.importedName] : [];
  }
  const names = [...referenced].filter((name) => module.byName.has(name));
  if (binding.importedName === 'default' && module.byName.has(binding.localName)) names.push(binding.localName);
  return names;
}

/**
 * Breadth-first closure over same-file references, bounded by `maxDepth`.
 */
function collectClosure(module: ModuleDefinitions, roots: string[], maxDepth: number, seen: Set<string>): DefinitionSnippet[] {
  const snippets: DefinitionSnippet[] = [];
  const queue = roots.map((name) => ({ name, depth: 0 }));

  while (queue.length > 0) {
    const next = queue.shift();
    if (!next) break;
    const key = `${module.file}::${next.name}`;
    const definition = module.byName.get(next.name);
    if (!definition || seen.has(key)) continue;
    seen.add(key);

    snippets.push({
      file: module.file,
      name: definition.name,
      kind: definition.kind,
      startLine: definition.startLine,
      endLine: definition.endLine,
      text: definition.text,
      depth: next.depth,
    });

    if (next.depth >= maxDepth) continue;
    for (const reference of definition.references) {
      if (module.byName.has(reference)) queue.push({ name: reference, depth: next.depth + 1 });
    }
  }
  return snippets;
}

// client.get("/users"), request(app).post('/items', ...), f"/users/{id}", `/users/${id}`
const HTTP_CALL_PATTERN = /\.(get|post|put|patch|delete|head|options)\(\s*f?(['"`])(\/[^'"`]*)\2/gi;

/** HTTP calls a test makes with a literal path, in source order. */
export function extractHttpCalls(source: string): HttpCall[] {
  const calls: HttpCall[] = [];
  const seen = new Set<string>();
  for (const match of source.matchAll(HTTP_CALL_PATTERN)) {
    const call: HttpCall = { method: toHttpMethod(match[1]), path: match[3].replace(/[?#].*$/, '') };
    const key = `${call.method} ${call.path}`;
    if (seen.has(key)) continue;
    seen.add(key);
    calls.push(call);
  }
  return calls;
}

function toHttpMethod(verb: string): HttpMethod {
  switch (verb.toLowerCase()) {
    case 'post':
      return 'POST';
    case 'put':
      return 'PUT';
    case 'patch':
      return 'PATCH';
    case 'delete':
      return 'DELETE';
    case 'head':
      return 'HEAD';
    case 'options':
      return 'OPTIONS';
    default:
      return 'GET';
  }
}

function pathSegments(routePath: string): string[] {
  return routePath.split('/').filter((segment) => segment !== '');
}

// {id}, :id, <int:id> in routes; {id} and ${id} in test strings
function isPlaceholder(segment: string): boolean {
  return /^\$?\{[^}]*\}$/.test(segment) || /^:\w+\??$/.test(segment) || /^<[^>]+>$/.test(segment);
}

/** Whether `route` would serve `call`, treating path parameters as wildcards. */
export function routeMatchesCall(route: Route, call: HttpCall): boolean {
  if (route.method !== 'ALL' && route.method !== call.method) return false;
  const expected = pathSegments(route.path);
  const actual = pathSegments(call.path);
  if (expected.length !== actual.length) return false;
  return expected.every((segment, i) => segment === actual[i] || isPlaceholder(segment) || isPlaceholder(actual[i]));
}

/** Routes declared in every non-test file of `knownFiles`. Unparsable files are skipped. */
export function collectRoutes(rootDir: string, knownFiles: ReadonlySet<string>): Route[] {
  const routes: Route[] = [];
  for (const file of knownFiles) {
    const frontEnd = getFrontEnd(file);
    if (!frontEnd || frontEnd.isTestFile(file)) continue;
    let parsed: ParsedSource;
    try {
      parsed = frontEnd.parseFile(fs.readFileSync(path.join(rootDir, file), 'utf-8'), file);
    } catch {
      continue;
    }
    if (parsed.syntaxError) continue;
    routes.push(...frontEnd.extractRoutes(parsed.root, file));
  }
  return routes;
}

/**
 * Definitions behind the routes a test reaches over HTTP: the handler when it
 * is a top-level definition, otherwise the top-level definition enclosing the
 * route (a controller class, a route-registering function).
 */
function routeHandlerSnippets(
  rootDir: string,
  routes: readonly Route[],
  calls: HttpCall[],
  maxDepth: number,
  cache: Map<string, ModuleDefinitions | null>,
  seen: Set<string>
): DefinitionSnippet[] {
  const snippets: DefinitionSnippet[] = [];
  for (const route of routes) {
    if (!calls.some((call) => routeMatchesCall(route, call))) continue;
    const module = loadModule(rootDir, route.file, cache);
    if (!module) continue;
    const owner = route.symbolName.split('.')[0];
    const names = [route.handlerName, owner].filter((name) => module.byName.has(name));
    snippets.push(...collectClosure(module, names.slice(0, 1), maxDepth, seen));
    if (names.length === 0) snippets.push(...inlineRouteSnippet(rootDir, route, seen));
  }
  return snippets;
}

/** Source of a route whose handler is written inline at module level. */
function inlineRouteSnippet(rootDir: string, route: Route, seen: Set<string>): DefinitionSnippet[] {
  const key = `${route.file}::${route.symbolName}`;
  const frontEnd = getFrontEnd(route.file);
  if (!frontEnd || seen.has(key)) return [];
  const content = fs.readFileSync(path.join(rootDir, route.file), 'utf-8');
  const symbol = frontEnd
    .extractSymbols(frontEnd.parseFile(content, route.file).root, route.file)
    .find((s) => s.qualifiedName === route.symbolName);
  if (!symbol) return [];
  seen.add(key);
  return [
    {
      file: route.file,
      name: route.symbolName,
      kind: 'function',
      startLine: symbol.startLine,
      endLine: symbol.endLine,
      text: content.split(/\r?\n/).slice(symbol.startLine - 1, symbol.endLine).join('\n'),
      depth: 0,
    },
  ];
}

/**
 * Gather what a model needs to judge one failing test: the failing unit, the
 * imports it actually uses and the project definitions behind them.
 * Modules that cannot be resolved are listed, never fatal.
 */
export function extractRepairContext(
  rootDir: string,
  failure: TestFailure,
  options: RepairContextOptions
): RepairContext {
  const maxDepth = options.maxDepth ?? DEFAULT_DEPENDENCY_DEPTH;
  const { testFile, testName, container } = splitNodeId(failure.nodeId);
  const frontEnd = getFrontEnd(testFile);
  if (!frontEnd) {
    throw new Error(`No language support for test file ${testFile}`);
  }

  const testSource = fs.readFileSync(path.join(rootDir, testFile), 'utf-8');
  const context: RepairContext = {
    testFile,
    testName,
    ...(container !== undefined && { container }),
    testSource,
    testUnit: null,
    unitRange: null,
    testImports: [],
    dependencies: [],
    unresolvedModules: [],
  };

  let parsed: ParsedSource;
  try {
    parsed = frontEnd.parseFile(testSource, testFile);
  } catch (error) {
    context.unresolvedModules.push(`${testFile} (${getErrorMessage(error)})`);
    return context;
  }

  const unit = frontEnd.locateUnit(parsed.root, stripParameters(testName), container);
  if (unit) {
    const lines = testSource.split('\n');
    context.testUnit = lines.slice(unit.range.start - 1, unit.range.end - 1).join('\n');
    context.unitRange = unit.range;
  }

  const referenced = frontEnd.collectIdentifiers(unit ? unit.node : parsed.root);
  const bindings = frontEnd
    .extractImports(parsed.root)
    .filter((binding) => binding.localName === '*' || referenced.has(binding.localName));
  context.testImports = [...new Set(bindings.map((binding) => binding.statementText))];

  const cache = new Map<string, ModuleDefinitions | null>();
  const seen = new Set<string>();
  const unresolved = new Set<string>();

  for (const binding of bindings) {
    const submodule = frontEnd.submoduleSpecifier(binding.module, binding.importedName);
    const submoduleResolution = submodule ? frontEnd.resolveModule(submodule, testFile, options.knownFiles) : null;
    if (submoduleResolution?.kind === 'local') {
      const module = loadModule(rootDir, submoduleResolution.file, cache);
      if (module) {
        const names = [...referenced].filter((name) => module.byName.has(name));
        context.dependencies.push(...collectClosure(module, names, maxDepth, seen));
        continue;
      }
    }

    const resolution = frontEnd.resolveModule(binding.module, testFile, options.knownFiles);
    if (resolution.kind === 'external') continue;
    if (resolution.kind === 'unresolved') {
      unresolved.add(binding.module);
      continue;
    }

    const module = loadModule(rootDir, resolution.file, cache);
    if (!module) {
      unresolved.add(binding.module);
      continue;
    }
    context.dependencies.push(...collectClosure(module, wantedNames(binding, referenced, module), maxDepth, seen));
  }

  const calls = extractHttpCalls(context.testUnit ?? testSource);
  if (calls.length > 0) {
    const routes = options.routes ? options.routes() : collectRoutes(rootDir, options.knownFiles);
    context.dependencies.push(...routeHandlerSnippets(rootDir, routes, calls, maxDepth, cache, seen));
  }

  context.unresolvedModules = [...unresolved];
  return context;
}

/**
 * Render the dependency snippets for a prompt, keeping whole snippets until
 * `maxChars` is reached.
 */
export function renderRepairContext(context: RepairContext, maxChars: number): string {
  const commentPrefix = getFrontEnd(context.testFile)?.commentPrefix ?? '#';
  const sections: string[] = [];
  let used = 0;
  let omitted = 0;

  for (const snippet of context.dependencies) {
    const block = `${commentPrefix} ${snippet.file} (lines ${snippet.startLine}-${snippet.endLine})\n${snippet.text}`;
    if (used + block.length > maxChars) {
      omitted++;
      continue;
    }
    sections.push(block);
    used += block.length;
  }

  if (omitted > 0) {
    sections.push(`${commentPrefix} ... ${omitted} more definition(s) omitted`);
  }
  if (context.unresolvedModules.length > 0) {
    sections.push(`${commentPrefix} Unresolved modules: ${context.unresolvedModules.join(', ')}`);
  }
  return sections.join('\n\n');
}
