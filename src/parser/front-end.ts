import type { SyntaxNode } from 'tree-sitter';
import type { SourceLanguage } from '../utils/file-scanner.js';
import type { LineRange } from '../utils/line-range.js';
import type { ParsedSource } from './ast-parser.js';

export type SymbolKind = 'function' | 'method' | 'class' | 'route';

export interface CodeSymbol {
  name: string;
  /** Enclosing symbol names joined with '.', e.g. `UserService.create`. */
  qualifiedName: string;
  /** Root-relative POSIX path. */
  file: string;
  kind: SymbolKind;
  /** 1-based, inclusive. */
  startLine: number;
  /** 1-based, inclusive. */
  endLine: number;
  argCount: number;
  isAsync: boolean;
  /** Qualified name of the enclosing symbol, for nested definitions. */
  parent?: string;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS' | 'ALL';

export interface Route {
  handlerName: string;
  /** Qualified name of the symbol carrying the route marker. */
  symbolName: string;
  file: string;
  method: HttpMethod;
  path: string;
  line: number;
}

export interface ImportBinding {
  /** Identifier the importing file uses. */
  localName: string;
  /** Name exported by the module; '*' when the binding is the whole module. */
  importedName: string;
  /** Module specifier as written (`app.models`, `./user-service.js`, `.utils`). */
  module: string;
  statementText: string;
  line: number;
}

export type ModuleResolution = { kind: 'local'; file: string } | { kind: 'external' } | { kind: 'unresolved' };

export type DefinitionKind = 'function' | 'class' | 'variable' | 'type';

export interface TopLevelDefinition {
  name: string;
  kind: DefinitionKind;
  startLine: number;
  endLine: number;
  text: string;
  /** Identifiers referenced inside the definition (its own name excluded). */
  references: Set<string>;
}

export interface UnitLocation {
  name: string;
  range: LineRange;
  node: SyntaxNode;
}

export interface SymbolExtraction {
  symbols: CodeSymbol[];
  routes: Route[];
}

/**
 * One implementation per source language. Shared logic (indexer, extractor,
 * patch engine) never branches on language; it asks the front end.
 */
export interface LanguageFrontEnd {
  readonly language: SourceLanguage;
  /** Info string for fenced code blocks in prompts. */
  readonly fenceLanguage: string;
  readonly commentPrefix: string;
  /** Default directory for generated test files, root-relative. */
  readonly generatedTestDir: string;

  parseFile(content: string, filePath: string): ParsedSource;
  extractSymbols(root: SyntaxNode, file: string): CodeSymbol[];
  extractRoutes(root: SyntaxNode, file: string): Route[];
  extractImports(root: SyntaxNode): ImportBinding[];
  resolveModule(specifier: string, fromFile: string, knownFiles: ReadonlySet<string>): ModuleResolution;
  /**
   * Specifier of `importedName` when it may itself be a module
   * (`from app import models`), or null where imports never name modules.
   */
  submoduleSpecifier(module: string, importedName: string): string | null;
  /**
   * Find the replaceable unit called `name`: a function, method or class
   * definition, or (for JS test files) an `it`/`test` call with that title.
   * `container` narrows the search to a class of that name when present.
   */
  locateUnit(root: SyntaxNode, name: string, container?: string): UnitLocation | null;
  extractTopLevelDefinitions(root: SyntaxNode): TopLevelDefinition[];
  collectIdentifiers(node: SyntaxNode): Set<string>;
  isTestFile(relativePath: string): boolean;
  generatedTestFileName(mode: string, shardIndex: number): string;
}
