import path from 'node:path';
import Parser from 'tree-sitter';
import type { SyntaxNode } from 'tree-sitter';
import JavaScript from 'tree-sitter-javascript';
import Python from 'tree-sitter-python';
import TypeScript from 'tree-sitter-typescript';
import { type SourceLanguage, getLanguageFromExtension } from '../utils/file-scanner.js';

export interface SyntaxErrorLocation {
  line: number;
  column: number;
}

export interface ParsedSource {
  language: SourceLanguage;
  root: SyntaxNode;
  /** First ERROR or MISSING node, or null when the tree is clean. */
  syntaxError: SyntaxErrorLocation | null;
}

const typescriptParser = new Parser();
typescriptParser.setLanguage(TypeScript.typescript);

const tsxParser = new Parser();
tsxParser.setLanguage(TypeScript.tsx);

const javascriptParser = new Parser();
javascriptParser.setLanguage(JavaScript);

const pythonParser = new Parser();
pythonParser.setLanguage(Python);

function getParser(filePath: string): Parser | null {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case '.py':
      return pythonParser;
    case '.tsx':
      return tsxParser;
    case '.ts':
    case '.mts':
    case '.cts':
      return typescriptParser;
    case '.js':
    case '.jsx':
    case '.mjs':
    case '.cjs':
      return javascriptParser;
    default:
      return null;
  }
}

/**
 * Locate the first syntax problem in a tree. tree-sitter recovers from errors
 * instead of failing, so a parse only counts as valid when no ERROR node and
 * no zero-width (MISSING) leaf is present.
 */
export function findSyntaxError(root: SyntaxNode): SyntaxErrorLocation | null {
  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    const isMissingLeaf = node !== root && node.childCount === 0 && node.startIndex === node.endIndex;
    if (node.type === 'ERROR' || isMissingLeaf) {
      return { line: node.startPosition.row + 1, column: node.startPosition.column + 1 };
    }

    // Push in reverse so the leftmost problem is reported first
    for (let i = node.childCount - 1; i >= 0; i--) {
      const child = node.child(i);
      if (child) stack.push(child);
    }
  }
  return null;
}

/**
 * Pure function that parses already-loaded content.
 * This enables testing without file I/O.
 */
export function parseContent(content: string, filePath: string): ParsedSource {
  const parser = getParser(filePath);
  const language = getLanguageFromExtension(filePath);
  if (!parser || !language) {
    throw new Error(`Unsupported source file: ${filePath}`);
  }

  // Buffer size: file size × 2 (for UTF-16) + 1MB overhead, minimum 1MB
  const bufferSize = Math.max(1024 * 1024, content.length * 2 + 1024 * 1024);
  const tree = parser.parse(content, undefined, { bufferSize });

  return {
    language,
    root: tree.rootNode,
    syntaxError: findSyntaxError(tree.rootNode),
  };
}
