import type { SyntaxNode } from 'tree-sitter';
import { LineRange } from '../utils/line-range.js';

export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  const result: SyntaxNode[] = [];
  for (let i = 0; i < node.childCount; i++) {
    const child = node.child(i);
    if (child) result.push(child);
  }
  return result;
}

export function namedChildrenOf(node: SyntaxNode): SyntaxNode[] {
  const result: SyntaxNode[] = [];
  for (let i = 0; i < node.namedChildCount; i++) {
    const child = node.namedChild(i);
    if (child) result.push(child);
  }
  return result;
}

/**
 * 1-based inclusive line span of a node. A node whose end lands on column 0
 * of a later row only swallowed the trailing newline, so that row is not counted.
 */
export function nodeLineRange(node: SyntaxNode, startNode: SyntaxNode = node): LineRange {
  const first = startNode.startPosition.row + 1;
  let last = node.endPosition.row + 1;
  if (node.endPosition.column === 0 && node.endPosition.row > startNode.startPosition.row) {
    last -= 1;
  }
  return LineRange.fromInclusive(first, Math.max(first, last));
}

/**
 * Strip quotes (and Python string prefixes such as r/b/f) from a string literal.
 */
export function unquote(literal: string): string {
  const match = /^[a-zA-Z]{0,2}("""|'''|["'`])([\s\S]*)\1$/.exec(literal.trim());
  return match ? match[2] : literal;
}

/**
 * Collect the text of every node whose type is in `types`, depth first.
 */
export function collectNodeText(node: SyntaxNode, types: ReadonlySet<string>): Set<string> {
  const found = new Set<string>();
  const stack: SyntaxNode[] = [node];
  while (stack.length > 0) {
    const current = stack.pop();
    if (!current) break;
    if (types.has(current.type)) {
      found.add(current.text);
    }
    for (let i = 0; i < current.childCount; i++) {
      const child = current.child(i);
      if (child) stack.push(child);
    }
  }
  return found;
}

export function hasChildOfType(node: SyntaxNode, type: string): boolean {
  for (let i = 0; i < node.childCount; i++) {
    if (node.child(i)?.type === type) return true;
  }
  return false;
}
