/**
 * Shared tree-sitter traversal helpers.
 */

import Parser from 'tree-sitter';
import type { SourceLocation } from '../interface.types.js';

/**
 * Context for tree-sitter parsing operations.
 */
export interface TreeSitterContext {
  /** The parsed syntax tree */
  tree: Parser.Tree;
  /** The source code being parsed */
  sourceCode: string;
}

/**
 * Creates a tree-sitter parsing context.
 * The input buffer is sized to the source; the binding's default of 32 KiB
 * rejects larger files.
 */
export function createContext(
  parser: Parser,
  sourceCode: string
): TreeSitterContext {
  return {
    tree: parser.parse(sourceCode, undefined, { bufferSize: sourceCode.length * 2 + 1 }),
    sourceCode,
  };
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Converts a tree-sitter node position to SourceLocation.
 * Tree-sitter uses 0-based positions, we use 1-based.
 */
export function getLocation(node: Parser.SyntaxNode): SourceLocation {
  return {
    line: node.startPosition.row + 1,
    column: node.startPosition.column + 1,
  };
}

/**
 * Finds all descendant nodes matching the given types, in document order.
 */
export function findNodesOfType(
  root: Parser.SyntaxNode,
  types: string[]
): Parser.SyntaxNode[] {
  const results: Parser.SyntaxNode[] = [];
  const typeSet = new Set(types);

  walkTree(root, (node) => {
    if (typeSet.has(node.type)) {
      results.push(node);
    }
  });

  return results;
}

/**
 * Finds the first descendant (or the node itself) of the given type.
 */
export function findFirstOfType(
  root: Parser.SyntaxNode,
  type: string
): Parser.SyntaxNode | null {
  if (root.type === type) return root;
  for (const child of root.children) {
    const found = findFirstOfType(child, type);
    if (found) return found;
  }
  return null;
}

/**
 * Walks the AST depth-first, calling the callback for each node.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => void
): void {
  callback(node);
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * Gets all children of a specific type.
 */
export function getChildrenOfType(
  node: Parser.SyntaxNode,
  type: string
): Parser.SyntaxNode[] {
  return node.children.filter((child) => child.type === type);
}
