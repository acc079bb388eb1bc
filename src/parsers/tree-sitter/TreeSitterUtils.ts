/**
 * Shared tree-sitter utilities for syntax-tree detectors.
 * Provides common traversal, extraction, and context management functions.
 */

import Parser from 'tree-sitter';

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
 */
export function createContext(
  parser: Parser,
  sourceCode: string
): TreeSitterContext {
  // The binding's default input buffer is too small for large files
  const tree = parser.parse(sourceCode, undefined, {
    bufferSize: Math.max(32 * 1024, sourceCode.length * 2),
  });
  return { tree, sourceCode };
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
 * Finds all descendant nodes matching the given types.
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
 * Walks the AST depth-first, calling the callback for each node.
 * Returning false from the callback skips that node's children.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => boolean | void
): void {
  if (callback(node) === false) return;
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * Gets the start and end line numbers of a node (1-based).
 */
export function getNodeLines(node: Parser.SyntaxNode): {
  startLine: number;
  endLine: number;
} {
  return {
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
  };
}

/**
 * True when the tree holds an ERROR node or a zero-width node the parser
 * inserted to recover from a missing token.
 */
export function hasSyntaxError(root: Parser.SyntaxNode): boolean {
  let found = false;
  walkTree(root, (node) => {
    if (found) return false;
    if (node.type === 'ERROR') {
      found = true;
    } else if (
      node.parent !== null &&
      node.childCount === 0 &&
      node.startIndex === node.endIndex
    ) {
      found = true;
    }
  });
  return found;
}
