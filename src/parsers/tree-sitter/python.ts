/**
 * Python parsing using tree-sitter.
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import {
  createContext,
  hasSyntaxError,
  type TreeSitterContext,
} from './TreeSitterUtils.js';

/**
 * Creates a Python parser instance.
 *
 * Note: The type assertion `as unknown as Parser.Language` is required because
 * tree-sitter-python's TypeScript definitions don't properly extend tree-sitter's
 * Language type, despite being compatible at runtime.
 */
export function createPythonParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Python as unknown as Parser.Language);
  return parser;
}

/**
 * Parses Python source into a tree-sitter context.
 * Returns null when the parser throws or the tree contains syntax errors.
 */
export function parsePython(
  parser: Parser,
  sourceCode: string
): TreeSitterContext | null {
  try {
    const ctx = createContext(parser, sourceCode);
    return hasSyntaxError(ctx.tree.rootNode) ? null : ctx;
  } catch {
    // Parser failure is reported to the caller as "no tree"
    return null;
  }
}
