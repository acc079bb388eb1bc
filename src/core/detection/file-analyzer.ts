/**
 * Single-file pattern analysis: one depth-first walk of a Python syntax tree
 * with table-driven detectors.
 */
import type Parser from 'tree-sitter';
import {
  createPythonParser,
  parsePython,
  type TreeSitterContext,
} from '../../parsers/tree-sitter/index.js';
import type { PatternKnowledgeBase } from '../knowledge/index.js';
import { byPriority, createOpportunity, type PatternOpportunity } from '../opportunities/index.js';
import { DEFAULT_DETECTORS } from './detectors/index.js';
import { PyNodes, importedNames, nameOf } from './syntax.js';
import { isNodeKind, type AnalyzerState, type DetectorTable } from './types.js';

export interface FileAnalyzerOptions {
  /** Reused across files; parsing is synchronous so sharing is safe */
  parser?: Parser;
  detectors?: DetectorTable;
}

export class FileAnalyzer {
  private readonly parser: Parser;
  private readonly detectors: DetectorTable;

  constructor(
    private readonly knowledge: PatternKnowledgeBase,
    options: FileAnalyzerOptions = {}
  ) {
    this.parser = options.parser ?? createPythonParser();
    this.detectors = options.detectors ?? DEFAULT_DETECTORS;
  }

  /**
   * Parse and analyze one file. Source that does not parse yields [].
   */
  analyzeSource(filePath: string, sourceCode: string): PatternOpportunity[] {
    const source = parsePython(this.parser, sourceCode);
    if (!source) return [];
    return this.analyzeTree(filePath, source);
  }

  /**
   * Analyze an already-parsed file. Findings are sorted by priority,
   * highest first, keeping detection order for ties.
   */
  analyzeTree(filePath: string, source: TreeSitterContext): PatternOpportunity[] {
    const findings: PatternOpportunity[] = [];
    const imports = new Set<string>();

    const visit = (node: Parser.SyntaxNode, state: AnalyzerState): void => {
      const kind = node.type;
      if (isNodeKind(kind)) {
        if (kind === PyNodes.IMPORT_STATEMENT || kind === PyNodes.IMPORT_FROM_STATEMENT) {
          for (const name of importedNames(node, source.sourceCode)) {
            imports.add(name);
          }
        }

        for (const detect of this.detectors[kind] ?? []) {
          for (const finding of detect(node, { filePath, source, knowledge: this.knowledge, state })) {
            // Fails loudly when a detector and the catalog disagree
            this.knowledge.require(finding.patternName);
            findings.push(createOpportunity({ ...finding, filePath }));
          }
        }
      }

      const inner = this.enterScope(node, state, source.sourceCode);
      for (const child of node.namedChildren) {
        visit(child, inner);
      }
    };

    visit(source.tree.rootNode, { currentClass: null, currentFunction: null, imports });
    return byPriority(findings);
  }

  private enterScope(node: Parser.SyntaxNode, state: AnalyzerState, sourceCode: string): AnalyzerState {
    switch (node.type) {
      case PyNodes.CLASS_DEFINITION:
        return { ...state, currentClass: nameOf(node, sourceCode) };
      case PyNodes.FUNCTION_DEFINITION:
        return { ...state, currentFunction: nameOf(node, sourceCode) };
      default:
        return state;
    }
  }
}
